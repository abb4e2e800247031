/**
 * Parsers and formatters for the structured header values spamd understands.
 *
 * Parsers return undefined on input they do not recognise so each caller can
 * raise the error that fits its side of the exchange.
 */

export interface SpamVerdict {
  isSpam: boolean;
  score: number;
  threshold: number;
}

/** Where a TELL should record (Set) or forget (Remove) a message */
export interface ActionOption {
  local: boolean;
  remote: boolean;
}

export type MessageClass = 'spam' | 'ham';

const CONTENT_LENGTH_PATTERN = /^\s*(\d+)\s*$/;
const NUMBER = '(-?\\d+(?:\\.\\d+)?)';
const SPAM_PATTERN = new RegExp(`^\\s*(true|false)\\s*;\\s*${NUMBER}\\s*/\\s*${NUMBER}\\s*$`, 'i');
const ACTION_PATTERN = /^\s*(local|remote)(?:\s*,\s*(local|remote))?\s*$/i;
const MESSAGE_CLASS_PATTERN = /^\s*(spam|ham)\s*$/i;
const TOKEN_PATTERN = /^\s*([A-Za-z0-9_-]+)\s*$/;

export function parseContentLength(value: string): number | undefined {
  const match = CONTENT_LENGTH_PATTERN.exec(value);
  if (!match) return undefined;

  const length = Number(match[1]);
  return Number.isSafeInteger(length) ? length : undefined;
}

/**
 * Parses `True ; 15.2 / 5.0`.
 */
export function parseSpamValue(value: string): SpamVerdict | undefined {
  const match = SPAM_PATTERN.exec(value);
  if (!match) return undefined;

  return {
    isSpam: match[1].toLowerCase() === 'true',
    score: Number(match[2]),
    threshold: Number(match[3]),
  };
}

export function formatSpamValue(verdict: SpamVerdict): string {
  return `${verdict.isSpam ? 'True' : 'False'} ; ${verdict.score.toFixed(1)} / ${verdict.threshold.toFixed(1)}`;
}

export function parseActionOption(value: string): ActionOption | undefined {
  const match = ACTION_PATTERN.exec(value);
  if (!match) return undefined;

  const targets = [match[1], match[2]].filter((target): target is string => target !== undefined);
  return {
    local: targets.some((target) => target.toLowerCase() === 'local'),
    remote: targets.some((target) => target.toLowerCase() === 'remote'),
  };
}

/**
 * Formats an ActionOption, or returns undefined when it names no destination.
 */
export function formatActionOption(option: ActionOption): string | undefined {
  const targets = [option.local ? 'local' : undefined, option.remote ? 'remote' : undefined].filter(
    (target): target is string => target !== undefined,
  );
  return targets.length > 0 ? targets.join(', ') : undefined;
}

export function parseMessageClass(value: string): MessageClass | undefined {
  const match = MESSAGE_CLASS_PATTERN.exec(value);
  if (!match) return undefined;
  return match[1].toLowerCase() === 'spam' ? 'spam' : 'ham';
}

/**
 * Parses a single token such as a Compress algorithm. Lowercased.
 */
export function parseToken(value: string): string | undefined {
  return TOKEN_PATTERN.exec(value)?.[1].toLowerCase();
}
