import type { ActionOption, SpamVerdict } from '../message/header-values';
import type { SpamdResponse } from '../message/response';
import type { SpamdAddress } from '../transport/spamd-address';

export interface ExecuteOptions {
  /** Deadline for acquire, connect, send and receive together. Defaults to SPAMD_TIMEOUT. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Overrides the configured daemon address */
  address?: SpamdAddress | string;
}

export interface CommandOptions extends ExecuteOptions {
  /** Sent as the User header. Defaults to SPAMD_USER. */
  user?: string;
  /** zlib-compress the message. Defaults to SPAMD_COMPRESS. */
  compress?: boolean;
}

export interface AcquireOptions {
  address?: SpamdAddress | string;
  signal?: AbortSignal;
}

export type LearnType = 'spam' | 'ham' | 'forget';

export interface TellOptions extends CommandOptions {
  /** Where to learn or forget the message. Defaults to local only. */
  destinations?: Partial<ActionOption>;
}

export interface SpamCheckResult extends SpamdResponse, SpamVerdict {}

export interface SymbolsResult extends SpamCheckResult {
  symbols: string[];
}

export interface ReportResult extends SpamCheckResult {
  report: string;
}

export interface ReportIfSpamResult extends SpamCheckResult {
  /** Only present when the message is spam */
  report?: string;
}

export interface ProcessResult extends SpamCheckResult {
  /** The message rewritten by spamd */
  message: Buffer;
}

export interface HeadersOnlyResult extends SpamCheckResult {
  /** The rewritten header section of the message */
  messageHeaders: string;
}

export interface PingResult extends SpamdResponse {
  pong: boolean;
}

export interface TellResult extends SpamdResponse {
  didSet: ActionOption;
  didRemove: ActionOption;
}
