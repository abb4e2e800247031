import type { SpamdResponse } from '../message/response';
import { describeStatus } from '../constants/status-codes.constant';

/**
 * Tags carried by every error the spamd client raises.
 */
export type SpamdErrorCode =
  | 'InvalidRequest'
  | 'InvalidHeaderValue'
  | 'EncodeError'
  | 'ConnectionError'
  | 'WriteError'
  | 'Timeout'
  | 'Cancelled'
  | 'UnexpectedEOF'
  | 'MalformedStatusLine'
  | 'MalformedHeader'
  | 'MalformedBody'
  | 'FrameTooLarge'
  | 'DaemonError'
  | 'PoolExhausted'
  | 'PoolClosed';

/**
 * Where an error happened. Filled in by the client when the error crosses an exchange.
 */
export interface SpamdErrorContext {
  command?: string;
  address?: string;
}

export interface SpamdErrorOptions extends SpamdErrorContext {
  cause?: unknown;
}

/**
 * Base class for all spamd client errors.
 */
export abstract class SpamdError extends Error {
  abstract readonly code: SpamdErrorCode;
  private readonly context: SpamdErrorContext;

  constructor(message: string, options: SpamdErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.context = { command: options.command, address: options.address };

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get command(): string | undefined {
    return this.context.command;
  }

  get address(): string | undefined {
    return this.context.address;
  }

  /**
   * Fills in context fields that are still unknown. Existing values are kept.
   */
  annotate(context: SpamdErrorContext): this {
    this.context.command ??= context.command;
    this.context.address ??= context.address;
    return this;
  }
}

export class InvalidRequestError extends SpamdError {
  readonly code = 'InvalidRequest';
}

export class InvalidHeaderValueError extends SpamdError {
  readonly code = 'InvalidHeaderValue';

  constructor(
    public readonly headerName: string,
    options: SpamdErrorOptions = {},
  ) {
    super(`Header "${headerName}" value must not contain CR or LF`, options);
  }
}

export class EncodeError extends SpamdError {
  readonly code = 'EncodeError';
}

export class ConnectionError extends SpamdError {
  readonly code = 'ConnectionError';
}

export class WriteError extends SpamdError {
  readonly code = 'WriteError';
}

export class TimeoutError extends SpamdError {
  readonly code = 'Timeout';
}

export class CancelledError extends SpamdError {
  readonly code = 'Cancelled';
}

export class UnexpectedEofError extends SpamdError {
  readonly code = 'UnexpectedEOF';
}

export class MalformedStatusLineError extends SpamdError {
  readonly code = 'MalformedStatusLine';
}

export class MalformedHeaderError extends SpamdError {
  readonly code = 'MalformedHeader';
}

export class MalformedBodyError extends SpamdError {
  readonly code = 'MalformedBody';
}

export class FrameTooLargeError extends SpamdError {
  readonly code = 'FrameTooLarge';

  constructor(section: 'header' | 'body', size: number, limit: number, options: SpamdErrorOptions = {}) {
    super(`Response ${section} section of ${size} bytes exceeds the ${limit} byte limit`, options);
  }
}

/**
 * A well-formed response whose status code reports a failure.
 * The connection that carried it is still in a known framing state.
 */
export class DaemonError extends SpamdError {
  readonly code = 'DaemonError';
  readonly statusCode: number;
  readonly statusMessage: string;

  constructor(
    public readonly response: SpamdResponse,
    options: SpamdErrorOptions = {},
  ) {
    super(
      `spamd returned ${response.statusCode} ${response.statusMessage} (${describeStatus(response.statusCode)})`,
      options,
    );
    this.statusCode = response.statusCode;
    this.statusMessage = response.statusMessage;
  }
}

export class PoolExhaustedError extends SpamdError {
  readonly code = 'PoolExhausted';
}

export class PoolClosedError extends SpamdError {
  readonly code = 'PoolClosed';
}

export function isSpamdError(value: unknown): value is SpamdError {
  return value instanceof SpamdError;
}

/**
 * Maps an aborted signal to the error that should surface to the caller.
 */
export function abortReason(signal: AbortSignal): SpamdError {
  const reason: unknown = signal.reason;
  return isSpamdError(reason) ? reason : new CancelledError('Operation was cancelled', { cause: reason });
}
