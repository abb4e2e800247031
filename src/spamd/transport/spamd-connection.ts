import { Logger } from '@nestjs/common';
import { isIP, Socket, createConnection } from 'net';
import { connect as connectTls } from 'tls';
import type { ConnectionOptions as TlsConnectionOptions } from 'tls';
import {
  ConnectionError,
  InvalidRequestError,
  UnexpectedEofError,
  WriteError,
  abortReason,
  isSpamdError,
} from '../errors/spamd.errors';
import type { FrameDecoder } from '../codec/message-decoder';
import { createDeadline } from '../utils/deadline.utils';
import { formatAddress } from './spamd-address';
import type { SpamdAddress } from './spamd-address';

export type ConnectionState = 'idle' | 'in-use' | 'closed';

export interface SpamdTlsOptions {
  /** PEM bundle used instead of the system trust store */
  ca?: Buffer;
  rejectUnauthorized?: boolean;
  /** SNI name. Defaults to the host when it is not an IP address. */
  servername?: string;
}

export interface ConnectOptions {
  /** Applies to the TCP connect and the TLS handshake. A timeout is a ConnectionError. */
  timeoutMs?: number;
  signal?: AbortSignal;
  tls?: SpamdTlsOptions;
}

export interface IoOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface ActiveReader {
  onData(chunk: Buffer): void;
  onEnd(): void;
  onError(error: Error): void;
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function describeConnectError(error: Error, label: string): string {
  switch (errorCode(error)) {
    case 'ECONNREFUSED':
      return `Connection refused by ${label}`;
    case 'ENOENT':
      return `Socket ${label} does not exist`;
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return `Could not resolve ${label}`;
    case 'ECONNRESET':
      return `Connection to ${label} was reset`;
    default:
      return `Could not connect to ${label}: ${error.message}`;
  }
}

function openSocket(address: SpamdAddress, tls: SpamdTlsOptions | undefined): Socket {
  if (!tls) {
    return address.kind === 'unix'
      ? createConnection({ path: address.path })
      : createConnection({ host: address.host, port: address.port });
  }

  const options: TlsConnectionOptions = {
    ca: tls.ca,
    rejectUnauthorized: tls.rejectUnauthorized ?? true,
  };
  if (address.kind === 'unix') {
    return connectTls({ ...options, path: address.path, servername: tls.servername });
  }
  return connectTls({
    ...options,
    host: address.host,
    port: address.port,
    servername: tls.servername ?? (isIP(address.host) === 0 ? address.host : undefined),
  });
}

/**
 * One socket to spamd.
 *
 * A connection is owned by a single exchange at a time. Any failure during send or receive
 * closes it, since the framing state of the stream is then unknown.
 */
export class SpamdConnection {
  private static nextId = 1;

  private readonly logger = new Logger(SpamdConnection.name);
  readonly id = SpamdConnection.nextId++;
  readonly label: string;
  private current: ConnectionState = 'in-use';
  private buffered: Buffer[] = [];
  private reader?: ActiveReader;
  private peerEnded = false;
  private socketError?: Error;
  private idleAt = Date.now();
  private exchanges = 0;

  private constructor(
    private readonly socket: Socket,
    readonly address: SpamdAddress,
  ) {
    this.label = formatAddress(address);

    socket.on('data', (chunk: Buffer) => this.handleData(chunk));
    socket.on('end', () => {
      this.peerEnded = true;
      this.reader?.onEnd();
      if (this.current === 'idle') this.close();
    });
    socket.on('error', (error: Error) => {
      this.socketError = error;
      this.reader?.onError(error);
    });
    socket.on('close', () => {
      this.reader?.onEnd();
      this.markClosed();
    });

    this.logger.debug(`Connection #${this.id} opened to ${this.label}`);
  }

  /**
   * Opens a socket (with TLS when configured) and resolves once it is usable.
   *
   * @throws ConnectionError when the connect or handshake fails or times out
   * @throws TimeoutError or CancelledError when the caller's signal aborts first
   */
  static connect(address: SpamdAddress, options: ConnectOptions = {}): Promise<SpamdConnection> {
    const label = formatAddress(address);
    const { signal, timeoutMs } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal).annotate({ address: label }));
        return;
      }

      let socket: Socket;
      try {
        socket = openSocket(address, options.tls);
      } catch (error) {
        // net validates options synchronously, e.g. ERR_SOCKET_BAD_PORT
        const cause = error instanceof Error ? error : new Error(String(error));
        reject(new ConnectionError(describeConnectError(cause, label), { cause, address: label }));
        return;
      }
      const readyEvent = options.tls ? 'secureConnect' : 'connect';
      let timer: NodeJS.Timeout | undefined;

      const cleanup = (): void => {
        if (timer) clearTimeout(timer);
        socket.off(readyEvent, onReady);
        socket.off('error', onError);
        signal?.removeEventListener('abort', onAbort);
      };
      const fail = (error: Error): void => {
        cleanup();
        socket.destroy();
        reject(error);
      };
      const onReady = (): void => {
        cleanup();
        resolve(new SpamdConnection(socket, address));
      };
      const onError = (error: Error): void => {
        fail(new ConnectionError(describeConnectError(error, label), { cause: error, address: label }));
      };
      const onAbort = (): void => {
        if (signal) fail(abortReason(signal).annotate({ address: label }));
      };

      socket.once(readyEvent, onReady);
      socket.once('error', onError);
      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs !== undefined && timeoutMs > 0) {
        timer = setTimeout(
          () => fail(new ConnectionError(`Timed out connecting to ${label} after ${timeoutMs}ms`, { address: label })),
          timeoutMs,
        );
      }
    });
  }

  get state(): ConnectionState {
    return this.current;
  }

  /** Frames received so far. Above zero once the connection has been used. */
  get exchangeCount(): number {
    return this.exchanges;
  }

  /** When the connection last became idle */
  get idleSince(): number {
    return this.idleAt;
  }

  /**
   * Writes the whole buffer and resolves once it has been handed to the OS.
   *
   * @throws WriteError, TimeoutError or CancelledError; the connection is closed in every case
   */
  async send(bytes: Buffer, options: IoOptions = {}): Promise<void> {
    if (this.current === 'closed' || this.socket.destroyed) {
      throw new WriteError(`Connection #${this.id} to ${this.label} is closed`, { address: this.label });
    }

    const deadline = createDeadline(
      options.timeoutMs,
      options.signal,
      (ms) => `Writing to ${this.label} timed out after ${ms}ms`,
    );
    try {
      await new Promise<void>((resolve, reject) => {
        const { signal } = deadline;
        if (signal.aborted) {
          reject(abortReason(signal));
          return;
        }

        const onAbort = (): void => reject(abortReason(signal));
        signal.addEventListener('abort', onAbort, { once: true });

        this.socket.write(bytes, (error) => {
          signal.removeEventListener('abort', onAbort);
          if (error) {
            reject(new WriteError(`Failed to write ${bytes.length} bytes to ${this.label}`, { cause: error }));
          } else {
            resolve();
          }
        });
      });
    } catch (error) {
      this.close();
      if (isSpamdError(error)) error.annotate({ address: this.label });
      throw error;
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Feeds incoming bytes to the decoder until it yields a frame.
   * Peer close hands over to `decoder.end()`, which completes the frame or raises UnexpectedEofError.
   *
   * @throws the decoder's errors, UnexpectedEofError on socket errors, TimeoutError or CancelledError;
   *   the connection is closed in every case
   */
  async receive<T>(decoder: FrameDecoder<T>, options: IoOptions = {}): Promise<T> {
    if (this.reader) {
      throw new InvalidRequestError(`Connection #${this.id} already has a read in progress`, {
        address: this.label,
      });
    }

    const deadline = createDeadline(
      options.timeoutMs,
      options.signal,
      (ms) => `No complete response from ${this.label} after ${ms}ms`,
    );
    try {
      const frame = await this.readFrame(decoder, deadline.signal);
      this.exchanges++;
      return frame;
    } catch (error) {
      this.close();
      if (isSpamdError(error)) error.annotate({ address: this.label });
      throw error;
    } finally {
      deadline.dispose();
    }
  }

  /**
   * True while the connection can carry another exchange: open, the peer has not closed,
   * no socket error and no unread bytes.
   */
  isReusable(): boolean {
    return (
      this.current !== 'closed' &&
      !this.socket.destroyed &&
      !this.peerEnded &&
      this.socketError === undefined &&
      this.buffered.length === 0
    );
  }

  markInUse(): void {
    if (this.current === 'closed') return;
    this.current = 'in-use';
    this.socket.ref();
  }

  /**
   * Parks the connection. Idle sockets do not keep the process alive.
   */
  markIdle(): void {
    if (this.current === 'closed') return;
    if (!this.isReusable()) {
      this.close();
      return;
    }
    this.current = 'idle';
    this.idleAt = Date.now();
    this.socket.unref();
  }

  close(): void {
    if (this.current === 'closed') return;
    this.socket.destroy();
    this.markClosed();
  }

  private markClosed(): void {
    if (this.current === 'closed') return;
    this.current = 'closed';
    this.buffered = [];
    this.logger.debug(`Connection #${this.id} to ${this.label} closed`);
  }

  private handleData(chunk: Buffer): void {
    if (this.reader) {
      this.reader.onData(chunk);
      return;
    }

    switch (this.current) {
      case 'in-use':
        this.buffered.push(chunk);
        break;
      case 'idle':
        this.logger.debug(`Connection #${this.id} received ${chunk.length} unsolicited bytes while idle`);
        this.close();
        break;
      case 'closed':
        break;
    }
  }

  private readFrame<T>(decoder: FrameDecoder<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const settle = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        this.reader = undefined;
        signal.removeEventListener('abort', onAbort);
        outcome();
      };
      const onData = (chunk: Buffer): void => {
        try {
          const message = decoder.push(chunk);
          if (message !== undefined) settle(() => resolve(message));
        } catch (error) {
          settle(() => reject(error));
        }
      };
      const onEnd = (): void => {
        try {
          const message = decoder.end();
          settle(() => resolve(message));
        } catch (error) {
          settle(() => reject(error));
        }
      };
      const onError = (error: Error): void => {
        settle(() =>
          reject(new UnexpectedEofError(`Connection to ${this.label} failed while reading: ${error.message}`, { cause: error })),
        );
      };
      const onAbort = (): void => settle(() => reject(abortReason(signal)));

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      this.reader = { onData, onEnd, onError };

      if (this.buffered.length > 0) {
        const pending = Buffer.concat(this.buffered);
        this.buffered = [];
        onData(pending);
      }
      if (settled) return;

      if (this.socketError) {
        onError(this.socketError);
      } else if (this.peerEnded || this.current === 'closed' || this.socket.destroyed) {
        onEnd();
      }
    });
  }
}
