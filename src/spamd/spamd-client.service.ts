import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit, Optional } from '@nestjs/common';
import { encodeRequest } from './codec/message-encoder';
import { ResponseDecoder } from './codec/message-decoder';
import { SPAMD_HEADERS } from './constants/header-names.constant';
import { SpamdStatus } from './constants/status-codes.constant';
import {
  DaemonError,
  InvalidRequestError,
  MalformedHeaderError,
  UnexpectedEofError,
  WriteError,
  isSpamdError,
} from './errors/spamd.errors';
import { formatActionOption, parseActionOption, parseSpamValue } from './message/header-values';
import type { ActionOption, SpamVerdict } from './message/header-values';
import { newRequest } from './message/request';
import type { MessageBody, SpamdRequest } from './message/request';
import type { SpamdResponse } from './message/response';
import { SpamdCommand } from './message/spamd-command';
import { SpamdHeaders } from './message/spamd-headers';
import { ConnectionPool } from './pool/connection-pool';
import type { Connector, PoolStats } from './pool/connection-pool';
import { formatAddress, parseAddress } from './transport/spamd-address';
import type { SpamdAddress } from './transport/spamd-address';
import type { SpamdConnection } from './transport/spamd-connection';
import { createDeadline } from './utils/deadline.utils';
import { SPAMD_CONFIG, SPAMD_CONNECTOR } from './spamd.tokens';
import type { SpamdConfig } from '../config/config.types';
import type {
  AcquireOptions,
  CommandOptions,
  ExecuteOptions,
  HeadersOnlyResult,
  LearnType,
  PingResult,
  ProcessResult,
  ReportIfSpamResult,
  ReportResult,
  SpamCheckResult,
  SymbolsResult,
  TellOptions,
  TellResult,
} from './interfaces/spamd-client.interface';
import { getErrorMessage } from '../shared/error.utils';

/**
 * Client for SpamAssassin's spamd.
 *
 * Every call is one exchange on an exclusively owned connection, bounded by a single deadline.
 * Transport and protocol failures close the connection and surface as typed SpamdErrors.
 * The only resend is on a reused connection that spamd had already closed, before any response byte.
 */
@Injectable()
export class SpamdClientService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SpamdClientService.name);
  private readonly pools = new Map<string, ConnectionPool>();

  constructor(
    @Inject(SPAMD_CONFIG) private readonly config: SpamdConfig,
    @Optional() @Inject(SPAMD_CONNECTOR) private readonly connector?: Connector,
  ) {}

  onModuleInit(): void {
    this.logger.log(
      `spamd client targeting ${formatAddress(this.config.address)}${this.config.tls ? ' over TLS' : ''} ` +
        `(protocol=${this.config.protocolVersion} maxConnections=${this.config.maxConnections} ` +
        `overflow=${this.config.poolOverflow} keepAlive=${this.config.keepAlive})`,
    );
  }

  onModuleDestroy(): void {
    for (const pool of this.pools.values()) {
      pool.close();
    }
    this.pools.clear();
  }

  /**
   * Sends a request and waits for its response.
   *
   * @throws DaemonError when spamd answers with a status other than EX_OK
   * @throws SpamdError subclasses for encoding, pool, transport and framing failures
   */
  async execute(request: SpamdRequest, options: ExecuteOptions = {}): Promise<SpamdResponse> {
    const address = this.resolveAddress(options.address);
    const label = formatAddress(address);
    const context = { command: request.command, address: label };

    // Encoding errors surface before any connection is touched
    let bytes: Buffer;
    try {
      bytes = encodeRequest(request);
    } catch (error) {
      if (isSpamdError(error)) error.annotate(context);
      throw error;
    }

    const pool = this.poolFor(address);
    const startTime = Date.now();
    const deadline = createDeadline(
      options.timeoutMs ?? this.config.timeout,
      options.signal,
      (ms) => `${request.command} to ${label} timed out after ${ms}ms`,
    );

    try {
      const response = await this.exchange(pool, request.command, bytes, deadline.signal);

      this.logger.debug(
        `${request.command} to ${label}: ${response.statusCode} ${response.statusMessage} ` +
          `body=${response.body?.length ?? 0}B time=${Date.now() - startTime}ms`,
      );

      if (response.statusCode !== SpamdStatus.EX_OK) {
        throw new DaemonError(response, context);
      }
      return response;
    } catch (error) {
      if (isSpamdError(error)) error.annotate(context);

      this.logger.warn(
        `${request.command} to ${label} failed: ${getErrorMessage(error)} (after ${Date.now() - startTime}ms)`,
      );
      throw error;
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Takes a connection out of the pool for manual exchanges. Hand it back with releaseConnection().
   */
  acquireConnection(options: AcquireOptions = {}): Promise<SpamdConnection> {
    return this.poolFor(this.resolveAddress(options.address)).acquire(options.signal);
  }

  /**
   * Returns a connection from acquireConnection(). It is only pooled again when keep-alive is on,
   * `reusable` is not false and the connection is still healthy.
   */
  releaseConnection(connection: SpamdConnection, reusable = true): void {
    const pool = this.pools.get(connection.label);
    if (!pool) {
      connection.close();
      return;
    }
    pool.release(connection, reusable && this.config.keepAlive);
  }

  /** Pool counters for an address (default: the configured one), or undefined before its first use. */
  poolStats(address?: SpamdAddress | string): PoolStats | undefined {
    return this.pools.get(formatAddress(this.resolveAddress(address)))?.stats();
  }

  /** Scores a message. */
  async check(message: MessageBody, options: CommandOptions = {}): Promise<SpamCheckResult> {
    const response = await this.runCommand(SpamdCommand.CHECK, message, options);
    return { ...response, ...this.requireVerdict(response, SpamdCommand.CHECK) };
  }

  /** Scores a message and lists the rules that matched. */
  async symbols(message: MessageBody, options: CommandOptions = {}): Promise<SymbolsResult> {
    const response = await this.runCommand(SpamdCommand.SYMBOLS, message, options);
    const symbols = bodyText(response)
      .split(',')
      .map((symbol) => symbol.trim())
      .filter((symbol) => symbol.length > 0);

    return { ...response, ...this.requireVerdict(response, SpamdCommand.SYMBOLS), symbols };
  }

  /** Scores a message and returns the textual report. */
  async report(message: MessageBody, options: CommandOptions = {}): Promise<ReportResult> {
    const response = await this.runCommand(SpamdCommand.REPORT, message, options);
    return { ...response, ...this.requireVerdict(response, SpamdCommand.REPORT), report: bodyText(response) };
  }

  /** Scores a message and returns the report only when it is spam. */
  async reportIfSpam(message: MessageBody, options: CommandOptions = {}): Promise<ReportIfSpamResult> {
    const response = await this.runCommand(SpamdCommand.REPORT_IFSPAM, message, options);
    const verdict = this.requireVerdict(response, SpamdCommand.REPORT_IFSPAM);
    const report = verdict.isSpam && response.body !== undefined ? bodyText(response) : undefined;

    return { ...response, ...verdict, report };
  }

  /** Returns the message as rewritten by spamd. */
  async process(message: MessageBody, options: CommandOptions = {}): Promise<ProcessResult> {
    const response = await this.runCommand(SpamdCommand.PROCESS, message, options);
    return {
      ...response,
      ...this.requireVerdict(response, SpamdCommand.PROCESS),
      message: response.body ?? Buffer.alloc(0),
    };
  }

  /** Returns only the rewritten headers of the message. */
  async headersOnly(message: MessageBody, options: CommandOptions = {}): Promise<HeadersOnlyResult> {
    const response = await this.runCommand(SpamdCommand.HEADERS, message, options);
    return {
      ...response,
      ...this.requireVerdict(response, SpamdCommand.HEADERS),
      messageHeaders: bodyText(response),
    };
  }

  async ping(options: ExecuteOptions = {}): Promise<PingResult> {
    const response = await this.runCommand(SpamdCommand.PING, undefined, options);
    return { ...response, pong: response.statusMessage.trim().toUpperCase() === 'PONG' };
  }

  /**
   * Trains the filter: `spam` and `ham` learn the message, `forget` removes it.
   *
   * @throws InvalidRequestError when no destination is selected
   */
  async tell(message: MessageBody, learnType: LearnType, options: TellOptions = {}): Promise<TellResult> {
    const destinations = formatActionOption({
      local: options.destinations?.local ?? true,
      remote: options.destinations?.remote ?? false,
    });
    if (destinations === undefined) {
      throw new InvalidRequestError('TELL needs a local or remote destination', { command: SpamdCommand.TELL });
    }

    const headers: Array<[string, string]> =
      learnType === 'forget'
        ? [[SPAMD_HEADERS.REMOVE, destinations]]
        : [
            [SPAMD_HEADERS.MESSAGE_CLASS, learnType],
            [SPAMD_HEADERS.SET, destinations],
          ];
    const response = await this.runCommand(SpamdCommand.TELL, message, options, headers);

    return {
      ...response,
      didSet: readActionHeader(response, SPAMD_HEADERS.DID_SET),
      didRemove: readActionHeader(response, SPAMD_HEADERS.DID_REMOVE),
    };
  }

  private runCommand(
    command: SpamdCommand,
    message: MessageBody | undefined,
    options: CommandOptions,
    extraHeaders: Array<[string, string]> = [],
  ): Promise<SpamdResponse> {
    const headers = new SpamdHeaders();
    const user = options.user ?? this.config.user;
    if (user !== undefined && command !== SpamdCommand.PING) {
      headers.append(SPAMD_HEADERS.USER, user);
    }
    for (const [name, value] of extraHeaders) {
      headers.append(name, value);
    }

    const request = newRequest(command, headers, message, {
      protocolVersion: this.config.protocolVersion,
      compress: message !== undefined && (options.compress ?? this.config.compress),
    });
    return this.execute(request, options);
  }

  /**
   * One request/response round trip on a pooled connection.
   *
   * spamd may close a kept-alive connection right after answering, so a reused connection can
   * fail before a single response byte arrives. The request never reached spamd in that case
   * and is sent again on another connection until the deadline; any other failure propagates.
   */
  private async exchange(
    pool: ConnectionPool,
    command: SpamdCommand,
    bytes: Buffer,
    signal: AbortSignal,
  ): Promise<SpamdResponse> {
    for (;;) {
      const connection = await pool.acquire(signal);
      const reused = connection.exchangeCount > 0;
      const decoder = new ResponseDecoder({
        command,
        maxHeaderBytes: this.config.maxHeaderSize,
        maxBodyBytes: this.config.maxBodySize,
      });

      let response: SpamdResponse;
      try {
        await connection.send(bytes, { signal });
        response = await connection.receive(decoder, { signal });
      } catch (error) {
        pool.release(connection, false);
        if (reused && isStaleConnectionFailure(error, decoder)) {
          this.logger.debug(
            `Connection #${connection.id} to ${connection.label} was closed by spamd, resending ${command}`,
          );
          continue;
        }
        throw error;
      }

      pool.release(connection, this.config.keepAlive && !decoder.completedByEof && decoder.surplusBytes === 0);
      return response;
    }
  }

  private requireVerdict(response: SpamdResponse, command: SpamdCommand): SpamVerdict {
    const raw = response.headers.get(SPAMD_HEADERS.SPAM);
    const verdict = raw === undefined ? undefined : parseSpamValue(raw);
    if (!verdict) {
      throw new MalformedHeaderError(
        raw === undefined ? 'Response has no Spam header' : `Unparseable Spam header "${raw}"`,
        { command },
      );
    }
    return verdict;
  }

  private resolveAddress(address: SpamdAddress | string | undefined): SpamdAddress {
    if (address === undefined) return this.config.address;
    return typeof address === 'string' ? parseAddress(address) : address;
  }

  private poolFor(address: SpamdAddress): ConnectionPool {
    const key = formatAddress(address);
    let pool = this.pools.get(key);
    if (!pool) {
      pool = new ConnectionPool({
        address,
        maxConnections: this.config.maxConnections,
        overflow: this.config.poolOverflow,
        connectTimeoutMs: this.config.connectTimeout,
        connectRetries: this.config.connectRetries,
        retryDelayMs: this.config.retryDelay,
        idleTimeoutMs: this.config.idleTimeout,
        tls: this.config.tls,
        connector: this.connector,
      });
      this.pools.set(key, pool);
    }
    return pool;
  }
}

function isStaleConnectionFailure(error: unknown, decoder: ResponseDecoder): boolean {
  return error instanceof WriteError || (error instanceof UnexpectedEofError && decoder.bytesReceived === 0);
}

function bodyText(response: SpamdResponse): string {
  return response.body?.toString('utf-8') ?? '';
}

function readActionHeader(response: SpamdResponse, name: string): ActionOption {
  const raw = response.headers.get(name);
  return (raw === undefined ? undefined : parseActionOption(raw)) ?? { local: false, remote: false };
}
