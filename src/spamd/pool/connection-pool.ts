import { Logger } from '@nestjs/common';
import {
  ConnectionError,
  PoolClosedError,
  PoolExhaustedError,
  abortReason,
} from '../errors/spamd.errors';
import { getErrorMessage } from '../../shared/error.utils';
import { SpamdConnection } from '../transport/spamd-connection';
import type { ConnectOptions, SpamdTlsOptions } from '../transport/spamd-connection';
import { formatAddress } from '../transport/spamd-address';
import type { SpamdAddress } from '../transport/spamd-address';
import { delay } from '../utils/deadline.utils';

/** What acquire() does when every slot is taken */
export type PoolOverflow = 'queue' | 'fail';

export type Connector = (address: SpamdAddress, options: ConnectOptions) => Promise<SpamdConnection>;

export interface ConnectionPoolOptions {
  address: SpamdAddress;
  maxConnections: number;
  overflow: PoolOverflow;
  connectTimeoutMs: number;
  /** Extra connect attempts after a ConnectionError */
  connectRetries: number;
  /** Backoff before the first retry, doubled for each further one */
  retryDelayMs: number;
  idleTimeoutMs: number;
  tls?: SpamdTlsOptions;
  connector?: Connector;
}

export interface PoolStats {
  idle: number;
  inUse: number;
  opening: number;
  waiting: number;
}

interface Waiter {
  resolve(connection: SpamdConnection): void;
  reject(error: unknown): void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Bounded set of connections to one spamd address.
 *
 * Pool state only changes synchronously, and a slot is reserved (`opening`) before the first await,
 * so concurrent acquires never exceed maxConnections or share a connection.
 */
export class ConnectionPool {
  private readonly logger = new Logger(ConnectionPool.name);
  private readonly connector: Connector;
  private readonly label: string;
  /** Most recently parked last */
  private idle: SpamdConnection[] = [];
  private readonly inUse = new Set<SpamdConnection>();
  private readonly idleTimers = new Map<SpamdConnection, NodeJS.Timeout>();
  private waiters: Waiter[] = [];
  private opening = 0;
  private closed = false;

  constructor(private readonly options: ConnectionPoolOptions) {
    this.connector = options.connector ?? ((address, connectOptions) => SpamdConnection.connect(address, connectOptions));
    this.label = formatAddress(options.address);
  }

  get address(): SpamdAddress {
    return this.options.address;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Hands out an exclusive connection: the most recently idled one, a new one while below
   * maxConnections, or (in queue mode) the next one released.
   *
   * @throws PoolClosedError, PoolExhaustedError (fail mode), ConnectionError once retries run out,
   *   or the signal's reason when it aborts
   */
  async acquire(signal?: AbortSignal): Promise<SpamdConnection> {
    if (this.closed) {
      throw new PoolClosedError(`Connection pool for ${this.label} is closed`, { address: this.label });
    }
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    this.pruneIdle();
    const parked = this.idle.pop();
    if (parked) {
      this.checkOut(parked);
      return parked;
    }

    if (this.size() < this.options.maxConnections) {
      return this.open(signal);
    }

    if (this.options.overflow === 'fail') {
      throw new PoolExhaustedError(
        `All ${this.options.maxConnections} connections to ${this.label} are in use`,
        { address: this.label },
      );
    }
    return this.enqueue(signal);
  }

  /**
   * Returns a connection. A reusable, healthy connection goes to the oldest waiter or is parked;
   * anything else is closed. Unknown or already released connections are ignored.
   */
  release(connection: SpamdConnection, reusable: boolean): void {
    if (!this.inUse.delete(connection)) return;

    if (reusable && !this.closed && connection.isReusable()) {
      const waiter = this.waiters.shift();
      if (waiter) {
        this.detach(waiter);
        this.inUse.add(connection);
        connection.markInUse();
        waiter.resolve(connection);
        return;
      }

      connection.markIdle();
      if (connection.state === 'idle') {
        this.park(connection);
        return;
      }
    } else {
      connection.close();
    }

    this.dispatch();
  }

  /**
   * Closes idle connections and rejects waiters. In-use connections are closed when released.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const connection of this.idle) {
      this.clearIdleTimer(connection);
      connection.close();
    }
    this.idle = [];

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      this.detach(waiter);
      waiter.reject(new PoolClosedError(`Connection pool for ${this.label} was closed`, { address: this.label }));
    }
  }

  stats(): PoolStats {
    return {
      idle: this.idle.length,
      inUse: this.inUse.size,
      opening: this.opening,
      waiting: this.waiters.length,
    };
  }

  private size(): number {
    return this.opening + this.inUse.size + this.idle.length;
  }

  private async open(signal: AbortSignal | undefined): Promise<SpamdConnection> {
    this.opening++;
    let connection: SpamdConnection;
    try {
      connection = await this.connectWithRetry(signal);
    } catch (error) {
      this.opening--;
      this.dispatch();
      throw error;
    }
    this.opening--;

    if (this.closed) {
      connection.close();
      throw new PoolClosedError(`Connection pool for ${this.label} was closed`, { address: this.label });
    }

    connection.markInUse();
    this.inUse.add(connection);
    return connection;
  }

  private async connectWithRetry(signal: AbortSignal | undefined): Promise<SpamdConnection> {
    const { address, connectTimeoutMs, connectRetries, retryDelayMs, tls } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.connector(address, { timeoutMs: connectTimeoutMs, signal, tls });
      } catch (error) {
        if (!(error instanceof ConnectionError) || attempt >= connectRetries) throw error;

        const wait = retryDelayMs * 2 ** attempt;
        this.logger.warn(
          `Connect attempt ${attempt + 1} to ${this.label} failed (${getErrorMessage(error)}), retrying in ${wait}ms`,
        );
        await delay(wait, signal);
      }
    }
  }

  private enqueue(signal: AbortSignal | undefined): Promise<SpamdConnection> {
    return new Promise((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = () => {
          this.waiters = this.waiters.filter((entry) => entry !== waiter);
          reject(abortReason(signal));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.waiters.push(waiter);
    });
  }

  /**
   * Opens connections for waiters while there is room, after a slot was freed.
   */
  private dispatch(): void {
    while (!this.closed && this.waiters.length > 0 && this.size() < this.options.maxConnections) {
      const waiter = this.waiters.shift();
      if (!waiter) return;
      this.detach(waiter);
      this.open(waiter.signal).then(waiter.resolve, waiter.reject);
    }
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }

  private checkOut(connection: SpamdConnection): void {
    this.clearIdleTimer(connection);
    connection.markInUse();
    this.inUse.add(connection);
  }

  private park(connection: SpamdConnection): void {
    this.idle.push(connection);
    const timer = setTimeout(() => this.evict(connection), this.options.idleTimeoutMs);
    timer.unref();
    this.idleTimers.set(connection, timer);
  }

  private evict(connection: SpamdConnection): void {
    this.idleTimers.delete(connection);
    if (!this.idle.includes(connection)) return;

    this.idle = this.idle.filter((entry) => entry !== connection);
    this.logger.debug(`Evicting idle connection #${connection.id} to ${this.label}`);
    connection.close();
    this.dispatch();
  }

  private pruneIdle(): void {
    const now = Date.now();
    const expired = this.idle.filter(
      (connection) => !connection.isReusable() || now - connection.idleSince >= this.options.idleTimeoutMs,
    );
    if (expired.length === 0) return;

    for (const connection of expired) {
      this.clearIdleTimer(connection);
      connection.close();
    }
    this.idle = this.idle.filter((connection) => !expired.includes(connection));
  }

  private clearIdleTimer(connection: SpamdConnection): void {
    const timer = this.idleTimers.get(connection);
    if (timer) {
      clearTimeout(timer);
      this.idleTimers.delete(connection);
    }
  }
}
