/**
 * Pooled Connection
 *
 * Wraps one transport handle to one destination and tracks its usage and
 * health. Each attempt at running caller work is turned into an explicit
 * outcome, and a connection that has worked before gets a single reconnect
 * when the peer resets it.
 */

import { ConnectionBusyError, ConnectionDeadError } from '../../domain/shared/DomainError';
import { ConnectionWork, Transport, TransportHandle } from '../../domain/transport/ITransport';

export const MAX_RESET_RETRIES = 1;

export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

export type AttemptOutcome<R> =
  | { kind: 'ok'; value: R }
  | { kind: 'reset'; error: unknown }
  | { kind: 'fatal'; error: unknown };

export interface PooledConnectionOptions {
  idleTimeoutMs: number;
  clock?: Clock;
}

export class PooledConnection<H extends TransportHandle> {
  readonly createdAt: number;
  private handle: H | null = null;
  private _lastUsedAt: number | null = null;
  private _inUse = false;
  private _dead = false;
  private _fresh = true;
  private readonly clock: Clock;
  private readonly idleTimeoutMs: number;

  constructor(
    readonly destination: string,
    private readonly transport: Transport<H>,
    options: PooledConnectionOptions
  ) {
    this.clock = options.clock ?? monotonicClock;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.createdAt = this.clock();
  }

  get lastUsedAt(): number | null {
    return this._lastUsedAt;
  }

  get inUse(): boolean {
    return this._inUse;
  }

  get dead(): boolean {
    return this._dead;
  }

  get fresh(): boolean {
    return this._fresh;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  /**
   * Run `work` against this connection's handle.
   *
   * A connection-reset on a connection that has been used before closes the
   * handle, opens a new one and runs `work` once more. Any other failure
   * closes the handle and marks the connection dead. Errors reach the caller
   * unchanged.
   */
  async use<R>(work: ConnectionWork<H, R>): Promise<R> {
    if (this._dead) {
      throw new ConnectionDeadError(this.destination);
    }
    if (this._inUse) {
      throw new ConnectionBusyError(this.destination);
    }

    this._lastUsedAt = this.clock();
    this._inUse = true;

    try {
      let retries = 0;

      for (;;) {
        const outcome = await this.attempt(work);
        if (outcome.kind === 'ok') {
          return outcome.value;
        }

        await this.discardHandle();

        if (outcome.kind === 'fatal') {
          this._dead = true;
          throw outcome.error;
        }

        if (this._fresh || retries >= MAX_RESET_RETRIES) {
          throw outcome.error;
        }

        retries++;
      }
    } finally {
      this._fresh = false;
      this._inUse = false;
    }
  }

  idleTimeMs(): number {
    return this.clock() - (this._lastUsedAt ?? this.createdAt);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;
    await handle.close();
  }

  // The caller gets the work error, so a failing close is only reported
  private async discardHandle(): Promise<void> {
    try {
      await this.close();
    } catch (error) {
      console.warn(`Failed to close connection to ${this.destination}:`, error);
    }
  }

  private async attempt<R>(work: ConnectionWork<H, R>): Promise<AttemptOutcome<R>> {
    let handle: H;
    try {
      handle = await this.acquireHandle();
    } catch (error) {
      // Open failures are fatal
      return { kind: 'fatal', error };
    }

    try {
      return { kind: 'ok', value: await work(handle) };
    } catch (error) {
      return this.transport.isConnectionReset(error)
        ? { kind: 'reset', error }
        : { kind: 'fatal', error };
    }
  }

  private async acquireHandle(): Promise<H> {
    if (this.handle) {
      return this.handle;
    }
    const handle = await this.transport.open(this.destination, this.idleTimeoutMs);
    this.handle = handle;
    return handle;
  }
}
