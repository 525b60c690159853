/**
 * Destination Pool
 *
 * Bounded, blocking multiplexer of connections for a single destination.
 * New connections are only created after reserving a slot in the counter
 * shared by every pool; when none can be reserved the caller waits up to
 * `waitTimeoutMs` for a check-in here or a slot released anywhere.
 */

import { ConnectionPoolExhaustedError, PoolClosedError } from '../../domain/shared/DomainError';
import { TransportHandle } from '../../domain/transport/ITransport';
import { PooledConnection } from './PooledConnection';
import { SharedCapacityCounter } from './SharedCapacityCounter';

export interface DestinationPoolOptions {
  waitTimeoutMs: number;
  onCheckoutTimeout?: (destination: string) => void;
  onConnectionDiscarded?: (destination: string) => void;
}

export interface PoolStats {
  destination: string;
  total: number;
  idle: number;
  checkedOut: number;
  waiting: number;
}

export type ConnectionFactory<H extends TransportHandle> = (destination: string) => PooledConnection<H>;

interface Waiter<H extends TransportHandle> {
  resolve: (connection: PooledConnection<H>) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class DestinationPool<H extends TransportHandle> {
  private readonly all: Set<PooledConnection<H>> = new Set();
  private readonly idle: PooledConnection<H>[] = [];
  private readonly checkedOut: Set<PooledConnection<H>> = new Set();
  private readonly waiters: Waiter<H>[] = [];
  private unsubscribeRelease?: () => void;
  private closed = false;

  constructor(
    readonly destination: string,
    private readonly capacity: SharedCapacityCounter,
    private readonly factory: ConnectionFactory<H>,
    private readonly options: DestinationPoolOptions
  ) {}

  /**
   * Check out a connection, hand it to `work` and check it back in, whether
   * `work` resolves or throws.
   */
  async withConnection<R>(work: (connection: PooledConnection<H>) => Promise<R>): Promise<R> {
    const connection = await this.checkout();
    try {
      return await work(connection);
    } finally {
      await this.checkin(connection);
    }
  }

  checkout(): Promise<PooledConnection<H>> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError(this.destination));
    }

    // Earlier waiters go first
    if (this.waiters.length === 0) {
      const connection = this.tryCheckout();
      if (connection) {
        return Promise.resolve(connection);
      }
    }

    return new Promise<PooledConnection<H>>((resolve, reject) => {
      const waiter: Waiter<H> = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.removeWaiter(waiter);
          this.options.onCheckoutTimeout?.(this.destination);
          reject(new ConnectionPoolExhaustedError(
            this.destination,
            this.options.waitTimeoutMs,
            this.capacity.capacity,
            this.capacity.value
          ));
        }, this.options.waitTimeoutMs),
      };

      this.waiters.push(waiter);
      this.subscribeToReleases();
    });
  }

  async checkin(connection: PooledConnection<H>): Promise<void> {
    if (!this.checkedOut.delete(connection)) {
      return;
    }

    if (connection.dead || this.closed) {
      this.detach(connection);
      if (connection.dead) {
        this.options.onConnectionDiscarded?.(this.destination);
      }
      try {
        await connection.close();
      } catch (error) {
        // Reported rather than thrown so it cannot replace the caller's outcome
        console.error(`Failed to close connection to ${this.destination} on check-in:`, error);
      }
      return;
    }

    this.idle.push(connection);
    this.admitWaiters();
  }

  /**
   * Snapshot of every connection currently owned by this pool. Safe to
   * iterate while checkouts and check-ins continue.
   */
  connections(): PooledConnection<H>[] {
    return Array.from(this.all);
  }

  isCheckedOut(connection: PooledConnection<H>): boolean {
    return this.checkedOut.has(connection);
  }

  /**
   * Remove an idle connection and release its capacity slot. Closing it is
   * left to the caller. Returns false when the connection is not owned by
   * this pool or is currently checked out.
   */
  remove(connection: PooledConnection<H>): boolean {
    if (!this.all.has(connection) || this.checkedOut.has(connection)) {
      return false;
    }
    this.detach(connection);
    return true;
  }

  isEmpty(): boolean {
    return this.all.size === 0;
  }

  hasWaiters(): boolean {
    return this.waiters.length > 0;
  }

  get size(): number {
    return this.all.size;
  }

  getStats(): PoolStats {
    return {
      destination: this.destination,
      total: this.all.size,
      idle: this.idle.length,
      checkedOut: this.checkedOut.size,
      waiting: this.waiters.length,
    };
  }

  /**
   * Stop admitting checkouts, fail every waiter and close idle connections.
   * Checked-out connections are closed when they come back.
   */
  async close(): Promise<void> {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new PoolClosedError(this.destination));
    }
    this.unsubscribeFromReleases();

    const idle = this.idle.splice(0);
    for (const connection of idle) {
      this.detach(connection);
    }
    await Promise.all(idle.map(connection => connection.close()));
  }

  private tryCheckout(): PooledConnection<H> | undefined {
    if (this.closed) {
      return undefined;
    }

    // Dead connections never reach the idle stack; see checkin
    let connection = this.idle.pop();
    if (!connection) {
      if (!this.capacity.tryReserve()) {
        return undefined;
      }
      connection = this.factory(this.destination);
      this.all.add(connection);
    }

    this.checkedOut.add(connection);
    return connection;
  }

  private admitWaiters(): void {
    let waiter: Waiter<H> | undefined = this.waiters[0];
    while (waiter) {
      const connection = this.tryCheckout();
      if (!connection) {
        break;
      }
      this.waiters.shift();
      clearTimeout(waiter.timer);
      waiter.resolve(connection);
      waiter = this.waiters[0];
    }

    if (this.waiters.length === 0) {
      this.unsubscribeFromReleases();
    }
  }

  private detach(connection: PooledConnection<H>): void {
    if (!this.all.delete(connection)) {
      return;
    }
    const index = this.idle.indexOf(connection);
    if (index > -1) {
      this.idle.splice(index, 1);
    }
    this.checkedOut.delete(connection);
    this.capacity.release();
  }

  private removeWaiter(waiter: Waiter<H>): void {
    const index = this.waiters.indexOf(waiter);
    if (index > -1) {
      this.waiters.splice(index, 1);
    }
    if (this.waiters.length === 0) {
      this.unsubscribeFromReleases();
    }
  }

  private subscribeToReleases(): void {
    if (!this.unsubscribeRelease) {
      this.unsubscribeRelease = this.capacity.onRelease(() => this.admitWaiters());
    }
  }

  private unsubscribeFromReleases(): void {
    if (this.unsubscribeRelease) {
      this.unsubscribeRelease();
      this.unsubscribeRelease = undefined;
    }
  }
}
