/**
 * Reaper
 *
 * Periodically sweeps every destination pool, closing connections that are
 * dead or have sat idle past the threshold, then drops pools left empty.
 * Pools are only removed after the whole walk, never while iterating.
 */

import { TransportHandle } from '../../domain/transport/ITransport';
import { DestinationPool } from './DestinationPool';
import { PooledConnection } from './PooledConnection';

export interface ReaperConfig {
  intervalMs: number;
  idleTimeoutMs: number;
  onConnectionReaped?: (destination: string) => void;
}

export interface ReapablePools<H extends TransportHandle> {
  poolEntries(): Array<[string, DestinationPool<H>]>;
  removePool(destination: string, pool: DestinationPool<H>): boolean;
}

export interface ReapReport {
  reaped: number;
  removedPools: string[];
}

export class Reaper<H extends TransportHandle> {
  private intervalHandle?: ReturnType<typeof setInterval>;
  private sweeping = false;

  constructor(
    private readonly pools: ReapablePools<H>,
    private readonly config: ReaperConfig
  ) {}

  /**
   * Start the background sweep. A non-positive interval leaves the reaper
   * disabled.
   */
  start(): void {
    if (this.intervalHandle || !(this.config.intervalMs > 0)) return;

    this.intervalHandle = setInterval(() => {
      void this.runScheduledSweep();
    }, this.config.intervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
    }
  }

  isRunning(): boolean {
    return this.intervalHandle !== undefined;
  }

  async sweep(): Promise<ReapReport> {
    const emptied: Array<[string, DestinationPool<H>]> = [];
    let reaped = 0;

    for (const [destination, pool] of this.pools.poolEntries()) {
      // Select and detach in one synchronous pass, close afterwards
      const detached = pool
        .connections()
        .filter(connection => this.isReapable(pool, connection))
        .filter(connection => pool.remove(connection));

      const closes = await Promise.allSettled(detached.map(connection => connection.close()));
      closes.forEach(outcome => {
        if (outcome.status === 'rejected') {
          console.error(`Failed to close reaped connection to ${destination}:`, outcome.reason);
        }
        this.config.onConnectionReaped?.(destination);
      });
      reaped += detached.length;

      if (pool.isEmpty() && !pool.hasWaiters()) {
        emptied.push([destination, pool]);
      }
    }

    const removedPools: string[] = [];
    for (const [destination, pool] of emptied) {
      // A caller may have checked out from the pool while closes were pending
      if (pool.isEmpty() && !pool.hasWaiters() && this.pools.removePool(destination, pool)) {
        removedPools.push(destination);
      }
    }

    return { reaped, removedPools };
  }

  private isReapable(pool: DestinationPool<H>, connection: PooledConnection<H>): boolean {
    if (connection.inUse || pool.isCheckedOut(connection)) {
      return false;
    }
    return connection.dead || connection.idleTimeMs() >= this.config.idleTimeoutMs;
  }

  private async runScheduledSweep(): Promise<void> {
    if (this.sweeping) return;

    this.sweeping = true;
    try {
      await this.sweep();
    } catch (error) {
      console.error('Connection reap sweep failed:', error);
    } finally {
      this.sweeping = false;
    }
  }
}
