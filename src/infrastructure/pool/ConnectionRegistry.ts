/**
 * Connection Registry
 *
 * Maps each destination to its own pool, lazily created, while every pool
 * draws from one shared capacity counter. Owns the reaper that sheds idle
 * and dead connections in the background.
 */

import { Client } from 'undici';
import { PoolConfig, resolvePoolConfig } from '../../config/poolConfig';
import { PoolClosedError } from '../../domain/shared/DomainError';
import { ConnectionWork, Transport, TransportHandle } from '../../domain/transport/ITransport';
import { UndiciTransport } from '../transport/UndiciTransport';
import { DestinationPool, PoolStats } from './DestinationPool';
import { Clock, PooledConnection } from './PooledConnection';
import { Reaper, ReapReport } from './Reaper';
import { SharedCapacityCounter } from './SharedCapacityCounter';

export type PoolEvent =
  | 'pool_created'
  | 'pool_removed'
  | 'connection_created'
  | 'connection_discarded'
  | 'connection_reaped'
  | 'checkout_timeout';

export interface PoolEventData {
  destination: string;
  liveConnections: number;
}

export type PoolEventHandler = (data: PoolEventData) => void;

export interface ConnectionRegistryOptions<H extends TransportHandle> {
  transport: Transport<H>;
  config?: Partial<PoolConfig>;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
}

export interface RegistryStats {
  liveConnections: number;
  maxConnections: number;
  pools: PoolStats[];
}

export class ConnectionRegistry<H extends TransportHandle> {
  private static currentRegistry?: ConnectionRegistry<Client>;

  private readonly pools: Map<string, DestinationPool<H>> = new Map();
  private readonly capacity: SharedCapacityCounter;
  private readonly reaper: Reaper<H>;
  private readonly transport: Transport<H>;
  private readonly config: PoolConfig;
  private readonly clock?: Clock;
  private readonly eventHandlers: Map<PoolEvent, PoolEventHandler[]> = new Map();
  private isShutdown = false;

  /**
   * Process-wide registry over the undici transport, built on first access
   * with configuration read from the environment. Building it starts the
   * reaper.
   */
  static current(): ConnectionRegistry<Client> {
    if (!ConnectionRegistry.currentRegistry) {
      ConnectionRegistry.currentRegistry = new ConnectionRegistry<Client>({
        transport: new UndiciTransport(),
      });
    }
    return ConnectionRegistry.currentRegistry;
  }

  /**
   * Shut down and forget the process-wide registry; the next `current()`
   * builds a new one.
   */
  static async resetCurrent(): Promise<void> {
    const registry = ConnectionRegistry.currentRegistry;
    ConnectionRegistry.currentRegistry = undefined;
    if (registry) {
      await registry.shutdown();
    }
  }

  constructor(options: ConnectionRegistryOptions<H>) {
    this.transport = options.transport;
    this.config = resolvePoolConfig(options.config, options.env);
    this.clock = options.clock;
    this.capacity = new SharedCapacityCounter(this.config.maxConnections);

    this.reaper = new Reaper<H>(
      {
        poolEntries: () => Array.from(this.pools.entries()),
        removePool: (destination, pool) => this.removePool(destination, pool),
      },
      {
        intervalMs: this.config.reapIntervalMs,
        idleTimeoutMs: this.config.idleTimeoutMs,
        onConnectionReaped: destination => this.emitEvent('connection_reaped', destination),
      }
    );
    this.reaper.start();
  }

  /**
   * Run `work` with a live handle to `destination`, waiting for capacity if
   * the global cap is reached. Errors from `work` or the transport reach the
   * caller once the connection has applied its reconnect rule.
   */
  async with<R>(destination: string, work: ConnectionWork<H, R>): Promise<R> {
    if (this.isShutdown) {
      throw new PoolClosedError();
    }
    return this.poolFor(destination).withConnection(connection => connection.use(work));
  }

  /**
   * Run a reap sweep now.
   */
  flush(): Promise<ReapReport> {
    return this.reaper.sweep();
  }

  size(): number {
    return this.capacity.value;
  }

  getConfig(): PoolConfig {
    return { ...this.config };
  }

  isReaperRunning(): boolean {
    return this.reaper.isRunning();
  }

  hasPool(destination: string): boolean {
    return this.pools.has(destination);
  }

  getPool(destination: string): DestinationPool<H> | undefined {
    return this.pools.get(destination);
  }

  getStats(): RegistryStats {
    return {
      liveConnections: this.capacity.value,
      maxConnections: this.capacity.capacity,
      pools: Array.from(this.pools.values()).map(pool => pool.getStats()),
    };
  }

  /**
   * Stop the reaper and close every pool. Pending checkouts and later calls
   * fail with PoolClosedError.
   */
  async shutdown(): Promise<void> {
    if (this.isShutdown) {
      return;
    }
    this.isShutdown = true;
    this.reaper.stop();

    const pools = Array.from(this.pools.values());
    this.pools.clear();
    await Promise.all(pools.map(pool => pool.close()));
  }

  onPoolEvent(event: PoolEvent, handler: PoolEventHandler): void {
    const handlers = this.eventHandlers.get(event) ?? [];
    handlers.push(handler);
    this.eventHandlers.set(event, handlers);
  }

  offPoolEvent(event: PoolEvent, handler: PoolEventHandler): void {
    const handlers = this.eventHandlers.get(event);
    if (handlers) {
      const index = handlers.indexOf(handler);
      if (index > -1) {
        handlers.splice(index, 1);
      }
    }
  }

  private poolFor(destination: string): DestinationPool<H> {
    const existing = this.pools.get(destination);
    if (existing) {
      return existing;
    }

    const pool = new DestinationPool<H>(
      destination,
      this.capacity,
      key => this.createConnection(key),
      {
        waitTimeoutMs: this.config.waitTimeoutMs,
        onCheckoutTimeout: key => this.emitEvent('checkout_timeout', key),
        onConnectionDiscarded: key => this.emitEvent('connection_discarded', key),
      }
    );
    this.pools.set(destination, pool);
    this.emitEvent('pool_created', destination);
    return pool;
  }

  private createConnection(destination: string): PooledConnection<H> {
    const connection = new PooledConnection<H>(destination, this.transport, {
      idleTimeoutMs: this.config.idleTimeoutMs,
      clock: this.clock,
    });
    this.emitEvent('connection_created', destination);
    return connection;
  }

  private removePool(destination: string, pool: DestinationPool<H>): boolean {
    // Only the pool that was swept; a newer one may have replaced it
    if (this.pools.get(destination) !== pool) {
      return false;
    }
    this.pools.delete(destination);
    this.emitEvent('pool_removed', destination);
    return true;
  }

  private emitEvent(event: PoolEvent, destination: string): void {
    const handlers = this.eventHandlers.get(event);
    if (!handlers) {
      return;
    }

    const data: PoolEventData = { destination, liveConnections: this.capacity.value };
    for (const handler of handlers) {
      try {
        handler(data);
      } catch (error) {
        console.error(`Error in pool event handler for ${event}:`, error);
      }
    }
  }
}
