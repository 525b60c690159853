/**
 * Connection Registry Tests
 *
 * Covers the shared global cap across destinations, checkout backpressure,
 * error propagation and shutdown.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConnectionRegistry } from '../../infrastructure/pool/ConnectionRegistry';
import { PoolConfig } from '../../config/poolConfig';
import { ConnectionPoolExhaustedError, PoolClosedError } from '../../domain/shared/DomainError';
import { FakeHandle, FakeResetError, FakeTransport, createDeferred } from '../support/FakeTransport';

const SITE_A = 'https://a.test';
const SITE_B = 'https://b.test';

describe('ConnectionRegistry', () => {
  let transport: FakeTransport;
  let registry: ConnectionRegistry<FakeHandle> | undefined;

  function createRegistry(config: Partial<PoolConfig>): ConnectionRegistry<FakeHandle> {
    return new ConnectionRegistry({
      transport,
      env: {},
      config: { reapIntervalMs: 0, ...config },
    });
  }

  beforeEach(() => {
    transport = new FakeTransport();
  });

  afterEach(async () => {
    await registry?.shutdown();
    registry = undefined;
    vi.useRealTimers();
  });

  describe('with', () => {
    it('should keep one idle connection per destination', async () => {
      registry = createRegistry({ maxConnections: 2 });

      await expect(registry.with(SITE_A, async handle => handle.destination)).resolves.toBe(SITE_A);
      await expect(registry.with(SITE_B, async handle => handle.destination)).resolves.toBe(SITE_B);

      expect(registry.size()).toBe(2);
      expect(registry.getStats()).toEqual({
        liveConnections: 2,
        maxConnections: 2,
        pools: [
          { destination: SITE_A, total: 1, idle: 1, checkedOut: 0, waiting: 0 },
          { destination: SITE_B, total: 1, idle: 1, checkedOut: 0, waiting: 0 },
        ],
      });
    });

    it('should reuse the warm connection for repeated calls', async () => {
      registry = createRegistry({ maxConnections: 4 });

      const first = await registry.with(SITE_A, async handle => handle.id);
      const second = await registry.with(SITE_A, async handle => handle.id);

      expect(second).toBe(first);
      expect(transport.opened).toHaveLength(1);
      expect(registry.size()).toBe(1);
    });

    it('should create a single pool for concurrent first calls', async () => {
      registry = createRegistry({ maxConnections: 4 });
      const created = vi.fn();
      registry.onPoolEvent('pool_created', created);

      await Promise.all([
        registry.with(SITE_A, async () => 1),
        registry.with(SITE_A, async () => 2),
        registry.with(SITE_A, async () => 3),
      ]);

      expect(created).toHaveBeenCalledTimes(1);
      expect(registry.getStats().pools).toHaveLength(1);
      expect(registry.size()).toBe(3);
    });

    it('should propagate work errors unchanged and discard the connection', async () => {
      registry = createRegistry({ maxConnections: 4 });
      const discarded = vi.fn();
      registry.onPoolEvent('connection_discarded', discarded);
      const failure = new TypeError('unexpected payload');

      await expect(registry.with(SITE_A, async () => {
        throw failure;
      })).rejects.toBe(failure);

      expect(registry.size()).toBe(0);
      expect(discarded).toHaveBeenCalledWith({ destination: SITE_A, liveConnections: 0 });
    });

    it('should not hand a dead connection out again', async () => {
      registry = createRegistry({ maxConnections: 4 });

      await expect(registry.with(SITE_A, async () => {
        throw new Error('fatal');
      })).rejects.toThrow('fatal');
      const id = await registry.with(SITE_A, async handle => handle.id);

      expect(id).toBe(2);
      expect(registry.size()).toBe(1);
    });

    it('should reconnect once when a warm connection is reset', async () => {
      registry = createRegistry({ maxConnections: 4 });
      await registry.with(SITE_A, async () => 'warm');

      let calls = 0;
      const result = await registry.with(SITE_A, async handle => {
        calls++;
        if (calls === 1) {
          throw new FakeResetError();
        }
        return handle.id;
      });

      expect(result).toBe(2);
      expect(registry.size()).toBe(1);
    });

    it('should keep a reset connection pooled when the first use fails', async () => {
      registry = createRegistry({ maxConnections: 4 });
      const reset = new FakeResetError();

      await expect(registry.with(SITE_A, async () => {
        throw reset;
      })).rejects.toBe(reset);

      expect(registry.size()).toBe(1);
      expect(registry.getPool(SITE_A)?.getStats().idle).toBe(1);
    });

    it('should isolate failures to their own destination', async () => {
      registry = createRegistry({ maxConnections: 4 });
      await registry.with(SITE_B, async () => 'b');

      await expect(registry.with(SITE_A, async () => {
        throw new Error('fatal');
      })).rejects.toThrow('fatal');

      await expect(registry.with(SITE_B, async handle => handle.id)).resolves.toBe(1);
    });
  });

  describe('global capacity', () => {
    it('should time out a destination waiting behind another destination', async () => {
      vi.useFakeTimers();
      registry = createRegistry({ maxConnections: 1, waitTimeoutMs: 5000 });
      const timeouts = vi.fn();
      registry.onPoolEvent('checkout_timeout', timeouts);

      const gate = createDeferred<string>();
      const callA = registry.with(SITE_A, () => gate.promise);
      const callB = registry.with(SITE_B, async () => 'b');
      const assertion = expect(callB).rejects.toBeInstanceOf(ConnectionPoolExhaustedError);

      gate.resolve('a');
      await expect(callA).resolves.toBe('a');
      expect(registry.getPool(SITE_B)?.getStats().waiting).toBe(1);

      await vi.advanceTimersByTimeAsync(5000);
      await assertion;

      expect(timeouts).toHaveBeenCalledTimes(1);
      expect(registry.size()).toBe(1);
    });

    it('should let a waiting destination in once a slot is freed', async () => {
      vi.useFakeTimers();
      registry = createRegistry({ maxConnections: 1, waitTimeoutMs: 5000 });

      const gate = createDeferred<void>();
      const callA = registry.with(SITE_A, async () => {
        await gate.promise;
        throw new Error('fatal');
      });
      const callB = registry.with(SITE_B, async handle => handle.destination);

      gate.resolve();
      await expect(callA).rejects.toThrow('fatal');
      await expect(callB).resolves.toBe(SITE_B);
      expect(registry.size()).toBe(1);
    });

    it('should never exceed the cap under concurrent load', async () => {
      const loaded = createRegistry({ maxConnections: 3, waitTimeoutMs: 50 });
      registry = loaded;
      const destinations = ['https://1.test', 'https://2.test', 'https://3.test', 'https://4.test', 'https://5.test'];
      let peakSize = 0;
      let peakOpen = 0;

      const calls = Array.from({ length: 20 }, (_, index) =>
        loaded.with(destinations[index % destinations.length], async () => {
          peakSize = Math.max(peakSize, loaded.size());
          peakOpen = Math.max(peakOpen, transport.openHandles().length);
          await new Promise(resolve => setTimeout(resolve, 1));
          return index;
        })
      );
      const results = await Promise.allSettled(calls);

      expect(peakSize).toBeLessThanOrEqual(3);
      expect(peakOpen).toBeLessThanOrEqual(3);
      expect(loaded.size()).toBeLessThanOrEqual(3);
      for (const result of results) {
        if (result.status === 'rejected') {
          expect(result.reason).toBeInstanceOf(ConnectionPoolExhaustedError);
        }
      }
      expect(results.filter(result => result.status === 'fulfilled').length).toBeGreaterThan(0);
    });
  });

  describe('configuration', () => {
    it('should read the cap from the environment', () => {
      registry = new ConnectionRegistry({
        transport,
        env: { MAX_REQUEST_POOL_SIZE: '7' },
        config: { reapIntervalMs: 0 },
      });

      expect(registry.getConfig()).toEqual({
        idleTimeoutMs: 30000,
        waitTimeoutMs: 5000,
        maxConnections: 7,
        reapIntervalMs: 0,
      });
    });
  });

  describe('events', () => {
    it('should keep working when an event handler throws', async () => {
      const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      registry = createRegistry({ maxConnections: 2 });
      registry.onPoolEvent('connection_created', () => {
        throw new Error('handler failed');
      });

      await expect(registry.with(SITE_A, async () => 'ok')).resolves.toBe('ok');
      expect(errorLog).toHaveBeenCalledTimes(1);
      errorLog.mockRestore();
    });

    it('should stop notifying a removed handler', async () => {
      registry = createRegistry({ maxConnections: 2 });
      const handler = vi.fn();
      registry.onPoolEvent('connection_created', handler);
      registry.offPoolEvent('connection_created', handler);

      await registry.with(SITE_A, async () => 'ok');

      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('shutdown', () => {
    it('should close idle connections and reject later calls', async () => {
      registry = createRegistry({ maxConnections: 2 });
      await registry.with(SITE_A, async () => 'ok');

      await registry.shutdown();

      expect(transport.opened[0].closed).toBe(true);
      expect(registry.size()).toBe(0);
      await expect(registry.with(SITE_A, async () => 'again')).rejects.toBeInstanceOf(PoolClosedError);
    });

    it('should reject callers still waiting for capacity', async () => {
      registry = createRegistry({ maxConnections: 1, waitTimeoutMs: 5000 });
      const gate = createDeferred<string>();
      const holder = registry.with(SITE_A, () => gate.promise);
      const waiter = registry.with(SITE_B, async () => 'b');
      const assertion = expect(waiter).rejects.toBeInstanceOf(PoolClosedError);

      await registry.shutdown();
      await assertion;

      gate.resolve('a');
      await expect(holder).resolves.toBe('a');
      expect(registry.size()).toBe(0);
    });
  });

  describe('current', () => {
    afterEach(async () => {
      await ConnectionRegistry.resetCurrent();
    });

    it('should build the process-wide registry once', () => {
      const first = ConnectionRegistry.current();
      const second = ConnectionRegistry.current();

      expect(second).toBe(first);
      expect(first.isReaperRunning()).toBe(true);
    });

    it('should build a new registry after a reset', async () => {
      const first = ConnectionRegistry.current();
      await ConnectionRegistry.resetCurrent();

      const second = ConnectionRegistry.current();

      expect(second).not.toBe(first);
      expect(first.isReaperRunning()).toBe(false);
    });
  });
});
