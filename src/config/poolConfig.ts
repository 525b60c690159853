/**
 * Pool Configuration
 *
 * Defaults for the shared site pool, overridable from the environment
 * (MAX_REQUEST_POOL_SIZE) and from explicit options. Resolved once, when a
 * registry is constructed.
 */

import { ConfigurationError } from '../domain/shared/DomainError';

export interface PoolConfig {
  idleTimeoutMs: number;   // Reap threshold, also the transport keep-alive hint
  waitTimeoutMs: number;   // Max time a checkout waits for capacity
  maxConnections: number;  // Global cap across every destination
  reapIntervalMs: number;  // Sweep period; <= 0 disables the reaper
}

export const MAX_POOL_SIZE_ENV = 'MAX_REQUEST_POOL_SIZE';

// Largest delay Node timers honour; anything above fires after 1 ms
export const MAX_TIMER_DELAY_MS = 2147483647;

export const DEFAULT_POOL_CONFIG: PoolConfig = {
  idleTimeoutMs: 30000,
  waitTimeoutMs: 5000,
  maxConnections: 512,
  reapIntervalMs: 30000,
};

export function resolvePoolConfig(
  overrides: Partial<PoolConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): PoolConfig {
  const envSize = env[MAX_POOL_SIZE_ENV];
  const envMaxConnections = envSize !== undefined && envSize.trim() !== ''
    ? parseIntegerSetting(MAX_POOL_SIZE_ENV, envSize)
    : undefined;

  const config: PoolConfig = {
    idleTimeoutMs: overrides.idleTimeoutMs ?? DEFAULT_POOL_CONFIG.idleTimeoutMs,
    waitTimeoutMs: overrides.waitTimeoutMs ?? DEFAULT_POOL_CONFIG.waitTimeoutMs,
    maxConnections: overrides.maxConnections ?? envMaxConnections ?? DEFAULT_POOL_CONFIG.maxConnections,
    reapIntervalMs: overrides.reapIntervalMs ?? DEFAULT_POOL_CONFIG.reapIntervalMs,
  };

  validatePoolConfig(config);
  return config;
}

export function validatePoolConfig(config: PoolConfig): void {
  if (!Number.isInteger(config.maxConnections) || config.maxConnections <= 0) {
    throw new ConfigurationError('maxConnections', `expected a positive integer, got ${config.maxConnections}`);
  }
  if (!Number.isFinite(config.waitTimeoutMs) || config.waitTimeoutMs < 0) {
    throw new ConfigurationError('waitTimeoutMs', `expected a non-negative number, got ${config.waitTimeoutMs}`);
  }
  // Also the transport keep-alive, which must be positive
  if (!Number.isFinite(config.idleTimeoutMs) || config.idleTimeoutMs <= 0) {
    throw new ConfigurationError('idleTimeoutMs', `expected a positive number, got ${config.idleTimeoutMs}`);
  }
  if (!Number.isFinite(config.reapIntervalMs)) {
    throw new ConfigurationError('reapIntervalMs', `expected a finite number, got ${config.reapIntervalMs}`);
  }

  for (const setting of ['waitTimeoutMs', 'idleTimeoutMs', 'reapIntervalMs'] as const) {
    if (config[setting] > MAX_TIMER_DELAY_MS) {
      throw new ConfigurationError(setting, `expected at most ${MAX_TIMER_DELAY_MS} ms, got ${config[setting]}`);
    }
  }
}

function parseIntegerSetting(setting: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(setting, `expected a positive integer, got '${raw}'`);
  }
  return parseInt(trimmed, 10);
}
