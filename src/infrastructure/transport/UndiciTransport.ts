/**
 * Undici Transport
 *
 * Opens one persistent HTTP client per pooled connection. Each undici Client
 * holds a single socket to the destination origin (pipelining 1), so the
 * pool's global cap is a cap on open sockets.
 */

import { Client, errors } from 'undici';
import { ConfigurationError } from '../../domain/shared/DomainError';
import { Transport } from '../../domain/transport/ITransport';

export interface UndiciTransportConfig {
  connectTimeoutMs: number;
  headersTimeoutMs: number;
  bodyTimeoutMs: number;
}

const DEFAULT_CONFIG: UndiciTransportConfig = {
  connectTimeoutMs: 10000,
  headersTimeoutMs: 30000,
  bodyTimeoutMs: 30000,
};

const RESET_CODES = new Set([
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
  'UND_ERR_DESTROYED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
]);

export class UndiciTransport implements Transport<Client> {
  private readonly config: UndiciTransportConfig;

  constructor(config: Partial<UndiciTransportConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  open(destination: string, keepAliveMs: number): Client {
    return new Client(parseOrigin(destination), {
      pipelining: 1,
      keepAliveTimeout: keepAliveMs,
      keepAliveMaxTimeout: Math.max(keepAliveMs, 1000),
      headersTimeout: this.config.headersTimeoutMs,
      bodyTimeout: this.config.bodyTimeoutMs,
      connect: { timeout: this.config.connectTimeoutMs },
    });
  }

  isConnectionReset(error: unknown): boolean {
    if (error instanceof errors.UndiciError) {
      return RESET_CODES.has(error.code);
    }
    return hasErrorCode(error) && RESET_CODES.has(error.code);
  }
}

function parseOrigin(destination: string): string {
  let url: URL;
  try {
    url = new URL(destination);
  } catch (error) {
    throw new ConfigurationError('destination', `'${destination}' is not a valid URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError('destination', `unsupported protocol '${url.protocol}' in '${destination}'`);
  }
  return url.origin;
}

function hasErrorCode(error: unknown): error is Error & { code: string } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
