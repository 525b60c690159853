/**
 * Domain Error Types
 *
 * Error hierarchy for the site connection pool. Errors raised by a
 * transport or by caller work are never wrapped in these; they reach the
 * caller unchanged.
 */

export abstract class DomainError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

export class ConfigurationError extends DomainError {
  constructor(setting: string, reason?: string) {
    super(
      'CONFIGURATION_ERROR',
      `Invalid configuration for '${setting}'${reason ? `: ${reason}` : ''}`,
      { setting }
    );
  }
}

export class ConnectionPoolExhaustedError extends DomainError {
  constructor(
    public readonly destination: string,
    public readonly waitTimeoutMs: number,
    public readonly poolSize: number,
    public readonly activeConnections: number
  ) {
    super(
      'CONNECTION_POOL_EXHAUSTED',
      `Connection pool exhausted for '${destination}': no connection available after ${waitTimeoutMs}ms (${activeConnections}/${poolSize} connections in use)`,
      { destination, waitTimeoutMs, poolSize, activeConnections }
    );
  }
}

export class PoolClosedError extends DomainError {
  constructor(destination?: string) {
    super(
      'POOL_CLOSED',
      destination
        ? `Connection pool for '${destination}' has been shut down`
        : 'Connection registry has been shut down',
      { destination }
    );
  }
}

export class ConnectionBusyError extends DomainError {
  constructor(destination: string) {
    super(
      'CONNECTION_BUSY',
      `Connection to '${destination}' is already in use`,
      { destination }
    );
  }
}

export class ConnectionDeadError extends DomainError {
  constructor(destination: string) {
    super(
      'CONNECTION_DEAD',
      `Connection to '${destination}' is dead and cannot be used`,
      { destination }
    );
  }
}
