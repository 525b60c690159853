// Registry and pools
export { ConnectionRegistry } from './infrastructure/pool/ConnectionRegistry';
export type {
  ConnectionRegistryOptions,
  PoolEvent,
  PoolEventData,
  PoolEventHandler,
  RegistryStats
} from './infrastructure/pool/ConnectionRegistry';
export { DestinationPool } from './infrastructure/pool/DestinationPool';
export type { PoolStats } from './infrastructure/pool/DestinationPool';
export { PooledConnection, MAX_RESET_RETRIES } from './infrastructure/pool/PooledConnection';
export type { AttemptOutcome, Clock } from './infrastructure/pool/PooledConnection';
export { Reaper } from './infrastructure/pool/Reaper';
export type { ReapReport } from './infrastructure/pool/Reaper';
export { SharedCapacityCounter } from './infrastructure/pool/SharedCapacityCounter';

// Transports
export { UndiciTransport } from './infrastructure/transport/UndiciTransport';
export type { UndiciTransportConfig } from './infrastructure/transport/UndiciTransport';
export type { Transport, TransportHandle, ConnectionWork } from './domain/transport/ITransport';

// Configuration
export { DEFAULT_POOL_CONFIG, MAX_POOL_SIZE_ENV, MAX_TIMER_DELAY_MS, resolvePoolConfig } from './config/poolConfig';
export type { PoolConfig } from './config/poolConfig';

// Shared Domain
export {
  DomainError,
  ConfigurationError,
  ConnectionPoolExhaustedError,
  PoolClosedError,
  ConnectionBusyError,
  ConnectionDeadError
} from './domain/shared/DomainError';

// Default export for convenience
import { ConnectionRegistry } from './infrastructure/pool/ConnectionRegistry';
export default ConnectionRegistry;
