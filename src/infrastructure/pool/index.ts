export { ConnectionRegistry } from './ConnectionRegistry';
export type {
  ConnectionRegistryOptions,
  PoolEvent,
  PoolEventData,
  PoolEventHandler,
  RegistryStats,
} from './ConnectionRegistry';
export { DestinationPool } from './DestinationPool';
export type { ConnectionFactory, DestinationPoolOptions, PoolStats } from './DestinationPool';
export { PooledConnection, MAX_RESET_RETRIES, monotonicClock } from './PooledConnection';
export type { AttemptOutcome, Clock, PooledConnectionOptions } from './PooledConnection';
export { Reaper } from './Reaper';
export type { ReapablePools, ReaperConfig, ReapReport } from './Reaper';
export { SharedCapacityCounter } from './SharedCapacityCounter';
export type { ReleaseListener } from './SharedCapacityCounter';
