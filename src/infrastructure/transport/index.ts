export { UndiciTransport } from './UndiciTransport';
export type { UndiciTransportConfig } from './UndiciTransport';
