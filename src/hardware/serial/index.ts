export { openSerialTransport, acquireTransport, createSerialPort } from './serial';
export { createLineQueue } from './line-queue';
export { rankCandidates } from './helpers';
export type {
  SerialTransport,
  OpenTransport,
  SerialOptions,
  PortLike,
  CreatePort,
  LineQueue
} from './types';
