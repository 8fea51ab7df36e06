export { BusError, isBusError } from './bus-error.js';
export type { BusErrorCode } from './bus-error.js';
