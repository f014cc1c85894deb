/**
 * Ports Barrel Export
 *
 * All port interfaces are exported from here.
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock } from './clockPort.js';
export type { BackendStrategy, RateRangeQuery } from './backend-strategy-port.js';
export type { RateSourcePort, CommoditySourcePort } from './source-ports.js';
