export { waitForReady } from './wait-for-ready.js';
export type { ReadinessOptions } from './wait-for-ready.js';
