export { formatDurationMs, serialiseError } from './formatting.js';

export type { WritableTarget } from './formatting.js';
