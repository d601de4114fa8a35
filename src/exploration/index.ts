/**
 * Exploration module exports.
 */

export { DiscoveryBuffer } from './discovery-buffer.js';
export type { ExplorerConfig, ExplorationResult } from './explorer.js';
export { Explorer } from './explorer.js';
