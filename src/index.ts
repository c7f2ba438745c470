/*
 * Main entry point for the uct-planner package
 * Re-exports all public APIs
 */

export * from './uct-node.js';
export * from './uct-types.js';
export * from './strategies/index.js';
export * from './modular/index.js';
export { assertContract } from './utils/contract.js';
export { createSeededRandom, defaultRandom } from './utils/seeded-random.js';
export { calculateMeanValue, getUCB1Score, DEFAULT_EPSILON } from './utils/uct-node-utils.js';
export { formatTree, printTree } from './utils/tree-debug.js';
