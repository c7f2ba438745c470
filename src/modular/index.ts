// Export all modular UCT components
export { UCTSearch } from './uct.js';
export { UCTSelection } from './selection.js';
export type { Descent } from './selection.js';
export { UCTExpansion } from './expansion.js';
export { UCTSimulation } from './simulation.js';
export { UCTBackpropagation } from './backpropagation.js';
export * from './uct-config.js';
