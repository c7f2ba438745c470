export * from './decision-strategy.js';
export * from './random-decision-strategy.js';
export * from './uct-decision-strategy.js';
export * from './rollout-policy.js';
