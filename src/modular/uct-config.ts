import { DEFAULT_DISCOUNT } from '../uct-node.js';
import { assertContract } from '../utils/contract.js';
import { DEFAULT_EPSILON } from '../utils/uct-node-utils.js';

export interface UCTConfig {
    /** Number of actions available at every node */
    actionCount: number;
    /** Discount factor applied per step, in (0, 1] */
    discount: number;
    /** Number of simulated steps per rollout */
    rolloutHorizon: number;
    /** Guards divisions by zero and scales the tie-break noise */
    epsilon: number;
    /** Iterations performed by UCTSearch.run() when no count is given */
    iterations: number;
}

export type UCTOptions = Pick<UCTConfig, 'actionCount'> & Partial<Omit<UCTConfig, 'actionCount'>>;

export const DEFAULT_UCT_CONFIG: Omit<UCTConfig, 'actionCount'> = {
    discount: DEFAULT_DISCOUNT,
    rolloutHorizon: 50,
    epsilon: DEFAULT_EPSILON,
    iterations: 100,
};

/**
 * Merges options over the defaults and validates the result once.
 * Everything downstream trusts the returned config.
 */
export function resolveUCTConfig(options: UCTOptions): UCTConfig {
    const config: UCTConfig = {
        actionCount: options.actionCount,
        discount: options.discount ?? DEFAULT_UCT_CONFIG.discount,
        rolloutHorizon: options.rolloutHorizon ?? DEFAULT_UCT_CONFIG.rolloutHorizon,
        epsilon: options.epsilon ?? DEFAULT_UCT_CONFIG.epsilon,
        iterations: options.iterations ?? DEFAULT_UCT_CONFIG.iterations,
    };

    assertContract(Number.isInteger(config.actionCount) && config.actionCount > 0, `actionCount must be a positive integer, got ${config.actionCount}`);
    assertContract(config.discount > 0 && config.discount <= 1, `discount must be in (0, 1], got ${config.discount}`);
    assertContract(Number.isInteger(config.rolloutHorizon) && config.rolloutHorizon > 0, `rolloutHorizon must be a positive integer, got ${config.rolloutHorizon}`);
    assertContract(Number.isFinite(config.epsilon) && config.epsilon > 0, `epsilon must be a positive number, got ${config.epsilon}`);
    assertContract(Number.isInteger(config.iterations) && config.iterations >= 0, `iterations must be a non-negative integer, got ${config.iterations}`);

    return config;
}
