import type { RewardModel } from '../uct-types.js';

/**
 * Decides which action to take next in a decision process.
 *
 * Strategies only see the process through its reward model, so the same
 * strategy works for any environment with a fixed action count.
 */
export interface DecisionStrategy {
    /**
     * @param model - Reward model of the process as it stands now
     * @returns Action index in [0, actionCount)
     */
    getAction(model: RewardModel): number;
}
