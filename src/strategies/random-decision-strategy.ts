import type { RandomSource } from '../uct-types.js';
import { assertContract } from '../utils/contract.js';
import { defaultRandom, randomActionIndex } from '../utils/seeded-random.js';
import { DecisionStrategy } from './decision-strategy.js';

/**
 * Random Decision Strategy
 *
 * Chooses uniformly at random and never looks at the reward model.
 * Used as a baseline to compare UCT against.
 */
export class RandomDecisionStrategy implements DecisionStrategy {
    constructor(
        private readonly actionCount: number,
        private readonly random: RandomSource = defaultRandom,
    ) {
        assertContract(Number.isInteger(actionCount) && actionCount > 0, `actionCount must be a positive integer, got ${actionCount}`);
    }

    getAction(): number {
        return randomActionIndex(this.random, this.actionCount);
    }
}
