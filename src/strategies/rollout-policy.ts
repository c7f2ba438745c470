import type { RandomSource } from '../uct-types.js';
import { assertContract } from '../utils/contract.js';
import { randomActionIndex } from '../utils/seeded-random.js';

/**
 * Chooses the actions taken during a rollout.
 * Injected into the simulation phase; implementations must draw any randomness
 * from the search's random source so runs stay reproducible.
 */
export interface RolloutPolicy {
    chooseAction(actionCount: number): number;
}

/**
 * Optional per-action weight. Higher weight = higher probability of selection.
 */
export type ActionWeight = (action: number) => number;

/**
 * Random Rollout Policy
 *
 * Chooses uniformly at random, or proportionally to getActionWeight when one is given.
 * One random draw per chosen action in both cases.
 */
export class RandomRolloutPolicy implements RolloutPolicy {
    constructor(
        private readonly random: RandomSource,
        private readonly getActionWeight?: ActionWeight,
    ) {}

    chooseAction(actionCount: number): number {
        if (this.getActionWeight) {
            return this.selectWeightedAction(actionCount, this.getActionWeight);
        }

        return randomActionIndex(this.random, actionCount);
    }

    /**
     * Default weight is 1.0 when the weight function returns NaN.
     */
    private selectWeightedAction(actionCount: number, getActionWeight: ActionWeight): number {
        const weights: number[] = [];
        let totalWeight = 0;

        for (let action = 0; action < actionCount; action++) {
            const weight = getActionWeight(action);
            const safeWeight = Number.isNaN(weight) ? 1.0 : weight;
            assertContract(Number.isFinite(safeWeight), `action ${action} has non-finite weight ${weight}`);
            assertContract(safeWeight >= 0, `action ${action} has negative weight ${weight}`);
            weights.push(safeWeight);
            totalWeight += safeWeight;
        }

        assertContract(totalWeight > 0, 'rollout weights sum to zero');

        const randomValue = this.random() * totalWeight;
        let currentWeight = 0;

        for (let action = 0; action < actionCount; action++) {
            currentWeight += weights[action];
            if (randomValue < currentWeight) {
                return action;
            }
        }

        // Rounding can leave randomValue just past the last boundary
        return actionCount - 1;
    }
}
