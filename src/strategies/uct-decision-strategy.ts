import type { RandomSource, RewardModel } from '../uct-types.js';
import { UCTSearch } from '../modular/uct.js';
import { UCTOptions } from '../modular/uct-config.js';
import { defaultRandom } from '../utils/seeded-random.js';
import { DecisionStrategy } from './decision-strategy.js';
import { RolloutPolicy } from './rollout-policy.js';

/**
 * UCT Decision Strategy
 *
 * Builds a fresh tree for every decision, runs config.iterations iterations
 * against the given reward model and returns the best root action.
 */
export class UCTDecisionStrategy implements DecisionStrategy {
    constructor(
        private readonly options: UCTOptions,
        private readonly random: RandomSource = defaultRandom,
        private readonly rolloutPolicy?: RolloutPolicy,
    ) {}

    getAction(model: RewardModel): number {
        const search = this.createSearch();
        search.run(model);
        return search.bestAction();
    }

    /**
     * Same as getAction but returns the search so callers can inspect the tree.
     */
    debugSearchTree(model: RewardModel): UCTSearch {
        const search = this.createSearch();
        search.run(model);
        return search;
    }

    private createSearch(): UCTSearch {
        return new UCTSearch(this.options, this.random, this.rolloutPolicy);
    }
}
