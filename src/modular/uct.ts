import { UCTNode } from '../uct-node.js';
import { ActionScore, RandomSource, RewardModel, SearchPath } from '../uct-types.js';
import { RandomRolloutPolicy, RolloutPolicy } from '../strategies/rollout-policy.js';
import { iterationLog, scoreLog, treeLog } from '../utils/logger.js';
import { defaultRandom } from '../utils/seeded-random.js';
import { printTree } from '../utils/tree-debug.js';
import { UCTBackpropagation } from './backpropagation.js';
import { UCTExpansion } from './expansion.js';
import { UCTSelection } from './selection.js';
import { UCTSimulation } from './simulation.js';
import { UCTConfig, UCTOptions, resolveUCTConfig } from './uct-config.js';

/**
 * Owns a UCT tree and runs iterations on it.
 *
 * One iteration, fully synchronous:
 * 1. Selection: descend with UCB1 to a leaf, taking each edge's action in the reward model
 * 2. Expansion: give the leaf one child per action and pick one of them
 * 3. Simulation: estimate the new child with a bounded random rollout
 * 4. Backpropagation: record the discounted return on every node of the path
 *
 * The random source and reward model are external collaborators; the search
 * never copies or resets them. Not safe for concurrent use.
 */
export class UCTSearch {
    public readonly config: UCTConfig;

    private root: UCTNode;

    private selection: UCTSelection;

    private expansion: UCTExpansion;

    private simulation: UCTSimulation;

    private backpropagation: UCTBackpropagation;

    constructor(
        options: UCTOptions,
        private readonly random: RandomSource = defaultRandom,
        private readonly rolloutPolicy: RolloutPolicy = new RandomRolloutPolicy(random),
    ) {
        this.config = resolveUCTConfig(options);
        this.root = new UCTNode(this.config.actionCount, this.config.discount);

        this.selection = new UCTSelection(this.config.epsilon, random);
        this.expansion = new UCTExpansion(this.selection);
        this.simulation = new UCTSimulation(this.config.actionCount, this.config.discount, this.config.rolloutHorizon, rolloutPolicy);
        this.backpropagation = new UCTBackpropagation();
    }

    get tree(): UCTNode {
        return this.root;
    }

    iterate(model: RewardModel): SearchPath {
        const { path, rewards, actions } = this.selection.descend(this.root, model);

        const leaf = path[path.length - 1];
        const { node: newNode, action, outcome } = this.expansion.expand(leaf, model);
        path.push(newNode);
        rewards.push(outcome.reward);
        actions.push(action);

        // Nothing follows a terminal step, so there is nothing to roll out
        const leafValue = outcome.terminal ? 0 : this.simulation.simulate(model);

        const rootReturn = this.backpropagation.backpropagate(path, rewards, leafValue);

        iterationLog('depth=%d actions=%o leafValue=%d rootReturn=%d', actions.length, actions, leafValue, rootReturn);

        return {
            actions,
            rewards: rewards.slice(1),
            leafDepth: actions.length,
            leafValue,
            rootReturn,
        };
    }

    run(model: RewardModel, iterations: number = this.config.iterations): void {
        for (let i = 0; i < iterations; i++) {
            this.iterate(model);
        }
    }

    bestAction(): number {
        return this.selection.bestAction(this.root);
    }

    value(): number {
        return this.root.value();
    }

    qValue(action: number): number {
        return this.root.qValue(action);
    }

    nodeCount(): number {
        return this.root.nodeCount();
    }

    maxDepth(): number {
        return this.root.maxDepth();
    }

    /**
     * Root actions with their mean return and visit count, best first.
     * Unvisited actions score 0. Empty before the first iteration.
     */
    getActions(): ActionScore[] {
        if (treeLog.enabled) {
            treeLog('Final UCT tree:');
            printTree(this.root);
        }

        const actions = this.root.children.map((child, action) => ({
            action,
            score: child.visits > 0 ? child.value() : 0,
            visits: child.visits,
        }));
        actions.sort((a, b) => b.score - a.score);

        if (scoreLog.enabled) {
            scoreLog(`${actions.length} actions evaluated:`);
            actions.slice(0, 5).forEach((a, i) => {
                scoreLog(`  ${i + 1}. action=${a.action} | score=${a.score.toFixed(4)} | visits=${a.visits}`);
            });
        }

        return actions;
    }

    /**
     * Deep copy of the tree. The copy shares the random source and rollout
     * policy, which are external collaborators, but no node.
     */
    clone(): UCTSearch {
        const copy = new UCTSearch(this.config, this.random, this.rolloutPolicy);
        copy.root = this.root.clone();
        return copy;
    }

    /**
     * Releases this tree and replaces it with a deep copy of other's.
     */
    assign(other: UCTSearch): void {
        this.root.copyFrom(other.root);
    }

    toString(): string {
        return this.root.toString();
    }
}
