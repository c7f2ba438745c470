import { UCTNode } from '../uct-node.js';
import { RandomSource, RewardModel, toStepOutcome } from '../uct-types.js';
import { assertContract } from '../utils/contract.js';
import { randomActionIndex } from '../utils/seeded-random.js';
import { calculateMeanValue, getUCB1Score } from '../utils/uct-node-utils.js';

/**
 * Result of descending the tree from the root to a leaf.
 * path[0] is the root; rewards[i] is the reward of the edge into path[i]
 * (the root has no incoming edge and gets 0).
 */
export type Descent = {
    path: UCTNode[];
    rewards: number[];
    actions: number[];
};

/**
 * UCT Selection Phase Implementation
 *
 * Scores children with UCB1 and descends from the root until a leaf is reached.
 *
 * TIE-BREAKING:
 * Every score gets random() * epsilon added, drawn once per child in action order.
 * Scores are compared with >= while scanning upwards, so the later action wins
 * an exact tie. Given the same random stream, selection is reproducible.
 */
export class UCTSelection {
    constructor(
        private readonly epsilon: number,
        private readonly random: RandomSource,
    ) {}

    /**
     * Picks the child to explore next using UCB1.
     *
     * PRECONDITION:
     * - node is internal (selecting on a leaf is a contract violation)
     */
    selectAction(node: UCTNode): number {
        assertContract(!node.isLeaf(), 'cannot select an action on a leaf node');

        return this.argmax(node, child => getUCB1Score(child, node.visits, this.epsilon));
    }

    /**
     * Picks the action with the highest mean value, without the exploration term.
     * A leaf has nothing to rank on, so a uniformly random action is returned.
     */
    bestAction(node: UCTNode): number {
        if (node.isLeaf()) {
            return randomActionIndex(this.random, node.actionCount);
        }

        return this.argmax(node, child => calculateMeanValue(child, this.epsilon));
    }

    /**
     * Descends from root using selectAction() until a leaf is reached,
     * querying the reward model once per edge traversed.
     *
     * POSTCONDITION:
     * - the last node of the returned path is a leaf
     * - path.length === rewards.length === actions.length + 1
     */
    descend(root: UCTNode, model: RewardModel): Descent {
        const path: UCTNode[] = [ root ];
        const rewards: number[] = [ 0 ];
        const actions: number[] = [];

        let current = root;
        while (!current.isLeaf()) {
            const action = this.selectAction(current);
            // Terminal flags are ignored here: tree nodes carry no environment state
            const { reward } = toStepOutcome(model(action));

            current = current.child(action);
            path.push(current);
            rewards.push(reward);
            actions.push(action);
        }

        return { path, rewards, actions };
    }

    private argmax(node: UCTNode, score: (child: UCTNode) => number): number {
        let selected = -1;
        let bestScore = -Number.MAX_VALUE;

        node.children.forEach((child, action) => {
            const noisyScore = score(child) + this.random() * this.epsilon;
            if (noisyScore >= bestScore) {
                selected = action;
                bestScore = noisyScore;
            }
        });

        assertContract(selected >= 0, 'no child could be selected');
        return selected;
    }
}
