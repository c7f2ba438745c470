import { UCTNode } from '../uct-node.js';
import { assertContract } from '../utils/contract.js';

/**
 * UCT Backpropagation Phase Implementation
 *
 * Propagates the rollout estimate from the new leaf back to the root.
 *
 * DISCOUNTED RETURN:
 * Walking from the leaf to the root, each node receives
 *     value = edgeReward + discount * value
 * starting from the rollout estimate. Every ancestor therefore records the full
 * discounted return-to-go from itself, not just the rollout estimate.
 *
 * STATISTICS UPDATED:
 * - visits: incremented for each node on the path
 * - totalValue: accumulates the return recorded at that node
 */
export class UCTBackpropagation {
    /**
     * @param path - Nodes from the root (index 0) to the new leaf, inclusive
     * @param rewards - Reward of the edge into each node of path (the root's is 0)
     * @param leafValue - Bootstrap estimate from the rollout
     * @returns The return recorded at the root
     */
    backpropagate(path: readonly UCTNode[], rewards: readonly number[], leafValue: number): number {
        assertContract(path.length > 0, 'backpropagation needs a non-empty path');
        assertContract(path.length === rewards.length, `path has ${path.length} nodes but ${rewards.length} rewards`);

        let value = leafValue;
        for (let i = path.length - 1; i >= 0; i--) {
            const node = path[i];
            value = rewards[i] + node.discount * value;
            node.recordVisit(value);
        }

        return value;
    }
}
