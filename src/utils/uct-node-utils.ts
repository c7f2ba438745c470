import type { UCTNode } from '../uct-node.js';

export const DEFAULT_EPSILON = 1e-6;

/**
 * Mean return of a node, guarded by epsilon so unvisited nodes score 0.
 */
export function calculateMeanValue(node: UCTNode, epsilon: number = DEFAULT_EPSILON): number {
    return node.totalValue / (node.visits + epsilon);
}

/**
 * Calculates the UCB1 score of a child for selection.
 * UCB1 = exploitation + exploration = mean + sqrt(ln(parent_visits + 1) / (child_visits + epsilon))
 * 
 * An unvisited child scores sqrt(ln(parent_visits + 1) / epsilon), which is 0
 * while the parent is unvisited and very large afterwards.
 */
export function getUCB1Score(child: UCTNode, parentVisits: number, epsilon: number = DEFAULT_EPSILON): number {
    const exploitation = calculateMeanValue(child, epsilon);
    const exploration = Math.sqrt(Math.log(parentVisits + 1) / (child.visits + epsilon));

    return exploitation + exploration;
}
