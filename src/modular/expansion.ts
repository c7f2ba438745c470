import { UCTNode } from '../uct-node.js';
import { RewardModel, StepOutcome, toStepOutcome } from '../uct-types.js';
import { UCTSelection } from './selection.js';

/**
 * UCT Expansion Phase Implementation
 *
 * Takes the leaf reached by selection, materializes one fresh leaf child per action,
 * picks one of them with the selection policy and takes that action in the reward
 * model. The picked child is the node the rollout evaluates.
 *
 * Expanding an already internal node attaches nothing; a child is still picked.
 */
export class UCTExpansion {
    constructor(
        private readonly selection: UCTSelection,
    ) {}

    /**
     * @param leaf - The node to expand (normally the last node of a descent)
     * @param model - Queried once, for the action leading to the new child
     * @returns The new child, the action that leads to it and that action's outcome
     */
    expand(leaf: UCTNode, model: RewardModel): { node: UCTNode, action: number, outcome: StepOutcome } {
        leaf.expand();

        const action = this.selection.selectAction(leaf);
        const outcome = toStepOutcome(model(action));

        return { node: leaf.child(action), action, outcome };
    }
}
