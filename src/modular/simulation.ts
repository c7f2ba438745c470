import { RewardModel, toStepOutcome } from '../uct-types.js';
import { RolloutPolicy } from '../strategies/rollout-policy.js';

/**
 * UCT Simulation Phase Implementation
 *
 * Estimates the value of a freshly expanded leaf with a bounded random rollout.
 * Runs rolloutHorizon steps, each one choosing an action from the rollout policy,
 * taking it in the reward model and adding discount^t * reward to the total.
 *
 * A step whose outcome is terminal ends the rollout after its reward is counted.
 * The rollout keeps no memory between calls.
 */
export class UCTSimulation {
    constructor(
        private readonly actionCount: number,
        private readonly discount: number,
        private readonly rolloutHorizon: number,
        private readonly policy: RolloutPolicy,
    ) {}

    /**
     * @param model - Queried once per rollout step
     * @returns The discounted sum of rollout rewards
     */
    simulate(model: RewardModel): number {
        let total = 0;
        let discountFactor = 1;

        for (let step = 0; step < this.rolloutHorizon; step++) {
            const action = this.policy.chooseAction(this.actionCount);
            const { reward, terminal } = toStepOutcome(model(action));

            total += discountFactor * reward;
            discountFactor *= this.discount;

            if (terminal) {
                break;
            }
        }

        return total;
    }
}
