/**
 * Outcome of taking one action in the decision process.
 * A terminal outcome ends the simulated trajectory after its reward is counted.
 */
export interface StepOutcome {
    reward: number;
    terminal?: boolean;
}

/**
 * Environment model supplied by the caller.
 * 
 * Maps an action index in [0, actionCount) to the immediate reward for taking it.
 * Called once per edge traversed during descent, once for the newly expanded child,
 * and once per rollout step. It may be stateful; the search never resets it.
 */
export type RewardModel = (action: number) => number | StepOutcome;

/**
 * Uniform random source producing values in [0, 1).
 * Every random decision of the search is drawn from this function.
 */
export type RandomSource = () => number;

/**
 * Summary of a single iteration, returned by UCTSearch.iterate().
 */
export type SearchPath = {
    /** Actions taken from the root down to the newly expanded leaf */
    actions: number[];
    /** Immediate reward of each edge, aligned with actions */
    rewards: number[];
    /** Depth of the new leaf (root depth is 0) */
    leafDepth: number;
    /** Bootstrap value estimated by the rollout */
    leafValue: number;
    /** Discounted return recorded at the root */
    rootReturn: number;
};

export type ActionScore = {
    action: number;
    score: number;
    visits: number;
};

export function toStepOutcome(result: number | StepOutcome): StepOutcome {
    return typeof result === 'number' ? { reward: result, terminal: false } : result;
}
