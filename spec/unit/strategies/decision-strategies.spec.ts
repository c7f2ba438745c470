import { expect } from 'chai';
import { RandomDecisionStrategy } from '../../../src/strategies/random-decision-strategy.js';
import { UCTDecisionStrategy } from '../../../src/strategies/uct-decision-strategy.js';
import { createSeededRandom } from '../../../src/utils/seeded-random.js';
import { actionIndexReward, constantRandom } from '../../helpers/test-utils.js';

describe('Decision strategies', () => {
    describe('UCTDecisionStrategy', () => {
        it('should pick the highest reward action', () => {
            const strategy = new UCTDecisionStrategy({ actionCount: 3, rolloutHorizon: 10 }, createSeededRandom(3));

            expect(strategy.getAction(actionIndexReward)).to.equal(2);
        });

        it('should build a fresh tree of config.iterations iterations per decision', () => {
            const strategy = new UCTDecisionStrategy({ actionCount: 3, rolloutHorizon: 10, iterations: 25 }, createSeededRandom(5));

            const first = strategy.debugSearchTree(actionIndexReward);
            const second = strategy.debugSearchTree(actionIndexReward);

            expect(first.nodeCount()).to.equal(1 + 3 * 25);
            expect(second.nodeCount()).to.equal(1 + 3 * 25);
            expect(second.tree).to.not.equal(first.tree);
        });
    });

    describe('RandomDecisionStrategy', () => {
        it('should choose a uniformly random action', () => {
            expect(new RandomDecisionStrategy(5, constantRandom(0.6)).getAction()).to.equal(3);
        });

        it('should reject an invalid action count', () => {
            expect(() => new RandomDecisionStrategy(0)).to.throw('Contract violation');
        });
    });
});
