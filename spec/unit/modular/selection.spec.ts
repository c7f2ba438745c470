import { expect } from 'chai';
import { UCTSelection } from '../../../src/modular/selection.js';
import { UCTNode } from '../../../src/uct-node.js';
import { createExpandedNode } from '../../helpers/node-factory.js';
import { actionIndexReward, constantRandom, recordingModel, sequenceRandom } from '../../helpers/test-utils.js';

const EPSILON = 1e-6;

describe('UCTSelection', () => {
    describe('selectAction', () => {
        it('should reject selecting on a leaf', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0));

            expect(() => selection.selectAction(new UCTNode(3))).to.throw('Contract violation: cannot select an action on a leaf node');
        });

        it('should let the later action win an exact tie', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0));
            const node = new UCTNode(4);
            node.expand();

            expect(selection.selectAction(node)).to.equal(3);
        });

        it('should prefer an unvisited child', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0));
            const node = createExpandedNode(5, [ [ 2, 4 ], [ 0, 0 ], [ 3, 9 ] ]);

            expect(selection.selectAction(node)).to.equal(1);
        });

        it('should trade a lower mean for a larger exploration bonus', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0));
            // child 0: mean 1.5, bonus sqrt(ln 11 / 5) ~ 0.69; child 1: mean 1, bonus sqrt(ln 11) ~ 1.55
            const node = createExpandedNode(10, [ [ 5, 7.5 ], [ 1, 1 ] ]);

            expect(selection.selectAction(node)).to.equal(1);
            expect(selection.bestAction(node)).to.equal(0);
        });

        it('should draw one random value per child', () => {
            const random = sequenceRandom([ 0.3 ]);
            const selection = new UCTSelection(EPSILON, random);
            const node = createExpandedNode(1, [ [ 0, 0 ], [ 0, 0 ], [ 0, 0 ] ]);

            selection.selectAction(node);

            expect(random.calls()).to.equal(3);
        });

        it('should break ties with the random perturbation', () => {
            const node = createExpandedNode(2, [ [ 1, 1 ], [ 1, 1 ] ]);

            expect(new UCTSelection(EPSILON, sequenceRandom([ 0.9, 0.1 ])).selectAction(node)).to.equal(0);
            expect(new UCTSelection(EPSILON, sequenceRandom([ 0.1, 0.9 ])).selectAction(node)).to.equal(1);
        });
    });

    describe('bestAction', () => {
        it('should return a random action for a leaf', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0.75));

            expect(selection.bestAction(new UCTNode(4))).to.equal(3);
        });

        it('should pick the highest mean without exploration', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0));
            const node = createExpandedNode(6, [ [ 1, 1 ], [ 4, 20 ], [ 1, 3 ] ]);

            expect(selection.bestAction(node)).to.equal(1);
        });

        it('should let the later action win an exact tie', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0));
            const node = createExpandedNode(2, [ [ 1, 1 ], [ 1, 1 ], [ 1, 1 ] ]);

            expect(selection.bestAction(node)).to.equal(2);
        });
    });

    describe('descend', () => {
        it('should stop immediately at a leaf root', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0));
            const root = new UCTNode(2);
            const { model, actions: queried } = recordingModel(actionIndexReward);

            const descent = selection.descend(root, model);

            expect(descent.path).to.deep.equal([ root ]);
            expect(descent.rewards).to.deep.equal([ 0 ]);
            expect(descent.actions).to.deep.equal([]);
            expect(queried).to.deep.equal([]);
        });

        it('should follow UCB1 to a leaf, recording each edge reward', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0));
            const root = createExpandedNode(4, [ [ 2, 0 ], [ 2, 6 ] ]);
            const child = root.child(1);
            child.expand();
            const { model, actions: queried } = recordingModel(actionIndexReward);

            const descent = selection.descend(root, model);

            expect(descent.path).to.have.length(3);
            expect(descent.path[0]).to.equal(root);
            expect(descent.path[1]).to.equal(child);
            expect(descent.path[2]).to.equal(child.child(1));
            expect(descent.rewards).to.deep.equal([ 0, 1, 1 ]);
            expect(descent.actions).to.deep.equal([ 1, 1 ]);
            expect(queried).to.deep.equal([ 1, 1 ]);
        });

        it('should keep descending past terminal outcomes', () => {
            const selection = new UCTSelection(EPSILON, constantRandom(0));
            const root = createExpandedNode(4, [ [ 2, 0 ], [ 2, 6 ] ]);
            root.child(1).expand();

            const descent = selection.descend(root, () => ({ reward: 2, terminal: true }));

            expect(descent.rewards).to.deep.equal([ 0, 2, 2 ]);
            expect(descent.path[2].isLeaf()).to.be.true;
        });
    });
});
