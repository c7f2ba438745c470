import { assertActionInRange, assertContract } from './utils/contract.js';

export const DEFAULT_DISCOUNT = 0.9;

/**
 * Represents a node in a UCT search tree.
 *
 * A node is either a leaf (no children) or internal (exactly actionCount children,
 * one per action index). The only transition is Leaf -> Internal through expand().
 *
 * Every node is exclusively owned by its parent; there are no parent pointers and
 * no node is ever shared between trees. clone() and copyFrom() duplicate the whole
 * subtree.
 *
 * All traversals use an explicit stack so deep trees cannot overflow the call stack.
 */
export class UCTNode {
    /** Number of backups that passed through this node */
    visits = 0;

    /** Sum of the discounted returns recorded on every visit */
    totalValue = 0;

    private childNodes: UCTNode[] = [];

    constructor(
        public readonly actionCount: number,
        public readonly discount: number = DEFAULT_DISCOUNT,
    ) {
        assertContract(Number.isInteger(actionCount) && actionCount > 0, `actionCount must be a positive integer, got ${actionCount}`);
        assertContract(discount > 0 && discount <= 1, `discount must be in (0, 1], got ${discount}`);
    }

    isLeaf(): boolean {
        return this.childNodes.length === 0;
    }

    get children(): readonly UCTNode[] {
        return this.childNodes;
    }

    child(action: number): UCTNode {
        assertContract(!this.isLeaf(), 'cannot read a child of a leaf node');
        assertActionInRange(action, this.actionCount);
        return this.childNodes[action];
    }

    /**
     * Turns a leaf into an internal node with one fresh leaf per action.
     * No-op on an internal node.
     *
     * @returns true if the node was expanded by this call
     */
    expand(): boolean {
        if (!this.isLeaf()) {
            return false;
        }

        this.childNodes = this.createLeaves();
        return true;
    }

    recordVisit(value: number): void {
        this.visits++;
        this.totalValue += value;
    }

    /**
     * Average recorded return. Unlike the selection formulas this is not
     * epsilon-guarded: an unvisited node has no value and reports NaN.
     */
    value(): number {
        if (this.visits === 0) {
            return NaN;
        }
        return this.totalValue / this.visits;
    }

    qValue(action: number): number {
        return this.child(action).value();
    }

    nodeCount(): number {
        let count = 0;
        const stack: UCTNode[] = [ this ];

        for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
            count++;
            stack.push(...node.childNodes);
        }

        return count;
    }

    /**
     * Number of nodes on the longest root-to-leaf path, counting this node.
     */
    maxDepth(): number {
        let deepest = 0;
        const stack: Array<{ node: UCTNode, depth: number }> = [ { node: this, depth: 1 } ];

        for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
            deepest = Math.max(deepest, entry.depth);
            for (const child of entry.node.childNodes) {
                stack.push({ node: child, depth: entry.depth + 1 });
            }
        }

        return deepest;
    }

    clone(): UCTNode {
        const copy = new UCTNode(this.actionCount, this.discount);
        UCTNode.copySubtree(this, copy);
        return copy;
    }

    /**
     * Replaces this node's statistics and subtree with a deep copy of source's.
     * The existing subtree is released first. source may be an ancestor of this
     * node, so it is snapshotted before anything here changes.
     */
    copyFrom(source: UCTNode): void {
        assertContract(
            source.actionCount === this.actionCount,
            `cannot copy a tree with ${source.actionCount} actions into one with ${this.actionCount}`,
        );
        assertContract(source.discount === this.discount, 'cannot copy a tree with a different discount');
        if (source === this) {
            return;
        }

        const copy = source.clone();
        this.childNodes = [];
        this.visits = copy.visits;
        this.totalValue = copy.totalValue;
        this.childNodes = copy.childNodes;
    }

    /**
     * Walks the subtree and fails fast if any node breaks the leaf/children invariant.
     */
    checkInvariants(): void {
        const stack: UCTNode[] = [ this ];

        for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
            const childCount = node.childNodes.length;
            assertContract(
                childCount === 0 || childCount === node.actionCount,
                `internal node has ${childCount} children, expected ${node.actionCount}`,
            );
            for (const child of node.childNodes) {
                assertContract(child instanceof UCTNode, 'internal node has a missing child');
                stack.push(child);
            }
        }
    }

    toString(): string {
        if (this.isLeaf()) {
            return `[V=${this.value()}]`;
        }

        const qValues = this.childNodes.map((child, action) => `Q${action}=${child.value()}`);
        return `[V=${this.value()},${qValues.join(',')}]`;
    }

    private createLeaves(): UCTNode[] {
        return Array.from({ length: this.actionCount }, () => new UCTNode(this.actionCount, this.discount));
    }

    private static copySubtree(source: UCTNode, destination: UCTNode): void {
        const stack: Array<{ from: UCTNode, to: UCTNode }> = [ { from: source, to: destination } ];

        for (let pair = stack.pop(); pair !== undefined; pair = stack.pop()) {
            const { from, to } = pair;
            to.visits = from.visits;
            to.totalValue = from.totalValue;
            to.childNodes = from.childNodes.map(child => new UCTNode(child.actionCount, child.discount));

            from.childNodes.forEach((child, action) => {
                stack.push({ from: child, to: to.childNodes[action] });
            });
        }
    }
}
