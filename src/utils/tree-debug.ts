import { UCTNode } from '../uct-node.js';
import { treeLog } from './logger.js';

function describeNode(node: UCTNode): string {
    const value = node.visits > 0 ? node.totalValue / node.visits : 0;
    return `visits=${node.visits}, avg=${value.toFixed(4)}, children=${node.children.length}`;
}

/**
 * Renders the subtree as indented lines, root first, children in action order.
 * Stops descending below maxDepth levels (root is level 0).
 */
export const formatTree = (root: UCTNode, maxDepth: number = Infinity): string[] => {
    const lines: string[] = [];
    const stack: Array<{ node: UCTNode, depth: number, prefix: string }> = [ { node: root, depth: 0, prefix: 'ROOT: ' } ];

    for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
        const { node, depth, prefix } = entry;
        lines.push(`${'  '.repeat(depth)}${prefix}${describeNode(node)}`);

        if (depth >= maxDepth) {
            continue;
        }
        // Pushed in reverse so action 0 is printed first
        for (let action = node.children.length - 1; action >= 0; action--) {
            stack.push({ node: node.children[action], depth: depth + 1, prefix: `[${action}] ` });
        }
    }

    return lines;
};

export const printTree = (root: UCTNode, maxDepth?: number): void => {
    for (const line of formatTree(root, maxDepth)) {
        treeLog(line);
    }
};
