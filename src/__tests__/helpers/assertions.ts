/**
 * Assertion helpers for tree-shaped results.
 */

import { NodeId } from '../../types.js';
import { PhyloTree } from '../../phylo-tree.js';
import { Logger } from '../../logger.js';

/**
 * Names of a node's children, in order (unnamed children as '?')
 */
export function childNames(tree: PhyloTree, id: NodeId = tree.root): string[] {
    return tree.children(id).map(c => tree.get(c).name ?? '?');
}

/**
 * The only node carrying a name; fails the test otherwise
 */
export function nodeNamed(tree: PhyloTree, name: string): NodeId {
    const matches = [...tree.findByName(name)];
    if (matches.length !== 1) {
        throw new Error(`Expected one node named ${name}, found ${matches.length}`);
    }
    return matches[0];
}

/**
 * Sum of branch lengths on the path from an ancestor down to the named leaf
 */
export function distanceToLeaf(tree: PhyloTree, ancestorId: NodeId, leafName: string): number {
    let current: NodeId | null = nodeNamed(tree, leafName);
    let sum = 0;
    while (current !== null && current !== ancestorId) {
        sum += tree.get(current).length ?? 0;
        current = tree.parent(current);
    }
    if (current === null) {
        throw new Error(`${leafName} is not below node ${ancestorId}`);
    }
    return sum;
}

/**
 * Logger that keeps warn and error messages for assertions
 */
export function recordingLogger(): Logger & { warnings: string[]; errors: string[] } {
    const warnings: string[] = [];
    const errors: string[] = [];
    return {
        warnings,
        errors,
        debug: () => {},
        info: () => {},
        warn: (message: string) => {
            warnings.push(message);
        },
        error: (message: string) => {
            errors.push(message);
        }
    };
}
