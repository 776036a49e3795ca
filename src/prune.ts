/**
 * Pruning Engine
 * Removes named nodes from a tree in place and reconnects what is left so
 * that no degree-one relic nodes remain and path lengths are conserved.
 *
 * Names are processed in the caller's iteration order. Removing one node can
 * change the parent or siblings of a node removed later in the same call;
 * prune disjoint subtrees in separate calls when that matters.
 */

import { NodeId } from './types.js';
import { PhyloTree } from './phylo-tree.js';
import { StructuralError } from './errors.js';
import { Logger, silentLogger } from './logger.js';

export interface PruneOptions {
    /** Throw StructuralError instead of skipping when a name matches the root or the last leaf */
    strict?: boolean;
    logger?: Logger;
}

export interface PruneResult {
    tree: PhyloTree;
    /** One entry per node removed (a name repeats when it matched several nodes) */
    removed: string[];
    /** Requested names with no node in the tree; not an error */
    missing: string[];
    /** Requested names that matched the root, which cannot be pruned */
    rootSkips: string[];
    /** Requested names that matched the only leaf left; removing it would empty the tree */
    lastLeafSkips: string[];
}

/**
 * Add two optional branch lengths; undefined only when both are
 */
function addLengths(a: number | undefined, b: number | undefined): number | undefined {
    if (a === undefined && b === undefined) return undefined;
    return (a ?? 0) + (b ?? 0);
}

/**
 * Remove a node whose parent has exactly one other child. The sibling takes
 * the parent's place under the grandparent with the two branch lengths
 * summed, or becomes the root when the parent was the root.
 */
function pruneWithSoleSibling(tree: PhyloTree, id: NodeId, parentId: NodeId, siblingId: NodeId): void {
    const grandparentId = tree.parent(parentId);
    const parentLength = tree.get(parentId).length;
    const siblingLength = tree.get(siblingId).length;

    tree.detach(siblingId);

    if (grandparentId === null) {
        tree.setRoot(siblingId);
        tree.get(siblingId).length = undefined;
        return;
    }

    tree.addChild(grandparentId, siblingId, addLengths(parentLength, siblingLength));
    // Leaves the parent with no children, so it is dissolved along with the node
    tree.deleteNode(id);
}

export function pruneTree(
    tree: PhyloTree,
    namesToRemove: Iterable<string>,
    options: PruneOptions = {}
): PruneResult {
    const logger = options.logger ?? silentLogger;
    const result: PruneResult = { tree, removed: [], missing: [], rootSkips: [], lastLeafSkips: [] };

    for (const name of namesToRemove) {
        const matches = tree.findByName(name);
        if (matches.size === 0) {
            result.missing.push(name);
            continue;
        }

        for (const id of matches) {
            // An earlier removal in this call may already have cut it off
            if (!tree.isAttached(id)) continue;

            const parentId = tree.parent(id);
            if (parentId === null) {
                if (options.strict) {
                    throw new StructuralError(`Cannot prune root node '${name}'`);
                }
                logger.warn(`Skipping '${name}': root node cannot be pruned`);
                result.rootSkips.push(name);
                continue;
            }

            if (tree.isLeaf(id) && tree.leafCount() === 1) {
                if (options.strict) {
                    throw new StructuralError(`Cannot prune '${name}': it is the last leaf of the tree`);
                }
                logger.warn(`Skipping '${name}': last leaf of the tree cannot be pruned`);
                result.lastLeafSkips.push(name);
                continue;
            }

            const siblings = tree.siblings(id);
            if (siblings.length === 1) {
                pruneWithSoleSibling(tree, id, parentId, siblings[0]);
            } else {
                tree.deleteNode(id);
            }
            result.removed.push(name);
            logger.debug(`Removed '${name}' (${siblings.length} sibling(s))`);
        }
    }

    return result;
}
