/**
 * Monophyly Classifier
 *
 * A set of leaf names is monophyletic when some node's leaf-set is exactly
 * the set restricted to the tree's leaves. Fewer than two present names
 * always count as a clade; the triplication classifier relies on that.
 */

import { NodeId } from './types.js';
import { PhyloTree } from './phylo-tree.js';
import { ClassifierError } from './errors.js';

export interface MonophylyReport {
    monophyletic: boolean;
    /** Target names that are leaves of the tree */
    present: Set<string>;
    /** Most recent common ancestor of the present leaves */
    commonAncestor: NodeId | null;
    /** Leaves below the common ancestor that are not targets */
    intruders: Set<string>;
}

/** Target names that occur as leaf names in the tree */
export function presentLeafNames(tree: PhyloTree, targetNames: Iterable<string>): Set<string> {
    const leaves = tree.leafNames();
    const present = new Set<string>();
    for (const name of targetNames) {
        if (leaves.has(name)) present.add(name);
    }
    return present;
}

function requirePresent(tree: PhyloTree, targetNames: Iterable<string>): Set<string> {
    const targets = new Set(targetNames);
    if (targets.size === 0) {
        throw new ClassifierError('Target set is empty');
    }
    const present = presentLeafNames(tree, targets);
    if (present.size === 0) {
        throw new ClassifierError(`None of ${targets.size} target names are leaves of the tree`);
    }
    return present;
}

function isSubsetOf(a: Set<string>, b: Set<string>): boolean {
    for (const x of a) {
        if (!b.has(x)) return false;
    }
    return true;
}

/**
 * Decide whether the target names form a clade.
 *
 * Walks upward from one target leaf: any node whose leaf-set equals the
 * present targets must be one of its ancestors. Leaf-sets only grow on the
 * way up, so the walk stops at the first non-target leaf.
 */
export function isMonophyletic(tree: PhyloTree, targetNames: Iterable<string>): boolean {
    const present = requirePresent(tree, targetNames);
    if (present.size < 2) return true;

    let start: NodeId | null = null;
    for (const id of tree.leaves()) {
        const name = tree.get(id).name;
        if (name !== undefined && present.has(name)) {
            start = id;
            break;
        }
    }
    if (start === null) return true;

    for (const candidate of tree.ancestors(start)) {
        const leafSet = tree.leafNames(candidate);
        if (!isSubsetOf(leafSet, present)) return false;
        if (leafSet.size === present.size) return true;
    }
    return false;
}

/**
 * Most recent common ancestor of a group of nodes
 */
export function commonAncestor(tree: PhyloTree, ids: NodeId[]): NodeId | null {
    if (ids.length === 0) return null;

    let path = [ids[0], ...tree.ancestors(ids[0])];
    for (const id of ids.slice(1)) {
        const lineage = new Set([id, ...tree.ancestors(id)]);
        const meet = path.findIndex(n => lineage.has(n));
        if (meet === -1) return null;
        path = path.slice(meet);
    }
    return path[0];
}

/**
 * Monophyly check with the evidence behind it
 */
export function checkMonophyly(tree: PhyloTree, targetNames: Iterable<string>): MonophylyReport {
    const targets = new Set(targetNames);
    const present = requirePresent(tree, targets);

    const members: NodeId[] = [];
    for (const id of tree.leaves()) {
        const name = tree.get(id).name;
        if (name !== undefined && present.has(name)) members.push(id);
    }

    const mrca = commonAncestor(tree, members);
    const intruders = new Set<string>();
    if (mrca !== null) {
        for (const name of tree.leafNames(mrca)) {
            if (!targets.has(name)) intruders.add(name);
        }
    }

    return {
        monophyletic: present.size < 2 || intruders.size === 0,
        present,
        commonAncestor: mrca,
        intruders
    };
}
