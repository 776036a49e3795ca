/**
 * Statistics & Filters
 * Internal support / branch-length extraction and the tree acceptance filters
 */

import { GroupMapping } from './types.js';
import { PhyloTree } from './phylo-tree.js';

// ==================== EXTRACTION ====================

export interface InternalStats {
    /** Support of each annotated internal node, in closing-parenthesis order */
    supports: number[];
    /** Branch length of the same internal nodes, same order */
    branches: number[];
}

/**
 * Collect support and branch length of internal nodes carrying both.
 * Postorder visits internal nodes in the order their ')' appears in the text;
 * the root is included when annotated.
 */
export function extractInternalStats(tree: PhyloTree): InternalStats {
    const supports: number[] = [];
    const branches: number[] = [];

    for (const id of tree.postorder()) {
        const node = tree.get(id);
        if (node.children.length === 0) continue;
        if (node.support === undefined || node.length === undefined) continue;
        supports.push(node.support);
        branches.push(node.length);
    }

    return { supports, branches };
}

// ==================== FILTERS ====================

export interface SupportThresholds {
    minSupport: number;
    minBranch: number;
}

/**
 * Accept only when annotations exist and every value meets its threshold.
 * A tree without internal annotations is rejected.
 */
export function passesSupportFilter(tree: PhyloTree, thresholds: SupportThresholds): boolean {
    const { supports, branches } = extractInternalStats(tree);
    if (supports.length === 0 || branches.length === 0) return false;
    return supports.every(s => s >= thresholds.minSupport)
        && branches.every(b => b >= thresholds.minBranch);
}

export function passesLeafCount(tree: PhyloTree, threshold: number): boolean {
    return tree.leafCount() >= threshold;
}

/** Distinct groups with at least one leaf in the tree; unmapped leaves are ignored */
export function coveredGroups(tree: PhyloTree, mapping: GroupMapping): Set<string> {
    const groups = new Set<string>();
    for (const name of tree.leafNames()) {
        const group = mapping.get(name);
        if (group !== undefined) groups.add(group);
    }
    return groups;
}

export function countCoveredGroups(tree: PhyloTree, mapping: GroupMapping): number {
    return coveredGroups(tree, mapping).size;
}

export function passesGroupCoverage(tree: PhyloTree, mapping: GroupMapping, required: number): boolean {
    return countCoveredGroups(tree, mapping) >= required;
}
