/**
 * Whole-genome duplication / triplication classification
 *
 * Both classifiers compare the monophyly of species A's and species B's gene
 * copies, but their acceptance rules differ on purpose:
 * - WGD skips trees holding fewer than two copies of A or of B.
 * - WGT classifies every tree; one or zero copies count as monophyletic.
 */

import { CopySets, WgdClass, WgtClass, WgdSummary, WgtSummary } from './types.js';
import { PhyloTree } from './phylo-tree.js';
import { isMonophyletic, presentLeafNames } from './monophyly.js';
import { ParsedBatch } from './batch.js';

// ==================== PER-TREE ====================

/**
 * independent: A and B each monophyletic, ((A1,A2),(B1,B2))
 * shared: neither monophyletic, ((A1,B1),(A2,B2))
 * uncertain: exactly one monophyletic
 */
export function classifyWgd(tree: PhyloTree, sets: CopySets): WgdClass {
    const aHere = presentLeafNames(tree, sets.a);
    const bHere = presentLeafNames(tree, sets.b);
    if (aHere.size < 2 || bHere.size < 2) return 'skipped';

    const monoA = isMonophyletic(tree, aHere);
    const monoB = isMonophyletic(tree, bHere);

    if (monoA && monoB) return 'independent';
    if (!monoA && !monoB) return 'shared';
    return 'uncertain';
}

/**
 * shared: copies of A and B intermingled, neither monophyletic
 * nonShared: A or B monophyletic
 */
export function classifyWgt(tree: PhyloTree, sets: CopySets): WgtClass {
    const aHere = presentLeafNames(tree, sets.a);
    const bHere = presentLeafNames(tree, sets.b);

    const monoA = aHere.size <= 1 || isMonophyletic(tree, aHere);
    const monoB = bHere.size <= 1 || isMonophyletic(tree, bHere);

    return monoA || monoB ? 'nonShared' : 'shared';
}

// ==================== PER-FILE ====================

export function ratio(count: number, total: number): number {
    return total > 0 ? count / total : 0;
}

export function aggregateWgd(batch: ParsedBatch, sets: CopySets): WgdSummary {
    const counts: Record<WgdClass, number> = { independent: 0, shared: 0, uncertain: 0, skipped: 0 };
    for (const { tree } of batch.trees) {
        counts[classifyWgd(tree, sets)]++;
    }

    const total = counts.independent + counts.shared + counts.uncertain;
    return {
        file: batch.source,
        total,
        independent: counts.independent,
        shared: counts.shared,
        uncertain: counts.uncertain,
        skipped: counts.skipped,
        failed: batch.failures.length,
        independentRatio: ratio(counts.independent, total),
        sharedRatio: ratio(counts.shared, total)
    };
}

export function aggregateWgt(batch: ParsedBatch, sets: CopySets): WgtSummary {
    let nonShared = 0;
    let shared = 0;
    for (const { tree } of batch.trees) {
        if (classifyWgt(tree, sets) === 'shared') shared++;
        else nonShared++;
    }

    const total = batch.trees.length;
    return {
        file: batch.source,
        total,
        nonShared,
        shared,
        failed: batch.failures.length,
        nonSharedRatio: ratio(nonShared, total),
        sharedRatio: ratio(shared, total)
    };
}
