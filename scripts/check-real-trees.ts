#!/usr/bin/env npx tsx
/**
 * Standalone script for checking real gene-tree files against tree invariants.
 *
 * Usage:
 *   npm run test:real -- ./path/to/trees.nwk
 *   REAL_TREES=./path/to/trees.nwk npm run test:real
 *
 * Runs the structural checks on real data without including the data in the
 * standard test suite.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseBatch } from '../src/batch.js';
import { parseNewick } from '../src/newick-parser.js';
import { exportNewick } from '../src/newick-exporter.js';
import { pruneTree } from '../src/prune.js';
import { validateTree } from '../src/validation.js';
import { PhyloTree } from '../src/phylo-tree.js';

interface InvariantResult {
    index: number;
    failures: string[];
}

function sameNames(a: Set<string>, b: Set<string>): boolean {
    return a.size === b.size && [...a].every(x => b.has(x));
}

/**
 * Check basic invariants for a single tree.
 */
function checkInvariants(tree: PhyloTree): string[] {
    const failures: string[] = [];

    try {
        // Check 1: Structure
        const validation = validateTree(tree);
        for (const issue of validation.issues) {
            if (issue.severity === 'error') failures.push(issue.message);
        }

        // Check 2: Round trip keeps the leaf set and node count
        const reparsed = parseNewick(exportNewick(tree, { internalNames: true, support: true, rootLabel: true }));
        if (!sameNames(reparsed.leafNames(), tree.leafNames())) {
            failures.push('Round trip changed the leaf set');
        }
        if (reparsed.size !== tree.size) {
            failures.push(`Round trip changed node count: ${tree.size} -> ${reparsed.size}`);
        }

        // Check 3: Pruning an absent name is a no-op
        const before = reparsed.totalBranchLength();
        const result = pruneTree(reparsed, ['__absent__']);
        if (result.missing.length !== 1 || Math.abs(reparsed.totalBranchLength() - before) > 1e-9) {
            failures.push('Pruning an absent name changed the tree');
        }
    } catch (e) {
        failures.push(`Check error: ${e instanceof Error ? e.message : String(e)}`);
    }

    return failures;
}

function main() {
    const args = process.argv.slice(2);
    const dataPath = args[0] || process.env.REAL_TREES;

    if (!dataPath) {
        console.error('Usage: npm run test:real -- ./path/to/trees.nwk');
        console.error('   or: REAL_TREES=./path/to/trees.nwk npm run test:real');
        process.exit(1);
    }

    const resolvedPath = path.resolve(dataPath);

    if (!fs.existsSync(resolvedPath)) {
        console.error(`File not found: ${resolvedPath}`);
        process.exit(1);
    }

    console.log(`\nLoading trees from: ${resolvedPath}\n`);

    const batch = parseBatch(fs.readFileSync(resolvedPath, 'utf-8'), { source: resolvedPath });

    console.log(`Found ${batch.attempted} statements, ${batch.failures.length} unparseable\n`);
    console.log('Running invariant checks...\n');

    const allResults: InvariantResult[] = [];
    let passCount = 0;
    let failCount = 0;

    for (const { index, tree } of batch.trees) {
        const failures = checkInvariants(tree);

        if (failures.length === 0) {
            passCount++;
            process.stdout.write('.');
        } else {
            failCount++;
            process.stdout.write('F');
            allResults.push({ index, failures });
        }
    }

    console.log('\n');

    console.log('='.repeat(70));
    console.log(`SUMMARY: ${passCount} passed, ${failCount} failed out of ${batch.trees.length}`);
    console.log('='.repeat(70));

    if (allResults.length > 0) {
        console.log('\nFailures:\n');
        for (const result of allResults) {
            console.log(`Tree ${result.index + 1}`);
            for (const failure of result.failures) {
                console.log(`  - ${failure}`);
            }
            console.log('');
        }
    } else {
        console.log('\nAll invariant checks passed!');
    }

    process.exit(failCount > 0 ? 1 : 0);
}

main();
