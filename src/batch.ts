/**
 * Batch runner - one input blob at a time
 *
 * Splits a blob into statements, parses each independently and keeps going
 * past malformed ones. Counts stay visible so skipped trees are never silent.
 */

import { PhyloTree } from './phylo-tree.js';
import { parseNewick, splitNewickStatements } from './newick-parser.js';
import { isParseError } from './errors.js';
import { Logger, silentLogger } from './logger.js';

export interface ParsedStatement {
    /** 0-based position of the statement in the input */
    index: number;
    /** Original statement text, `;` included */
    text: string;
    tree: PhyloTree;
}

export interface ParseFailure {
    index: number;
    text: string;
    message: string;
}

export interface ParsedBatch {
    source: string;
    attempted: number;
    trees: ParsedStatement[];
    failures: ParseFailure[];
}

export interface BatchOptions {
    /** Label used in log lines and summaries (usually the file name) */
    source?: string;
    logger?: Logger;
}

/** Shorten a statement for log output */
function preview(text: string): string {
    return text.length > 30 ? `${text.slice(0, 30)}...` : text;
}

/**
 * Parse every statement in a blob; ParseErrors are recorded, not thrown.
 * Other errors propagate.
 */
export function parseBatch(blob: string, options: BatchOptions = {}): ParsedBatch {
    const logger = options.logger ?? silentLogger;
    const source = options.source ?? '<input>';
    const statements = splitNewickStatements(blob);

    const batch: ParsedBatch = { source, attempted: statements.length, trees: [], failures: [] };

    statements.forEach((text, index) => {
        try {
            batch.trees.push({ index, text, tree: parseNewick(text) });
        } catch (err) {
            if (!isParseError(err)) throw err;
            logger.warn(`${source}: skipping tree ${index + 1}: ${preview(text)} (${err.message})`);
            batch.failures.push({ index, text, message: err.message });
        }
    });

    return batch;
}

export interface FilterOutcome {
    source: string;
    attempted: number;
    parsed: number;
    /** Statements that passed, in input order, text unchanged */
    passed: string[];
    failures: ParseFailure[];
}

/**
 * Keep the statements whose parsed tree satisfies the predicate
 */
export function filterBatch(
    blob: string,
    predicate: (tree: PhyloTree) => boolean,
    options: BatchOptions = {}
): FilterOutcome {
    const batch = parseBatch(blob, options);
    const passed = batch.trees.filter(s => predicate(s.tree)).map(s => s.text);
    return {
        source: batch.source,
        attempted: batch.attempted,
        parsed: batch.trees.length,
        passed,
        failures: batch.failures
    };
}
