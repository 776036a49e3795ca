/**
 * Newick Exporter - Serialize a PhyloTree back to Newick text
 * Branch lengths are written in fixed-point notation; downstream line-oriented
 * tools choke on exponent notation.
 */

import { NodeId, DEFAULT_CONFIG } from './types.js';
import { PhyloTree } from './phylo-tree.js';
import { isNumericToken } from './newick-parser.js';

export interface NewickExportOptions {
    /** Decimal places for branch lengths */
    precision: number;
    /** Write internal support values */
    support: boolean;
    /** Write internal node names */
    internalNames: boolean;
    /** Write the root's name, support and branch length */
    rootLabel: boolean;
}

/** Leaf names and non-root branch lengths only */
export const DEFAULT_EXPORT_OPTIONS: NewickExportOptions = {
    precision: DEFAULT_CONFIG.precision,
    support: false,
    internalNames: false,
    rootLabel: false
};

/**
 * Quote a label when it would not survive re-parsing bare
 */
export function formatLabel(name: string, internal: boolean): string {
    const needsQuotes = /[\s,():;[\]']/.test(name) || name === '' || (internal && isNumericToken(name));
    if (!needsQuotes) return name;
    return `'${name.replace(/'/g, "''")}'`;
}

export function formatBranchLength(length: number, precision: number): string {
    return length.toFixed(precision);
}

/**
 * Shortest decimal form of a support value, never in exponent notation
 * (1e-7 -> 0.0000001)
 */
export function formatSupport(value: number): string {
    const text = String(value);
    const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
    if (!match) return text;

    const [, sign, whole, fraction = '', exponent] = match;
    const digits = whole + fraction;
    const point = whole.length + Number(exponent);
    if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
    if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
    return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Export a tree to a single `;`-terminated Newick statement.
 * Walks with an explicit stack of open groups; depth is not bounded by the call stack.
 */
export function exportNewick(tree: PhyloTree, options: Partial<NewickExportOptions> = {}): string {
    const opts: NewickExportOptions = {
        precision: options.precision ?? DEFAULT_EXPORT_OPTIONS.precision,
        support: options.support ?? DEFAULT_EXPORT_OPTIONS.support,
        internalNames: options.internalNames ?? DEFAULT_EXPORT_OPTIONS.internalNames,
        rootLabel: options.rootLabel ?? DEFAULT_EXPORT_OPTIONS.rootLabel
    };

    const parts: string[] = [];
    const stack: Array<{ id: NodeId; next: number }> = [{ id: tree.root, next: 0 }];

    while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const children = tree.children(frame.id);

        if (children.length === 0) {
            parts.push(nodeSuffix(tree, frame.id, opts));
            stack.pop();
            continue;
        }
        if (frame.next < children.length) {
            parts.push(frame.next === 0 ? '(' : ',');
            stack.push({ id: children[frame.next], next: 0 });
            frame.next++;
            continue;
        }
        parts.push(')', nodeSuffix(tree, frame.id, opts));
        stack.pop();
    }

    parts.push(';');
    return parts.join('');
}

/** Everything written after a node's children: label, support, branch length */
function nodeSuffix(tree: PhyloTree, id: NodeId, opts: NewickExportOptions): string {
    const node = tree.get(id);
    const labelled = id !== tree.root || opts.rootLabel;
    let out = '';

    if (node.children.length === 0) {
        if (node.name !== undefined) out += formatLabel(node.name, false);
    } else if (labelled) {
        const parts: string[] = [];
        if (opts.internalNames && node.name !== undefined) {
            parts.push(formatLabel(node.name, true));
        }
        if (opts.support && node.support !== undefined) {
            parts.push(formatSupport(node.support));
        }
        out += parts.join(' ');
    }

    if (labelled && node.length !== undefined) {
        out += `:${formatBranchLength(node.length, opts.precision)}`;
    }
    return out;
}
