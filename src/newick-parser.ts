/**
 * Newick Parser Module
 * Parses Newick statements into PhyloTree structures and splits multi-tree input
 */

import { NodeId } from './types.js';
import { PhyloTree } from './phylo-tree.js';
import { ParseError } from './errors.js';

// ==================== CONSTANTS ====================

/** Characters that end an unquoted label or number */
const DELIMITER = /[\s,():;[\]]/;

/** Plain decimal or exponent notation, no hex, no Infinity */
const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ==================== HELPER FUNCTIONS ====================

export function isNumericToken(token: string): boolean {
    return NUMBER.test(token);
}

interface LabelToken {
    text: string;
    quoted: boolean;
    start: number;
}

/**
 * Cursor over one statement. Whitespace and [bracketed comments] are
 * skipped between tokens.
 */
class NewickReader {
    private i = 0;

    constructor(private readonly s: string) {}

    get position(): number {
        return this.i;
    }

    get done(): boolean {
        return this.i >= this.s.length;
    }

    peek(): string | undefined {
        return this.s[this.i];
    }

    advance(): void {
        this.i++;
    }

    skipWs(): void {
        while (this.i < this.s.length) {
            const c = this.s[this.i];
            if (/\s/.test(c)) {
                this.i++;
            } else if (c === '[') {
                const close = this.s.indexOf(']', this.i);
                if (close === -1) throw new ParseError('Unclosed comment', this.i);
                this.i = close + 1;
            } else {
                break;
            }
        }
    }

    /** Read a quoted or bare label; empty text when none is present */
    readLabel(): LabelToken {
        this.skipWs();
        const start = this.i;
        if (this.s[this.i] === "'") {
            return { text: this.readQuoted(), quoted: true, start };
        }
        while (this.i < this.s.length && !DELIMITER.test(this.s[this.i])) this.i++;
        return { text: this.s.slice(start, this.i), quoted: false, start };
    }

    /** Read a number that must be well-formed (branch lengths) */
    readNumber(what: string): number {
        const token = this.readLabel();
        if (token.quoted || !isNumericToken(token.text)) {
            throw new ParseError(`Malformed ${what} '${token.text}'`, token.start);
        }
        const value = Number(token.text);
        if (!Number.isFinite(value)) {
            throw new ParseError(`Malformed ${what} '${token.text}'`, token.start);
        }
        return value;
    }

    private readQuoted(): string {
        const start = this.i;
        this.i++; // opening quote
        let text = '';
        while (this.i < this.s.length) {
            const c = this.s[this.i];
            if (c === "'") {
                // '' is an escaped quote inside a quoted label
                if (this.s[this.i + 1] === "'") {
                    text += "'";
                    this.i += 2;
                    continue;
                }
                this.i++;
                return text;
            }
            text += c;
            this.i++;
        }
        throw new ParseError('Unclosed quoted label', start);
    }
}

// ==================== MAIN PARSER ====================

/**
 * Parse one Newick statement.
 *
 * Internal labels follow two conventions: a name (`)n1:0.3`) or a bare
 * number read as support (`)0.95:0.05`). A name may be followed by a
 * whitespace-separated support value (`)n1 0.95:0.3`).
 *
 * A missing terminating `;` is tolerated; anything after it is not.
 * Open `(` groups are kept on an explicit stack, so nesting depth is not
 * bounded by the call stack.
 */
export function parseNewick(input: string): PhyloTree {
    let text = input;
    if (text.charCodeAt(0) === 0xFEFF) {
        text = text.slice(1);
    }
    if (!text.trim()) throw new ParseError('Empty Newick statement', 0);

    const reader = new NewickReader(text);
    const tree = new PhyloTree();
    const open: NodeId[] = [];
    let current = tree.root;

    for (;;) {
        reader.skipWs();
        if (reader.peek() === '(') {
            reader.advance();
            open.push(current);
            current = openChild(tree, current);
            continue;
        }

        readLeaf(reader, tree, current);

        // Close groups until a ',' starts the next sibling or the outermost group ends
        let next: NodeId | null = null;
        while (open.length > 0) {
            const groupId = open[open.length - 1];
            reader.skipWs();
            const c = reader.peek();
            if (c === ',') {
                reader.advance();
                next = openChild(tree, groupId);
                break;
            }
            if (c === ')') {
                reader.advance();
                open.pop();
                readInternalLabel(reader, tree, groupId);
                readBranchLength(reader, tree, groupId);
                continue;
            }
            if (c === undefined || c === ';') {
                throw new ParseError("Unclosed '('", reader.position);
            }
            throw new ParseError(`Unexpected '${c}'`, reader.position);
        }
        if (next === null) break;
        current = next;
    }

    reader.skipWs();
    const next = reader.peek();
    if (next === ';') {
        reader.advance();
    } else if (next === ')') {
        throw new ParseError("Unbalanced ')'", reader.position);
    } else if (next !== undefined) {
        throw new ParseError(`Unexpected '${next}'`, reader.position);
    }

    reader.skipWs();
    if (!reader.done) {
        throw new ParseError('Trailing text after ;', reader.position);
    }

    return tree;
}

function openChild(tree: PhyloTree, parentId: NodeId): NodeId {
    const child = tree.createNode();
    tree.addChild(parentId, child);
    return child;
}

function readLeaf(reader: NewickReader, tree: PhyloTree, id: NodeId): void {
    const label = reader.readLabel();
    if (!label.text) {
        throw new ParseError('Leaf without a name', label.start);
    }
    tree.get(id).name = label.text;
    readBranchLength(reader, tree, id);
}

function readBranchLength(reader: NewickReader, tree: PhyloTree, id: NodeId): void {
    reader.skipWs();
    if (reader.peek() === ':') {
        reader.advance();
        tree.get(id).length = reader.readNumber('branch length');
    }
}

function readInternalLabel(reader: NewickReader, tree: PhyloTree, id: NodeId): void {
    const node = tree.get(id);
    const first = reader.readLabel();
    if (!first.text && !first.quoted) return;

    if (!first.quoted && isNumericToken(first.text)) {
        node.support = Number(first.text);
        return;
    }
    node.name = first.text;

    reader.skipWs();
    const c = reader.peek();
    if (c === undefined || DELIMITER.test(c)) return;

    const second = reader.readLabel();
    if (second.quoted || !isNumericToken(second.text)) {
        throw new ParseError(`Malformed support value '${second.text}'`, second.start);
    }
    node.support = Number(second.text);
}

// ==================== STATEMENT SPLITTING ====================

/**
 * Split a blob holding several trees into `;`-terminated statements.
 * `;` never occurs inside a subtree, so every `;` outside quoted labels and
 * comments ends a statement; an unbalanced tree cannot swallow the next one.
 * A final statement missing its `;` gets one.
 */
export function splitNewickStatements(blob: string): string[] {
    const statements: string[] = [];
    let start = 0;
    let i = 0;

    const push = (end: number) => {
        const statement = blob.slice(start, end).trim();
        if (statement) statements.push(`${statement};`);
    };

    while (i < blob.length) {
        const c = blob[i];
        if (c === "'") {
            const close = findQuoteEnd(blob, i);
            i = close === -1 ? blob.length : close + 1;
            continue;
        }
        if (c === '[') {
            const close = blob.indexOf(']', i);
            i = close === -1 ? blob.length : close + 1;
            continue;
        }
        if (c === ';') {
            push(i);
            start = i + 1;
        }
        i++;
    }
    push(blob.length);

    return statements;
}

function findQuoteEnd(s: string, open: number): number {
    let i = open + 1;
    while (i < s.length) {
        if (s[i] === "'") {
            if (s[i + 1] === "'") {
                i += 2;
                continue;
            }
            return i;
        }
        i++;
    }
    return -1;
}
