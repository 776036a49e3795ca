/**
 * Monophyly Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import { parseNewick } from '../newick-parser.js';
import { isMonophyletic, checkMonophyly, commonAncestor, presentLeafNames } from '../monophyly.js';
import { ClassifierError } from '../errors.js';
import { nodeNamed } from './helpers/assertions.js';

describe('isMonophyletic', () => {
    const tree = parseNewick('((A,B)x,(C,D)y)r;');

    it('accepts a clade', () => {
        expect(isMonophyletic(tree, ['A', 'B'])).toBe(true);
        expect(isMonophyletic(tree, ['C', 'D'])).toBe(true);
    });

    it('rejects a set split across clades', () => {
        expect(isMonophyletic(tree, ['A', 'C'])).toBe(false);
        expect(isMonophyletic(tree, ['A', 'B', 'C'])).toBe(false);
    });

    it('accepts the full leaf set', () => {
        expect(isMonophyletic(tree, ['A', 'B', 'C', 'D'])).toBe(true);
    });

    it('treats a single present name as a clade', () => {
        expect(isMonophyletic(tree, ['A'])).toBe(true);
        expect(isMonophyletic(tree, ['A', 'Z'])).toBe(true);
    });

    it('restricts the targets to names present in the tree', () => {
        expect(isMonophyletic(tree, ['A', 'B', 'Z'])).toBe(true);
        expect(isMonophyletic(tree, ['A', 'C', 'Z'])).toBe(false);
    });

    it('ignores internal node names', () => {
        expect(isMonophyletic(tree, ['x', 'A', 'B'])).toBe(true);
    });

    it('handles multifurcations', () => {
        const poly = parseNewick('((A,B,C),D,E);');
        expect(isMonophyletic(poly, ['A', 'B', 'C'])).toBe(true);
        expect(isMonophyletic(poly, ['A', 'B'])).toBe(false);
        expect(isMonophyletic(poly, ['D', 'E'])).toBe(false);
    });

    it('throws ClassifierError when no target is a leaf', () => {
        expect(() => isMonophyletic(tree, ['Z'])).toThrow(ClassifierError);
        expect(() => isMonophyletic(tree, ['Z'])).toThrow('None of 1 target names are leaves of the tree');
    });

    it('throws ClassifierError for an empty target set', () => {
        expect(() => isMonophyletic(tree, [])).toThrow('Target set is empty');
    });
});

describe('checkMonophyly', () => {
    const tree = parseNewick('((A,B)x,(C,D)y)r;');

    it('names the common ancestor and the intruding leaves', () => {
        const report = checkMonophyly(tree, ['A', 'C']);

        expect(report.monophyletic).toBe(false);
        expect(report.commonAncestor).toBe(tree.root);
        expect([...report.intruders]).toEqual(['B', 'D']);
        expect([...report.present]).toEqual(['A', 'C']);
    });

    it('reports a clade with no intruders', () => {
        const report = checkMonophyly(tree, ['A', 'B', 'Z']);

        expect(report.monophyletic).toBe(true);
        expect(report.commonAncestor).toBe(nodeNamed(tree, 'x'));
        expect(report.intruders.size).toBe(0);
        expect([...report.present]).toEqual(['A', 'B']);
    });

    it('agrees with isMonophyletic', () => {
        for (const targets of [['A', 'B'], ['A', 'C'], ['B', 'C', 'D'], ['D']]) {
            expect(checkMonophyly(tree, targets).monophyletic).toBe(isMonophyletic(tree, targets));
        }
    });
});

describe('commonAncestor', () => {
    const tree = parseNewick('(((A,B)x,C)y,D)r;');

    it('finds the most recent common ancestor', () => {
        const a = nodeNamed(tree, 'A');
        expect(commonAncestor(tree, [a, nodeNamed(tree, 'B')])).toBe(nodeNamed(tree, 'x'));
        expect(commonAncestor(tree, [a, nodeNamed(tree, 'C')])).toBe(nodeNamed(tree, 'y'));
        expect(commonAncestor(tree, [a, nodeNamed(tree, 'D')])).toBe(tree.root);
    });

    it('returns the node itself for a single node and null for none', () => {
        const a = nodeNamed(tree, 'A');
        expect(commonAncestor(tree, [a])).toBe(a);
        expect(commonAncestor(tree, [])).toBeNull();
    });
});

describe('presentLeafNames', () => {
    it('keeps only names that are leaves', () => {
        const tree = parseNewick('((A,B)x,C);');
        expect([...presentLeafNames(tree, ['x', 'C', 'Q', 'A'])]).toEqual(['C', 'A']);
    });
});
