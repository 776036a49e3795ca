/**
 * Tree Validation Tests
 */

import { describe, it, expect } from 'vitest';
import { parseNewick } from '../newick-parser.js';
import { validateTree } from '../validation.js';
import { PhyloTree } from '../phylo-tree.js';
import { nodeNamed } from './helpers/assertions.js';

describe('validateTree', () => {
    it('passes a well-formed tree', () => {
        const result = validateTree(parseNewick('((A:0.1,B:0.2)n1:0.3,(C:0.4,D:0.5)n2:0.6)root;'));
        expect(result).toEqual({ valid: true, issues: [], stats: { errors: 0, warnings: 0, infos: 0 } });
    });

    it('warns about duplicate leaf names and negative lengths', () => {
        const tree = parseNewick('((A:1,B:-0.5),(A:1,C:1));');
        const result = validateTree(tree);

        expect(result.valid).toBe(true);
        expect(result.stats).toEqual({ errors: 0, warnings: 2, infos: 0 });
        expect(result.issues.map(i => i.type)).toEqual(['negative_length', 'duplicate_leaf']);
        expect(result.issues[1].message).toBe("Leaf name 'A' occurs 2 times");
    });

    it('reports unary internal nodes as info', () => {
        const result = validateTree(parseNewick('((A),B);'));
        expect(result.valid).toBe(true);
        expect(result.stats.infos).toBe(1);
        expect(result.issues[0].type).toBe('unary_node');
    });

    it('flags an unnamed leaf as an error', () => {
        const tree = new PhyloTree();
        tree.addChild(tree.root, tree.createNode({ name: 'A' }));
        tree.addChild(tree.root, tree.createNode());
        const result = validateTree(tree);

        expect(result.valid).toBe(false);
        expect(result.issues.map(i => i.type)).toEqual(['unnamed_leaf']);
    });

    it('flags a broken parent link', () => {
        const tree = parseNewick('((A,B)x,C);');
        tree.get(nodeNamed(tree, 'A')).parent = tree.root;
        const result = validateTree(tree);

        expect(result.valid).toBe(false);
        expect(result.issues[0].type).toBe('parent_link');
    });

    it('flags a node listed under two parents', () => {
        const tree = parseNewick('((A,B)x,C);');
        tree.get(tree.root).children.push(nodeNamed(tree, 'A'));
        const result = validateTree(tree);

        expect(result.valid).toBe(false);
        expect(result.issues.some(i => i.type === 'shared_child')).toBe(true);
    });
});
