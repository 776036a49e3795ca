/**
 * WGD / WGT Classification Tests
 */

import { describe, it, expect } from 'vitest';
import { parseNewick } from '../newick-parser.js';
import { classifyWgd, classifyWgt, aggregateWgd, aggregateWgt, ratio } from '../polyploidy.js';
import { parseBatch } from '../batch.js';
import { CopySets } from '../types.js';
import { loadFixture } from './helpers/loadFixture.js';

const pairSets: CopySets = { a: new Set(['1', '2']), b: new Set(['3', '4']) };
const tripleSets: CopySets = { a: new Set(['1', '2', '3']), b: new Set(['4', '5', '6']) };

describe('classifyWgd', () => {
    it('calls separate clades independent', () => {
        expect(classifyWgd(parseNewick('((1,2),(3,4));'), pairSets)).toBe('independent');
    });

    it('calls interleaved copies shared', () => {
        expect(classifyWgd(parseNewick('((1,3),(2,4));'), pairSets)).toBe('shared');
    });

    it('calls a single monophyletic side uncertain', () => {
        expect(classifyWgd(parseNewick('(((1,2),3),(4,5));'), pairSets)).toBe('uncertain');
    });

    it('skips trees with fewer than two copies on either side', () => {
        expect(classifyWgd(parseNewick('((1,2),3);'), pairSets)).toBe('skipped');
        expect(classifyWgd(parseNewick('(1,(3,4));'), pairSets)).toBe('skipped');
        expect(classifyWgd(parseNewick('(X,Y);'), pairSets)).toBe('skipped');
        expect(classifyWgd(parseNewick('((1,2,3),4);'), { a: new Set(['1', '2']), b: new Set(['3', '5']) }))
            .toBe('skipped');
    });

    it('classifies a tree once both sides have two copies', () => {
        expect(classifyWgd(parseNewick('((1,2,3),4);'), pairSets)).toBe('shared');
    });

    it('ignores leaves outside both sets', () => {
        expect(classifyWgd(parseNewick('(((1,2),X),((3,4),Y));'), pairSets)).toBe('independent');
    });
});

describe('classifyWgt', () => {
    it('calls separate clades nonShared', () => {
        expect(classifyWgt(parseNewick('((1,2,3),(4,5,6));'), tripleSets)).toBe('nonShared');
    });

    it('calls fully interleaved copies shared', () => {
        expect(classifyWgt(parseNewick('((1,4),(2,5),(3,6));'), tripleSets)).toBe('shared');
        expect(classifyWgt(parseNewick('((1,4),(2,5));'), tripleSets)).toBe('shared');
    });

    it('counts one or zero copies as monophyletic', () => {
        expect(classifyWgt(parseNewick('((1,4),5);'), tripleSets)).toBe('nonShared');
        expect(classifyWgt(parseNewick('(X,Y);'), tripleSets)).toBe('nonShared');
    });

    it('classifies trees the duplication classifier skips', () => {
        const tree = parseNewick('(1,(3,4));');
        expect(classifyWgd(tree, pairSets)).toBe('skipped');
        expect(classifyWgt(tree, pairSets)).toBe('nonShared');
    });
});

describe('ratio', () => {
    it('divides and guards against zero totals', () => {
        expect(ratio(1, 4)).toBe(0.25);
        expect(ratio(0, 0)).toBe(0);
    });
});

describe('aggregation over a file', () => {
    const batch = parseBatch(loadFixture('wgd_mixed.nwk'), { source: 'wgd_mixed.nwk' });

    it('counts WGD verdicts and keeps skipped trees out of the total', () => {
        expect(aggregateWgd(batch, pairSets)).toEqual({
            file: 'wgd_mixed.nwk',
            total: 3,
            independent: 1,
            shared: 1,
            uncertain: 1,
            skipped: 1,
            failed: 1,
            independentRatio: 1 / 3,
            sharedRatio: 1 / 3
        });
    });

    it('counts WGT verdicts over every parsed tree', () => {
        expect(aggregateWgt(batch, pairSets)).toEqual({
            file: 'wgd_mixed.nwk',
            total: 4,
            nonShared: 3,
            shared: 1,
            failed: 1,
            nonSharedRatio: 0.75,
            sharedRatio: 0.25
        });
    });

    it('reports zero ratios for an empty file', () => {
        const empty = parseBatch('', { source: 'empty.nwk' });
        const summary = aggregateWgd(empty, pairSets);
        expect(summary.total).toBe(0);
        expect(summary.independentRatio).toBe(0);
        expect(aggregateWgt(empty, pairSets).sharedRatio).toBe(0);
    });
});
