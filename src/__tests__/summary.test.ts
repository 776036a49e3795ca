/**
 * Summary Table Tests
 */

import { describe, it, expect } from 'vitest';
import {
    TsvCollector,
    formatRatio,
    wgdRow,
    wgtRow,
    writeWgdTable,
    writeWgtTable,
    formatFilterReport,
    WGD_HEADER,
    WGT_HEADER
} from '../summary.js';
import { WgdSummary, WgtSummary } from '../types.js';

const wgd: WgdSummary = {
    file: 'wgd_mixed.nwk',
    total: 3,
    independent: 1,
    shared: 1,
    uncertain: 1,
    skipped: 1,
    failed: 1,
    independentRatio: 1 / 3,
    sharedRatio: 1 / 3
};

const wgt: WgtSummary = {
    file: 'wgt.nwk',
    total: 4,
    nonShared: 3,
    shared: 1,
    failed: 0,
    nonSharedRatio: 0.75,
    sharedRatio: 0.25
};

describe('formatRatio', () => {
    it('uses four decimals by default', () => {
        expect(formatRatio(1 / 3)).toBe('0.3333');
        expect(formatRatio(0)).toBe('0.0000');
    });

    it('takes an explicit digit count', () => {
        expect(formatRatio(2 / 3, 2)).toBe('0.67');
    });
});

describe('rows', () => {
    it('lays out a WGD row in header order', () => {
        expect(WGD_HEADER).toHaveLength(9);
        expect(wgdRow(wgd)).toEqual(['wgd_mixed.nwk', '3', '1', '1', '1', '0.3333', '0.3333', '1', '1']);
    });

    it('lays out a WGT row in header order', () => {
        expect(WGT_HEADER).toHaveLength(7);
        expect(wgtRow(wgt)).toEqual(['wgt.nwk', '4', '3', '0.7500', '1', '0.2500', '0']);
    });
});

describe('tables', () => {
    it('writes a header and one line per file', () => {
        const out = new TsvCollector();
        writeWgdTable(out, [wgd], 2);

        expect(out.toString()).toBe(
            'File\tTotal\tIndependent\tShared\tUncertain\tInd_Ratio\tShared_Ratio\tSkipped\tFailed\n' +
            'wgd_mixed.nwk\t3\t1\t1\t1\t0.33\t0.33\t1\t1\n'
        );
    });

    it('writes a header even without files', () => {
        const out = new TsvCollector();
        writeWgtTable(out, []);
        expect(out.toString()).toBe(
            'File\tTotal_Trees\tNonShared_Count\tNonShared_Ratio\tShared_Count\tShared_Ratio\tFailed\n'
        );
    });

    it('is empty before any row', () => {
        expect(new TsvCollector().toString()).toBe('');
    });
});

describe('formatFilterReport', () => {
    it('lists counts followed by the cutoffs used', () => {
        const lines = formatFilterReport(
            { source: 'in.nwk', attempted: 5, parsed: 4, passed: ['(A,B);', '(C,D);'], failures: [{ index: 2, text: '(', message: 'x' }] },
            [['Support cutoff', 0.7], ['Branch cutoff', '0.01']]
        );

        expect(lines).toEqual([
            'Total trees:    5',
            'Trees passed:   2',
            'Parse failures: 1',
            'Support cutoff: 0.7',
            'Branch cutoff: 0.01'
        ]);
    });
});
