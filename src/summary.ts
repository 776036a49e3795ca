/**
 * Summary tables for WGD / WGT classification and filter reports
 */

import { WgdSummary, WgtSummary, DEFAULT_CONFIG } from './types.js';
import { FilterOutcome } from './batch.js';

export type TableRow = string[];

/** Receives rows one at a time; header first */
export interface TableWriter {
    writeRow(row: TableRow): void;
}

export const WGD_HEADER: TableRow = [
    'File', 'Total', 'Independent', 'Shared', 'Uncertain', 'Ind_Ratio', 'Shared_Ratio', 'Skipped', 'Failed'
];

export const WGT_HEADER: TableRow = [
    'File', 'Total_Trees', 'NonShared_Count', 'NonShared_Ratio', 'Shared_Count', 'Shared_Ratio', 'Failed'
];

export function formatRatio(value: number, digits: number = DEFAULT_CONFIG.ratioDigits): string {
    return value.toFixed(digits);
}

export function wgdRow(s: WgdSummary, digits?: number): TableRow {
    return [
        s.file,
        String(s.total),
        String(s.independent),
        String(s.shared),
        String(s.uncertain),
        formatRatio(s.independentRatio, digits),
        formatRatio(s.sharedRatio, digits),
        String(s.skipped),
        String(s.failed)
    ];
}

export function wgtRow(s: WgtSummary, digits?: number): TableRow {
    return [
        s.file,
        String(s.total),
        String(s.nonShared),
        formatRatio(s.nonSharedRatio, digits),
        String(s.shared),
        formatRatio(s.sharedRatio, digits),
        String(s.failed)
    ];
}

export function writeWgdTable(writer: TableWriter, summaries: WgdSummary[], digits?: number): void {
    writer.writeRow(WGD_HEADER);
    for (const s of summaries) writer.writeRow(wgdRow(s, digits));
}

export function writeWgtTable(writer: TableWriter, summaries: WgtSummary[], digits?: number): void {
    writer.writeRow(WGT_HEADER);
    for (const s of summaries) writer.writeRow(wgtRow(s, digits));
}

/**
 * Writer that collects tab-separated lines in memory
 */
export class TsvCollector implements TableWriter {
    private lines: string[] = [];

    writeRow(row: TableRow): void {
        this.lines.push(row.join('\t'));
    }

    toString(): string {
        return this.lines.length > 0 ? `${this.lines.join('\n')}\n` : '';
    }
}

/**
 * Attempted vs passed counts for a filter run
 */
export function formatFilterReport(outcome: FilterOutcome, cutoffs: Array<[string, string | number]> = []): string[] {
    const lines = [
        `Total trees:    ${outcome.attempted}`,
        `Trees passed:   ${outcome.passed.length}`,
        `Parse failures: ${outcome.failures.length}`
    ];
    for (const [label, value] of cutoffs) {
        lines.push(`${label}: ${value}`);
    }
    return lines;
}
