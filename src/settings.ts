/**
 * Settings - resolve run configuration
 * Every classification and filter call receives its values explicitly;
 * nothing here is module-level mutable state.
 */

import { CladekitConfig, CopySets, DEFAULT_CONFIG } from './types.js';
import { UsageError } from './errors.js';

/**
 * Merge overrides with defaults; undefined overrides keep the default
 */
export function resolveConfig(overrides: Partial<CladekitConfig> = {}): CladekitConfig {
    return {
        precision: overrides.precision ?? DEFAULT_CONFIG.precision,
        minSupport: overrides.minSupport ?? DEFAULT_CONFIG.minSupport,
        minBranch: overrides.minBranch ?? DEFAULT_CONFIG.minBranch,
        minLeaves: overrides.minLeaves ?? DEFAULT_CONFIG.minLeaves,
        minGroups: overrides.minGroups ?? DEFAULT_CONFIG.minGroups,
        ratioDigits: overrides.ratioDigits ?? DEFAULT_CONFIG.ratioDigits
    };
}

/**
 * "A,B , C" -> ["A", "B", "C"]; empty items dropped, order kept
 */
export function parseNameList(value: string | undefined): string[] {
    if (!value) return [];
    return value.split(',').map(s => s.trim()).filter(s => s);
}

export function parseNumberOption(value: string | undefined, option: string): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!value.trim() || !Number.isFinite(n)) {
        throw new UsageError(`Option ${option} expects a number, got '${value}'`);
    }
    return n;
}

export function parseIntegerOption(value: string | undefined, option: string): number | undefined {
    const n = parseNumberOption(value, option);
    if (n !== undefined && (!Number.isInteger(n) || n < 0)) {
        throw new UsageError(`Option ${option} expects a non-negative integer, got '${value}'`);
    }
    return n;
}

/**
 * Build the two gene-copy sets; they must be non-empty and disjoint
 */
export function resolveCopySets(a: string | undefined, b: string | undefined): CopySets {
    const setA = new Set(parseNameList(a));
    const setB = new Set(parseNameList(b));
    if (setA.size === 0 || setB.size === 0) {
        throw new UsageError('Both copy sets (-a and -b) are required');
    }
    for (const name of setA) {
        if (setB.has(name)) {
            throw new UsageError(`Copy sets overlap on '${name}'`);
        }
    }
    return { a: setA, b: setB };
}
