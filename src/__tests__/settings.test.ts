/**
 * Settings Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveConfig, parseNameList, parseNumberOption, parseIntegerOption, resolveCopySets } from '../settings.js';
import { DEFAULT_CONFIG } from '../types.js';
import { UsageError } from '../errors.js';

describe('resolveConfig', () => {
    it('returns the defaults without overrides', () => {
        expect(resolveConfig()).toEqual({
            precision: 10,
            minSupport: 0.7,
            minBranch: 0.01,
            minLeaves: 4,
            minGroups: 30,
            ratioDigits: 4
        });
    });

    it('applies defined overrides only', () => {
        const config = resolveConfig({ minSupport: 0.9, minBranch: undefined });
        expect(config.minSupport).toBe(0.9);
        expect(config.minBranch).toBe(DEFAULT_CONFIG.minBranch);
    });

    it('does not share state with the defaults', () => {
        const config = resolveConfig();
        config.precision = 2;
        expect(DEFAULT_CONFIG.precision).toBe(10);
    });
});

describe('parseNameList', () => {
    it('splits, trims and drops empty items', () => {
        expect(parseNameList('A,B , C,,')).toEqual(['A', 'B', 'C']);
        expect(parseNameList(undefined)).toEqual([]);
        expect(parseNameList('')).toEqual([]);
    });
});

describe('numeric options', () => {
    it('parses numbers and passes undefined through', () => {
        expect(parseNumberOption('0.85', '-t')).toBe(0.85);
        expect(parseNumberOption(undefined, '-t')).toBeUndefined();
    });

    it('rejects values that are not numbers', () => {
        expect(() => parseNumberOption('high', '-t')).toThrow(UsageError);
        expect(() => parseNumberOption('', '-t')).toThrow("Option -t expects a number, got ''");
    });

    it('requires non-negative integers where asked', () => {
        expect(parseIntegerOption('30', '-c')).toBe(30);
        expect(() => parseIntegerOption('2.5', '-c')).toThrow("Option -c expects a non-negative integer, got '2.5'");
        expect(() => parseIntegerOption('-1', '-c')).toThrow(UsageError);
    });
});

describe('resolveCopySets', () => {
    it('builds both sets', () => {
        const sets = resolveCopySets('1,2', '3, 4');
        expect([...sets.a]).toEqual(['1', '2']);
        expect([...sets.b]).toEqual(['3', '4']);
    });

    it('requires both sets', () => {
        expect(() => resolveCopySets('1,2', undefined)).toThrow('Both copy sets (-a and -b) are required');
        expect(() => resolveCopySets(',', '3')).toThrow(UsageError);
    });

    it('rejects overlapping sets', () => {
        expect(() => resolveCopySets('1,2', '2,3')).toThrow("Copy sets overlap on '2'");
    });
});
