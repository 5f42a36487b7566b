import { describe, it, expect } from 'vitest';
import type { AsterixRecord, FieldValue } from '../src/asterix-types.js';
import {
    compareAngles, compareValues, fieldSummaries, getFieldValue, successRate, summarizeErrors,
    validateRecord, validateRoundTrip, type ToleranceSpec,
} from '../src/asterix/validator.js';

function record(items: AsterixRecord['items']): AsterixRecord {
    return { category: 48, length: 0, offset: 0, uap: 'uap', frns: [], items };
}

const decoded = record(new Map<string, FieldValue>([
    ['010', { SAC: 12, SIC: 34 }],
    ['040', { RHO: 26.99609375, THETA: 359.5 }],
    ['240', 'ABC123'],
    ['250', [{ BDS1: 4, BDS2: 0 }]],
    ['SP', Uint8Array.of(0xAA, 0xBB)],
]));

const TOLERANCES: ToleranceSpec = {
    '040/RHO': { kind: 'linear', tolerance: 5, scale: 1852 },
    '040/THETA': { kind: 'circular', tolerance: 1 },
};

describe('comparisons', () => {
    it('compares with absolute and relative tolerance', () => {
        expect(compareValues(100, 100.5, 1)).toEqual({ matches: true, error: 0.5 });
        expect(compareValues(100, 102, 0.01, true)).toEqual({ matches: false, error: 2 });
        expect(compareValues(0, 0.25, 0.5, true)).toEqual({ matches: true, error: 0.25 });
    });

    it('compares angles across the wrap', () => {
        expect(compareAngles(0.5, 359.5, 1)).toEqual({ matches: true, error: 1 });
        expect(compareAngles(-90, 270, 0)).toEqual({ matches: true, error: 0 });
        expect(compareAngles(10, 20, 5)).toEqual({ matches: false, error: 10 });
    });
});

describe('getFieldValue', () => {
    it('walks groups and repetitions', () => {
        expect(getFieldValue(decoded, '010/SIC')).toBe(34);
        expect(getFieldValue(decoded, '250/0/BDS1')).toBe(4);
        expect(getFieldValue(decoded, '240')).toBe('ABC123');
    });

    it('returns undefined for missing paths', () => {
        expect(getFieldValue(decoded, '020')).toBeUndefined();
        expect(getFieldValue(decoded, '240/X')).toBeUndefined();
        expect(getFieldValue(decoded, '250/3/BDS1')).toBeUndefined();
    });
});

describe('validateRecord', () => {
    it('passes values within tolerance', () => {
        const { success, stats } = validateRecord({
            '010/SAC': 12,
            '040/RHO': 50000,
            '040/THETA': 0,
            '240': 'ABC123',
            'SP': Uint8Array.of(0xAA, 0xBB),
        }, decoded, TOLERANCES);
        expect(success).toBe(true);
        expect(stats.successful).toBe(1);
        expect(stats.errors).toEqual([]);
        expect(stats.checks.find((c) => c.path === '040/RHO')).toMatchObject({ actual: 49996.765625, passed: true });
        expect(stats.checks.find((c) => c.path === '040/THETA')).toMatchObject({ error: 0.5, passed: true });
    });

    it('reports mismatches and missing fields', () => {
        const { success, stats } = validateRecord({ '010/SIC': 35, '240': 'XYZ', '020/TYP': 'Plot' }, decoded);
        expect(success).toBe(false);
        expect(stats.failed).toBe(1);
        expect(stats.errors).toEqual([
            '010/SIC: expected 35, got 34 (error 1)',
            '240: expected "XYZ", got "ABC123" (error 1)',
            '020/TYP: missing from decoded record',
        ]);
        expect(stats.missingItems).toEqual(new Map([['020', 1]]));
    });

    it('fails numeric tolerances applied to text', () => {
        const { success } = validateRecord({ '240': 1 }, decoded, { '240': { kind: 'linear', tolerance: 1 } });
        expect(success).toBe(false);
    });

    it('describes byte payloads by length', () => {
        const { stats } = validateRecord({ 'SP': Uint8Array.of(0xAA) }, decoded);
        expect(stats.errors).toEqual(['SP: expected <1 bytes>, got <2 bytes> (error 1)']);
    });

    it('does not modify its inputs', () => {
        const expected = { '010/SAC': 12 };
        validateRecord(expected, decoded);
        expect(expected).toEqual({ '010/SAC': 12 });
        expect(decoded.items.get('010')).toEqual({ SAC: 12, SIC: 34 });
    });
});

describe('validateRoundTrip', () => {
    it('accumulates stats over records', () => {
        const { success, stats } = validateRoundTrip(
            [{ '040/RHO': 50000 }, { '040/RHO': 49990 }],
            [decoded, decoded],
            TOLERANCES
        );
        expect(success).toBe(false);
        expect(stats.totalRecords).toBe(2);
        expect(successRate(stats)).toBe(0.5);
        expect(fieldSummaries(stats).get('040/RHO')).toEqual({ count: 2, mean: 5, min: 3.234375, max: 6.765625 });
    });

    it('flags missing and surplus records', () => {
        expect(validateRoundTrip([{}, {}], [decoded]).stats.errors).toEqual(['record 1: not decoded']);
        expect(validateRoundTrip([], [decoded]).stats.errors).toEqual(['1 unexpected decoded record(s)']);
    });
});

describe('summarizeErrors', () => {
    it('summarizes an empty list as zeros', () => {
        expect(summarizeErrors([])).toEqual({ count: 0, mean: 0, min: 0, max: 0 });
        expect(summarizeErrors([1, 2, 6])).toEqual({ count: 3, mean: 3, min: 1, max: 6 });
    });

    it('reports a zero success rate without records', () => {
        expect(successRate(validateRoundTrip([], []).stats)).toBe(0);
    });
});
