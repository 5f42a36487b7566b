/**
 * Round-Trip Validator
 *
 * Compares the values a record was encoded from with what the decoder
 * produced, field by field, under per-field tolerance rules.
 *
 * Expected values are addressed by field path (`"040/RHO"`, `"010/SAC"`).
 * Fields without a rule must match exactly.
 */
import type { AsterixRecord, FieldValue } from '../asterix-types.js';
import { assertNever } from './schema.js';

export type ToleranceRule =
    /** `|decoded * scale - expected| <= tolerance`; relative compares against |expected| */
    | { readonly kind: 'linear'; readonly tolerance: number; readonly relative?: boolean; readonly scale?: number }
    /** Wrap-aware distance on a circle of `period` (default 360) */
    | { readonly kind: 'circular'; readonly tolerance: number; readonly period?: number; readonly scale?: number }
    | { readonly kind: 'exact' };

export type ToleranceSpec = { readonly [fieldPath: string]: ToleranceRule };

export type ExpectedValue = number | string | Uint8Array;

export type ExpectedRecord = { readonly [fieldPath: string]: ExpectedValue };

export interface FieldCheck {
    path: string;
    expected: ExpectedValue;
    /** Decoded value after scaling; undefined when the field was missing */
    actual: FieldValue | undefined;
    /** Numeric distance for numeric fields, 0 or 1 for exact matches of other values */
    error: number;
    passed: boolean;
}

export interface ErrorSummary {
    count: number;
    mean: number;
    min: number;
    max: number;
}

export interface ValidationStats {
    totalRecords: number;
    successful: number;
    failed: number;
    errors: string[];
    checks: FieldCheck[];
    /** Numeric errors per field path, in check order */
    fieldErrors: Map<string, number[]>;
    /** Missing-field count per top-level item */
    missingItems: Map<string, number>;
}

export interface ValidationResult {
    success: boolean;
    stats: ValidationStats;
}

export function createValidationStats(): ValidationStats {
    return {
        totalRecords: 0,
        successful: 0,
        failed: 0,
        errors: [],
        checks: [],
        fieldErrors: new Map(),
        missingItems: new Map(),
    };
}

// ============================================================================
// Comparisons
// ============================================================================

/**
 * @returns whether `decoded` is within tolerance, and the absolute difference
 */
export function compareValues(
    expected: number,
    decoded: number,
    tolerance: number,
    relative: boolean = false
): { matches: boolean; error: number } {
    const error = Math.abs(decoded - expected);
    if (!relative || expected === 0) return { matches: error <= tolerance, error };
    return { matches: error / Math.abs(expected) <= tolerance, error };
}

/** Shortest distance between two angles on a circle of `period`. */
export function compareAngles(
    expected: number,
    decoded: number,
    tolerance: number,
    period: number = 360
): { matches: boolean; error: number } {
    const a = ((expected % period) + period) % period;
    const b = ((decoded % period) + period) % period;
    let error = Math.abs(b - a);
    if (error > period / 2) error = period - error;
    return { matches: error <= tolerance, error };
}

// ============================================================================
// Records
// ============================================================================

/** Looks up `"040/RHO"` in a record; array indices are accepted as path segments. */
export function getFieldValue(record: AsterixRecord, path: string): FieldValue | undefined {
    const [head, ...rest] = path.split('/');
    let value: FieldValue | undefined = head === undefined ? undefined : record.items.get(head);
    for (const segment of rest) {
        if (value === undefined || typeof value !== 'object' || value instanceof Uint8Array) return undefined;
        value = Array.isArray(value) ? value[Number(segment)] : value[segment];
    }
    return value;
}

/**
 * Checks one record and folds the outcome into `stats` (a fresh stats
 * object when omitted). Neither `expected` nor `record` is modified.
 */
export function validateRecord(
    expected: ExpectedRecord,
    record: AsterixRecord,
    tolerances: ToleranceSpec = {},
    stats: ValidationStats = createValidationStats()
): ValidationResult {
    let success = true;
    for (const [path, expectedValue] of Object.entries(expected)) {
        const check = checkField(path, expectedValue, getFieldValue(record, path), tolerances[path] ?? { kind: 'exact' });
        stats.checks.push(check);
        if (check.actual === undefined) {
            const item = path.split('/')[0] ?? path;
            stats.missingItems.set(item, (stats.missingItems.get(item) ?? 0) + 1);
            stats.errors.push(`${path}: missing from decoded record`);
        } else if (typeof check.actual === 'number' && typeof expectedValue === 'number') {
            const list = stats.fieldErrors.get(path) ?? [];
            list.push(check.error);
            stats.fieldErrors.set(path, list);
        }
        if (!check.passed) {
            success = false;
            if (check.actual !== undefined) {
                stats.errors.push(`${path}: expected ${describe(expectedValue)}, got ${describe(check.actual)} (error ${check.error})`);
            }
        }
    }
    stats.totalRecords++;
    if (success) stats.successful++;
    else stats.failed++;
    return { success, stats };
}

/** Validates records pairwise; a missing or surplus decoded record fails the run. */
export function validateRoundTrip(
    expectedList: readonly ExpectedRecord[],
    records: readonly AsterixRecord[],
    tolerances: ToleranceSpec = {}
): ValidationResult {
    const stats = createValidationStats();
    let success = true;
    for (const [i, expected] of expectedList.entries()) {
        const record = records[i];
        if (record === undefined) {
            stats.totalRecords++;
            stats.failed++;
            stats.errors.push(`record ${i}: not decoded`);
            success = false;
            continue;
        }
        success = validateRecord(expected, record, tolerances, stats).success && success;
    }
    if (records.length > expectedList.length) {
        stats.errors.push(`${records.length - expectedList.length} unexpected decoded record(s)`);
        success = false;
    }
    return { success, stats };
}

function checkField(path: string, expected: ExpectedValue, decoded: FieldValue | undefined, rule: ToleranceRule): FieldCheck {
    if (decoded === undefined) return { path, expected, actual: undefined, error: Number.NaN, passed: false };
    switch (rule.kind) {
        case 'exact':
            if (typeof expected === 'number' && typeof decoded === 'number') {
                const error = Math.abs(decoded - expected);
                return { path, expected, actual: decoded, error, passed: error === 0 };
            }
            return { path, expected, actual: decoded, error: sameValue(expected, decoded) ? 0 : 1, passed: sameValue(expected, decoded) };
        case 'linear':
        case 'circular': {
            if (typeof expected !== 'number' || typeof decoded !== 'number') {
                return { path, expected, actual: decoded, error: Number.NaN, passed: false };
            }
            const actual = decoded * (rule.scale ?? 1);
            const { matches, error } = rule.kind === 'linear'
                ? compareValues(expected, actual, rule.tolerance, rule.relative ?? false)
                : compareAngles(expected, actual, rule.tolerance, rule.period ?? 360);
            return { path, expected, actual, error, passed: matches };
        }
        default:
            return assertNever(rule);
    }
}

function sameValue(expected: ExpectedValue, decoded: FieldValue): boolean {
    if (expected instanceof Uint8Array) {
        return decoded instanceof Uint8Array
            && decoded.length === expected.length
            && decoded.every((b, i) => b === expected[i]);
    }
    return expected === decoded;
}

function describe(value: FieldValue | ExpectedValue): string {
    if (value instanceof Uint8Array) return `<${value.length} bytes>`;
    return JSON.stringify(value);
}

// ============================================================================
// Summaries
// ============================================================================

export function successRate(stats: ValidationStats): number {
    return stats.totalRecords === 0 ? 0 : stats.successful / stats.totalRecords;
}

export function summarizeErrors(errors: readonly number[]): ErrorSummary {
    if (errors.length === 0) return { count: 0, mean: 0, min: 0, max: 0 };
    return {
        count: errors.length,
        mean: errors.reduce((sum, e) => sum + e, 0) / errors.length,
        min: Math.min(...errors),
        max: Math.max(...errors),
    };
}

export function fieldSummaries(stats: ValidationStats): Map<string, ErrorSummary> {
    return new Map([...stats.fieldErrors].map(([path, errors]) => [path, summarizeErrors(errors)]));
}
