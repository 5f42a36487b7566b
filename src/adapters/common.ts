/**
 * Helpers shared by the schema dialect adapters: JSON shape checks, number
 * objects (`Integer`, `Ratio`, `Real`, `Div`, `Pow`), constraints and content
 * rules. Both dialects describe content the same way except for Quantity
 * scaling (`scaling` + `fractionalBits` vs. `lsb`) and the key holding the
 * content (`content` vs. `value`).
 */
import { match, P } from 'ts-pattern';
import { SchemaError } from '../asterix/errors.js';
import type { Constraint, ContentRule, DependentCase, Scaling, StringEncoding } from '../asterix/schema.js';
import type { ItemDescription } from '../asterix/description.js';

export type JsonObject = { readonly [key: string]: unknown };

/** Dispatches a nested item to whichever dialect it is written in. */
export type DescribeItem = (raw: unknown, where: string) => ItemDescription;

export function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asObject(value: unknown, where: string): JsonObject {
    if (!isObject(value)) {
        throw new SchemaError(`${where}: expected an object, got ${describeJson(value)}`);
    }
    return value;
}

export function asArray(value: unknown, where: string): readonly unknown[] {
    if (!Array.isArray(value)) {
        throw new SchemaError(`${where}: expected an array, got ${describeJson(value)}`);
    }
    const list: readonly unknown[] = value;
    return list;
}

export function asString(value: unknown, where: string): string {
    if (typeof value !== 'string') {
        throw new SchemaError(`${where}: expected a string, got ${describeJson(value)}`);
    }
    return value;
}

export function asInteger(value: unknown, where: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new SchemaError(`${where}: expected an integer, got ${describeJson(value)}`);
    }
    return value;
}

export function optionalString(value: unknown): string {
    return typeof value === 'string' ? value : '';
}

function describeJson(value: unknown): string {
    if (value === undefined) return 'nothing';
    const text = JSON.stringify(value);
    return text.length > 60 ? `${text.slice(0, 57)}...` : text;
}

// ============================================================================
// Items
// ============================================================================

export interface ItemHeader {
    name: string;
    title: string;
    definition: string;
    remark: string;
}

export function readItemHeader(item: JsonObject, where: string): ItemHeader {
    const name = asString(item['name'], `${where}.name`);
    const doc = item['documentation'];
    const documentation: JsonObject = isObject(doc) ? doc : {};
    return {
        name,
        title: optionalString(item['title']),
        definition: optionalString(item['definition'] ?? documentation['definition']),
        remark: optionalString(item['remark'] ?? documentation['remark']),
    };
}

/** `{spare: true, length: n}` in both dialects. */
export function readSpare(item: JsonObject, where: string): ItemDescription {
    return { kind: 'Spare', bits: asInteger(item['length'] ?? 0, `${where}.length`) };
}

export function describeItemList(raw: unknown, where: string, describeItem: DescribeItem): ItemDescription[] {
    return asArray(raw, where).map((entry, i) => describeItem(entry, `${where}[${i}]`));
}

// ============================================================================
// Numbers
// ============================================================================

export function evaluateNumber(value: unknown, where: string): number {
    return match<unknown, number>(value)
        .with({ type: 'Integer', value: P.number }, (v) => v.value)
        .with({ type: 'Real', value: P.number }, (v) => v.value)
        .with({ type: 'Ratio', value: { numerator: P.number, denominator: P.number } }, (v) =>
            ratio(v.value.numerator, v.value.denominator, where))
        .with({ type: 'Div', numerator: P._, denominator: P._ }, (v) =>
            ratio(evaluateNumber(v.numerator, where), evaluateNumber(v.denominator, where), where))
        .with({ type: 'Pow', base: P.number, exponent: P.number }, (v) => Math.pow(v.base, v.exponent))
        .with(P.number, (v) => v)
        .otherwise((v) => {
            throw new SchemaError(`${where}: unexpected number ${describeJson(v)}`);
        });
}

function ratio(numerator: number, denominator: number, where: string): number {
    if (denominator === 0) throw new SchemaError(`${where}: division by zero`);
    return numerator / denominator;
}

export function toScaling(value: unknown, where: string): Scaling {
    return match<unknown, Scaling>(value)
        .with({ type: 'Integer', value: P.number }, (v) => ({ kind: 'Integer', value: v.value }))
        .with({ type: 'Ratio', value: { numerator: P.number, denominator: P.number } }, (v) => {
            ratio(v.value.numerator, v.value.denominator, where);
            return { kind: 'Ratio', numerator: v.value.numerator, denominator: v.value.denominator };
        })
        .otherwise((v) => ({ kind: 'Real', value: evaluateNumber(v, where) }));
}

/**
 * Normalizes an LSB expression into scaling + fractional bits:
 * `n / 2^e` becomes `{scaling: n, fractionalBits: e}`, anything else keeps
 * fractionalBits at 0.
 */
export function normalizeLsb(lsb: unknown, where: string): { scaling: Scaling; fractionalBits: number } {
    return match<unknown, { scaling: Scaling; fractionalBits: number }>(lsb)
        .with({ type: 'Div', numerator: P._, denominator: { type: 'Pow', base: 2, exponent: P.number } }, (v) => ({
            scaling: toScaling(v.numerator, where),
            fractionalBits: v.denominator.exponent,
        }))
        .with({ type: 'Div', numerator: P._, denominator: P._ }, (v) => ({
            scaling: {
                kind: 'Ratio',
                numerator: evaluateNumber(v.numerator, where),
                denominator: evaluateNumber(v.denominator, where),
            },
            fractionalBits: 0,
        }))
        .otherwise((v) => ({ scaling: toScaling(v, where), fractionalBits: 0 }));
}

export function parseConstraints(raw: unknown, where: string): Constraint[] {
    if (raw === undefined || raw === null) return [];
    return asArray(raw, where).map((entry, i) =>
        match<unknown, Constraint>(entry)
            .with({ type: P.union('<', '<=', '>', '>='), value: P._ }, (c) => ({
                op: c.type,
                bound: evaluateNumber(c.value, `${where}[${i}]`),
            }))
            .otherwise((c) => {
                throw new SchemaError(`${where}[${i}]: unexpected constraint ${describeJson(c)}`);
            })
    );
}

// ============================================================================
// Content rules
// ============================================================================

const STRING_VARIATIONS: Record<string, StringEncoding> = {
    StringAscii: 'ascii',
    StringICAO: 'icao6',
    StringOctal: 'octal',
};

/** Parses a content description (`{type: 'Raw' | 'Table' | ...}`). */
export function parseContent(raw: unknown, where: string): ContentRule {
    const content = asObject(raw, where);
    const type = asString(content['type'], `${where}.type`);
    switch (type) {
        case 'Raw':
            return { kind: 'Raw' };
        case 'Bds':
            return { kind: 'Bds' };
        case 'Table': {
            const values = new Map<number, string>();
            for (const [i, entry] of asArray(content['values'] ?? [], `${where}.values`).entries()) {
                const pair = asArray(entry, `${where}.values[${i}]`);
                values.set(asInteger(pair[0], `${where}.values[${i}][0]`), asString(pair[1], `${where}.values[${i}][1]`));
            }
            return { kind: 'Table', values };
        }
        case 'String': {
            const variation = asString(content['variation'], `${where}.variation`);
            const encoding = STRING_VARIATIONS[variation];
            if (!encoding) throw new SchemaError(`${where}: unexpected string variation ${variation}`);
            return { kind: 'String', encoding };
        }
        case 'Integer':
            return {
                kind: 'Integer',
                signed: content['signed'] === true,
                constraints: parseConstraints(content['constraints'], `${where}.constraints`),
            };
        case 'Quantity': {
            const { scaling, fractionalBits } = 'lsb' in content
                ? normalizeLsb(content['lsb'], `${where}.lsb`)
                : {
                    scaling: toScaling(content['scaling'] ?? { type: 'Integer', value: 1 }, `${where}.scaling`),
                    fractionalBits: asInteger(content['fractionalBits'] ?? 0, `${where}.fractionalBits`),
                };
            return {
                kind: 'Quantity',
                scaling,
                fractionalBits,
                signed: content['signed'] === true,
                unit: optionalString(content['unit']),
                constraints: parseConstraints(content['constraints'], `${where}.constraints`),
            };
        }
        default:
            throw new SchemaError(`${where}: unexpected content type ${type}`);
    }
}

/**
 * Parses an element's content rule. `contentKey` is where the dialect keeps
 * context-free content (`content` in the variation dialect, `value` in the
 * rule dialect); the other key is accepted too. A missing rule means Raw.
 */
export function parseContentRule(raw: unknown, where: string, contentKey: 'content' | 'value'): ContentRule {
    if (raw === undefined || raw === null) return { kind: 'Raw' };
    const rule = asObject(raw, where);
    const type = rule['type'];
    if (type === undefined) return { kind: 'Raw' };
    if (type === 'ContextFree') {
        const otherKey = contentKey === 'content' ? 'value' : 'content';
        return parseContent(rule[contentKey] ?? rule[otherKey], `${where}.${contentKey}`);
    }
    if (type === 'Dependent') {
        const path = asArray(rule['path'], `${where}.path`).map((p, i) => asString(p, `${where}.path[${i}]`));
        const cases: DependentCase[] = asArray(rule['cases'] ?? [], `${where}.cases`).map((entry, i) => {
            const pair = asArray(entry, `${where}.cases[${i}]`);
            const keyRaw = pair[0];
            const key: unknown = Array.isArray(keyRaw) ? keyRaw[0] : keyRaw;
            return {
                key: asInteger(key, `${where}.cases[${i}][0]`),
                rule: parseContentRule(pair[1], `${where}.cases[${i}][1]`, contentKey),
            };
        });
        const fallbackRaw = rule['default'];
        const fallback: ContentRule = fallbackRaw === undefined || fallbackRaw === null
            ? { kind: 'Raw' }
            : parseContentRule(fallbackRaw, `${where}.default`, contentKey);
        return { kind: 'Dependent', path, cases, fallback };
    }
    // Bare content (`{type: 'Quantity', ...}`) as found inside Dependent cases
    return parseContent(rule, where);
}
