/**
 * Adapter for the "rule" schema dialect.
 *
 * Every item wraps its variation in a rule: `ContextFree{value}` or
 * `Dependent{path, default, cases}`. Element content sits under `rule.value`,
 * quantities carry an `lsb` expression, Extended item lists mark FX bits with
 * `null`, and Repetitive variations state their repetition (`Regular` or `Fx`).
 */
import { match, P } from 'ts-pattern';
import { SchemaError } from '../asterix/errors.js';
import { DEFAULT_REP_BITS } from '../asterix/format.js';
import type { ItemDescription, VariationDescription } from '../asterix/description.js';
import type { ExplicitPurpose, RepetitionMode } from '../asterix/schema.js';
import {
    asInteger, asObject, asString, describeItemList, parseContentRule, readItemHeader, readSpare,
    type DescribeItem, type JsonObject,
} from './common.js';
import { purposeFromName } from './variation-dialect.js';

export function isRuleItem(item: JsonObject): boolean {
    return 'rule' in item;
}

export function describeRuleItem(item: JsonObject, where: string, describeItem: DescribeItem): ItemDescription {
    if (item['spare'] === true) return readSpare(item, where);
    const header = readItemHeader(item, where);
    const variation = unwrapRule(item['rule'], `${where}(${header.name}).rule`);
    return {
        kind: 'Item',
        ...header,
        variation: describeRuleVariation(variation, `${where}(${header.name})`, header.name, describeItem),
    };
}

/**
 * Item-level rules: context-free variations are used as-is, dependent ones
 * fall back to their default variation.
 */
function unwrapRule(raw: unknown, where: string): unknown {
    const rule = asObject(raw, where);
    switch (rule['type']) {
        case 'ContextFree':
            return rule['value'];
        case 'Dependent':
            return rule['default'];
        default:
            throw new SchemaError(`${where}: unexpected rule type ${String(rule['type'])}`);
    }
}

export function describeRuleVariation(
    raw: unknown,
    where: string,
    ownerName: string,
    describeItem: DescribeItem
): VariationDescription {
    const variation = asObject(raw, `${where}.variation`);
    const type = asString(variation['type'], `${where}.variation.type`);
    switch (type) {
        case 'Element':
            return {
                type: 'Element',
                size: asInteger(variation['size'], `${where}.size`),
                rule: parseContentRule(variation['rule'], `${where}.rule`, 'value'),
            };
        case 'Group':
            return { type: 'Group', items: describeItemList(variation['items'], `${where}.items`, describeItem) };
        case 'Extended': {
            const items = describeItemList(variation['items'], `${where}.items`, describeItem);
            const [first, extents] = chunkSizesFromMarkers(items, `${where}.items`);
            return { type: 'Extended', first, extents, items };
        }
        case 'Repetitive':
            return {
                type: 'Repetitive',
                rep: readRep(variation['rep'], where),
                variation: describeRuleVariation(variation['variation'], `${where}.variation`, ownerName, describeItem),
            };
        case 'Explicit':
            return { type: 'Explicit', purpose: readExplicitPurpose(variation['expl']) ?? purposeFromName(ownerName) };
        case 'Compound': {
            const fspec = variation['fspec'];
            return {
                type: 'Compound',
                fspec: fspec === undefined || fspec === null ? null : asInteger(fspec, `${where}.fspec`),
                items: describeItemList(variation['items'], `${where}.items`, describeItem),
            };
        }
        default:
            throw new SchemaError(`${where}: unexpected variation type ${type}`, ownerName);
    }
}

/**
 * Derives first/extent chunk sizes from the `null` FX markers: every run of
 * items up to a marker plus the FX bit is one chunk. Without markers both
 * chunks default to one octet. Every extent after the first must have the
 * same size.
 */
export function chunkSizesFromMarkers(items: readonly ItemDescription[], where: string = 'Extended'): [number, number] {
    const chunks: number[] = [];
    let bits = 0;
    let pending = false;
    for (const item of items) {
        if (item === null) {
            chunks.push(bits + 1);
            bits = 0;
            pending = false;
            continue;
        }
        bits += itemBits(item);
        pending = true;
    }
    if (pending) chunks.push(bits + 1);
    if (!items.includes(null)) return [8, 8];
    const [first = 8, extents = first, ...rest] = chunks;
    const odd = rest.find((bits) => bits !== extents);
    if (odd !== undefined) {
        throw new SchemaError(`${where}: extents of ${extents} and ${odd} bits in one item`);
    }
    return [first, extents];
}

function itemBits(item: Exclude<ItemDescription, null>): number {
    if (item.kind === 'Spare') return item.bits;
    return match(item.variation)
        .with({ type: 'Element' }, (v) => v.size)
        .with({ type: 'Group' }, (v) => v.items.reduce((sum, i) => sum + (i === null ? 0 : itemBits(i)), 0))
        .otherwise(() => 0);
}

function readRep(raw: unknown, where: string): RepetitionMode {
    return match<unknown, RepetitionMode>(raw)
        .with({ type: 'Fx' }, () => ({ kind: 'Fx' }))
        .with({ type: 'Bounded' }, () => ({ kind: 'Bounded' }))
        .with({ type: 'Regular', size: P.number }, (r) => ({ kind: 'Counted', bits: r.size }))
        .with(P.nullish, { type: 'Regular' }, () => ({ kind: 'Counted', bits: DEFAULT_REP_BITS }))
        .otherwise((r) => {
            throw new SchemaError(`${where}: unexpected repetition ${JSON.stringify(r)}`);
        });
}

function readExplicitPurpose(raw: unknown): ExplicitPurpose | null {
    return match<unknown, ExplicitPurpose | null>(raw)
        .with({ type: 'ReservedExpansion' }, () => 'ReservedExpansion')
        .with({ type: 'SpecialPurpose' }, () => 'SpecialPurpose')
        .with(P.union('ReservedExpansion', 'SpecialPurpose'), (p) => p)
        .otherwise(() => null);
}
