/**
 * Adapter for the legacy "variation" schema dialect.
 *
 * Items carry `variation: {type, ...}` directly; element content sits under
 * `rule.content`, quantities are given as `scaling` + `fractionalBits` and
 * Extended variations declare their chunk sizes (`first`, `extents`).
 */
import { SchemaError } from '../asterix/errors.js';
import { DEFAULT_REP_BITS } from '../asterix/format.js';
import type { ItemDescription, VariationDescription } from '../asterix/description.js';
import type { ExplicitPurpose, RepetitionMode } from '../asterix/schema.js';
import {
    asInteger, asObject, asString, describeItemList, parseContentRule, readItemHeader, readSpare,
    type DescribeItem, type JsonObject,
} from './common.js';

export function isVariationItem(item: JsonObject): boolean {
    return 'variation' in item && !('rule' in item);
}

export function describeVariationItem(item: JsonObject, where: string, describeItem: DescribeItem): ItemDescription {
    if (item['spare'] === true) return readSpare(item, where);
    const header = readItemHeader(item, where);
    const variation = describeVariation(item['variation'], `${where}(${header.name})`, header.name, describeItem);
    return { kind: 'Item', ...header, variation };
}

export function describeVariation(
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
                rule: parseContentRule(variation['rule'], `${where}.rule`, 'content'),
            };
        case 'Group':
            return { type: 'Group', items: describeItemList(variation['items'], `${where}.items`, describeItem) };
        case 'Extended':
            return {
                type: 'Extended',
                first: asInteger(variation['first'] ?? 8, `${where}.first`),
                extents: asInteger(variation['extents'] ?? 8, `${where}.extents`),
                items: describeItemList(variation['items'], `${where}.items`, describeItem),
            };
        case 'Repetitive':
            return {
                type: 'Repetitive',
                rep: readRep(variation['rep'], where),
                variation: describeVariation(variation['variation'], `${where}.variation`, ownerName, describeItem),
            };
        case 'Explicit':
            return { type: 'Explicit', purpose: purposeFromName(ownerName) };
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

function readRep(raw: unknown, where: string): RepetitionMode {
    if (raw === undefined || raw === null) return { kind: 'Counted', bits: DEFAULT_REP_BITS };
    const rep = asObject(raw, `${where}.rep`);
    switch (rep['type']) {
        case 'Fx':
            return { kind: 'Fx' };
        case 'Bounded':
            return { kind: 'Bounded' };
        case 'Regular':
            return { kind: 'Counted', bits: asInteger(rep['size'] ?? DEFAULT_REP_BITS, `${where}.rep.size`) };
        default:
            throw new SchemaError(`${where}: unexpected repetition ${JSON.stringify(rep)}`);
    }
}

/** Legacy Explicit items carry no purpose; RE and SP are recognized by name. */
export function purposeFromName(name: string): ExplicitPurpose | null {
    if (name === 'RE') return 'ReservedExpansion';
    if (name === 'SP') return 'SpecialPurpose';
    return null;
}
