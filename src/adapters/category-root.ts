/**
 * Category-root adapter: unwraps a category JSON document in either dialect
 * into a {@link CategoryDescription}, dispatching every item to the dialect
 * it is written in.
 */
import { match, P } from 'ts-pattern';
import { SchemaError } from '../asterix/errors.js';
import type {
    CategoryDescription, ItemDescription, NamedItemDescription, SchemaDialect, UapDescription,
} from '../asterix/description.js';
import type { Edition } from '../asterix/schema.js';
import {
    asArray, asInteger, asObject, asString, describeItemList, isObject, optionalString, type JsonObject,
} from './common.js';
import { describeRuleItem, isRuleItem } from './rule-dialect.js';
import { describeVariationItem, isVariationItem } from './variation-dialect.js';

/** Strips the `contents` wrapper newer schema files carry. */
export function unwrapRoot(raw: unknown, where = 'category'): JsonObject {
    const root = asObject(raw, where);
    const contents = root['contents'];
    return isObject(contents) ? contents : root;
}

export function detectDialect(item: JsonObject): SchemaDialect | null {
    if (isRuleItem(item)) return 'rule';
    if (isVariationItem(item)) return 'variation';
    return null;
}

/** Item dispatcher handed down to both dialect adapters for nested items. */
export function describeItem(raw: unknown, where: string): ItemDescription {
    if (raw === null || raw === undefined) return null;
    const item = asObject(raw, where);
    if (item['spare'] === true) return { kind: 'Spare', bits: asInteger(item['length'] ?? 0, `${where}.length`) };
    switch (detectDialect(item)) {
        case 'rule':
            return describeRuleItem(item, where, describeItem);
        case 'variation':
            return describeVariationItem(item, where, describeItem);
        default:
            throw new SchemaError(`${where}: item has neither a rule nor a variation`, optionalString(item['name']));
    }
}

function describeNamedItem(raw: unknown, where: string): NamedItemDescription {
    const item = describeItem(raw, where);
    if (item === null || item.kind !== 'Item') {
        throw new SchemaError(`${where}: catalogue entries must be named items`);
    }
    return item;
}

export function parseEdition(raw: unknown, where: string): Edition {
    return match<unknown, Edition>(raw)
        .with(P.string, (text) => {
            const found = /^(\d+)\.(\d+)$/.exec(text.trim());
            if (!found) throw new SchemaError(`${where}: malformed edition "${text}"`);
            return { major: Number(found[1]), minor: Number(found[2]) };
        })
        .with({ major: P.number, minor: P.number }, (e) => ({ major: e.major, minor: e.minor }))
        .otherwise(() => {
            throw new SchemaError(`${where}: missing or malformed edition`);
        });
}

function readCategoryNumber(root: JsonObject, where: string): number {
    const category = asInteger(root['category'] ?? root['number'], `${where}.category`);
    if (category < 1 || category > 255) {
        throw new SchemaError(`${where}: category ${category} out of range 1-255`);
    }
    return category;
}

function readUapItems(raw: unknown, where: string): (string | null)[] {
    return asArray(raw, where).map((entry, i) => (entry === null ? null : asString(entry, `${where}[${i}]`)));
}

function readUaps(root: JsonObject, where: string): Pick<CategoryDescription, 'uaps' | 'selector'> {
    const uap = asObject(root['uap'], `${where}.uap`);
    const type = uap['type'];
    if (type === 'uap' || type === undefined) {
        return { uaps: [{ name: 'uap', items: readUapItems(uap['items'], `${where}.uap.items`) }], selector: null };
    }
    if (type !== 'uaps') throw new SchemaError(`${where}: unexpected uap type ${String(type)}`);

    const uaps: UapDescription[] = asArray(uap['variations'], `${where}.uap.variations`).map((entry, i) => {
        const variation = asObject(entry, `${where}.uap.variations[${i}]`);
        return {
            name: asString(variation['name'], `${where}.uap.variations[${i}].name`),
            items: readUapItems(variation['items'], `${where}.uap.variations[${i}].items`),
        };
    });

    const rawSelector = uap['selector'];
    if (!isObject(rawSelector)) return { uaps, selector: null };
    const path = asArray(rawSelector['item'], `${where}.uap.selector.item`)
        .map((p, i) => asString(p, `${where}.uap.selector.item[${i}]`));
    const cases = asArray(rawSelector['cases'], `${where}.uap.selector.cases`).map((entry, i): [number, string] => {
        const pair = asArray(entry, `${where}.uap.selector.cases[${i}]`);
        return [asInteger(pair[0], `${where}.uap.selector.cases[${i}][0]`), asString(pair[1], `${where}.uap.selector.cases[${i}][1]`)];
    });
    return { uaps, selector: { path, cases } };
}

export function describeCategory(raw: unknown): CategoryDescription {
    const root = unwrapRoot(raw);
    const category = readCategoryNumber(root, 'category');
    const where = `category ${category}`;
    const catalogue = asArray(root['catalogue'], `${where}.catalogue`)
        .map((entry, i) => describeNamedItem(entry, `${where}.catalogue[${i}]`));
    return {
        category,
        title: optionalString(root['title']),
        edition: parseEdition(root['edition'], `${where}.edition`),
        catalogue,
        ...readUaps(root, where),
    };
}

/**
 * Describes a reserved-expansion / special-purpose definition. Accepted forms:
 * an item-like object carrying `variation` or `rule`, or an expansion root
 * (`{type: 'Expansion', fspecByteSize, items}`, optionally under `contents`)
 * which becomes a compound with a fixed FSPEC.
 */
export function describeExpansion(raw: unknown, name: string): NamedItemDescription {
    const root = unwrapRoot(raw, `expansion ${name}`);
    const where = `expansion ${name}`;
    if (detectDialect(root) !== null) {
        return describeNamedItem({ ...root, name, title: root['title'] ?? '' }, where);
    }
    const fspecBytes = root['fspecByteSize'];
    return {
        kind: 'Item',
        name,
        title: optionalString(root['title']),
        definition: '',
        remark: '',
        variation: {
            type: 'Compound',
            fspec: fspecBytes === undefined || fspecBytes === null ? null : asInteger(fspecBytes, `${where}.fspecByteSize`) * 8,
            items: describeItemList(root['items'], `${where}.items`, describeItem),
        },
    };
}
