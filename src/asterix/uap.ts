import { AsterixError } from './errors.js';
import type { CategorySchema, UapSpec } from './schema.js';
import { contextKey, type FieldContext } from './values.js';

export function defaultUap(schema: CategorySchema): UapSpec {
    const uap = schema.uaps[0];
    if (uap === undefined) throw new AsterixError(`Category ${schema.category} has no UAP`);
    return uap;
}

export function findUap(schema: CategorySchema, name: string): UapSpec {
    const uap = schema.uaps.find((u) => u.name === name);
    if (uap === undefined) {
        throw new AsterixError(
            `Category ${schema.category} has no UAP named ${name} (known: ${schema.uaps.map((u) => u.name).join(', ')})`
        );
    }
    return uap;
}

/**
 * UAP chosen by the category's selector field, once that field has been
 * decoded or encoded into the context. Null when there is no selector, the
 * field is absent, or its value has no case.
 */
export function selectUap(schema: CategorySchema, context: FieldContext): UapSpec | null {
    if (schema.selector === null) return null;
    const value = context.get(contextKey(schema.selector.path));
    if (value === undefined) return null;
    const name = schema.selector.cases.get(value);
    return name === undefined ? null : findUap(schema, name);
}

/** FRN (1-based) of an item in a UAP, or 0 when the UAP does not carry it. */
export function frnOf(uap: UapSpec, itemName: string): number {
    return uap.items.indexOf(itemName) + 1;
}
