/**
 * Canonical item description produced by the dialect adapters and consumed
 * by the compiler. Plain nested data, not yet sized or validated.
 */
import type { ContentRule, Edition, ExplicitPurpose, RepetitionMode } from './schema.js';

export type SchemaDialect = 'variation' | 'rule';

export type VariationDescription =
    | { readonly type: 'Element'; readonly size: number; readonly rule: ContentRule }
    | { readonly type: 'Group'; readonly items: readonly ItemDescription[] }
    | {
        readonly type: 'Extended';
        readonly first: number;
        readonly extents: number;
        readonly items: readonly ItemDescription[];
    }
    | { readonly type: 'Repetitive'; readonly rep: RepetitionMode; readonly variation: VariationDescription }
    | { readonly type: 'Explicit'; readonly purpose: ExplicitPurpose | null }
    | { readonly type: 'Compound'; readonly fspec: number | null; readonly items: readonly ItemDescription[] };

export interface NamedItemDescription {
    readonly kind: 'Item';
    readonly name: string;
    readonly title: string;
    readonly definition: string;
    readonly remark: string;
    readonly variation: VariationDescription;
}

export type ItemDescription =
    | NamedItemDescription
    | { readonly kind: 'Spare'; readonly bits: number }
    | null;

export interface UapDescription {
    readonly name: string;
    readonly items: readonly (string | null)[];
}

export interface CategoryDescription {
    readonly category: number;
    readonly title: string;
    readonly edition: Edition;
    readonly catalogue: readonly NamedItemDescription[];
    readonly uaps: readonly UapDescription[];
    readonly selector: { readonly path: readonly string[]; readonly cases: readonly (readonly [number, string])[] } | null;
}
