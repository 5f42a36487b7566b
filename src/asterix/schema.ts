/**
 * Schema AST: the compiled, immutable form of a category.
 *
 * Variations are stored in an arena (`CategorySchema.nodes`) and reference
 * each other by index. Nothing here is mutated after `compileCategory`
 * returns; the whole structure is frozen.
 */
import { SchemaError } from './errors.js';
import type { CodecMode } from './types.js';

export type NodeId = number;

// ============================================================================
// Content rules
// ============================================================================

export type StringEncoding = 'ascii' | 'icao6' | 'octal';

export type ConstraintOp = '<' | '<=' | '>' | '>=';

export interface Constraint {
    readonly op: ConstraintOp;
    readonly bound: number;
}

export type Scaling =
    | { readonly kind: 'Integer'; readonly value: number }
    | { readonly kind: 'Ratio'; readonly numerator: number; readonly denominator: number }
    | { readonly kind: 'Real'; readonly value: number };

export interface DependentCase {
    readonly key: number;
    readonly rule: ContentRule;
}

export type ContentRule =
    | { readonly kind: 'Raw' }
    | { readonly kind: 'Table'; readonly values: ReadonlyMap<number, string> }
    | { readonly kind: 'String'; readonly encoding: StringEncoding }
    | { readonly kind: 'Integer'; readonly signed: boolean; readonly constraints: readonly Constraint[] }
    | {
        readonly kind: 'Quantity';
        readonly scaling: Scaling;
        readonly fractionalBits: number;
        readonly signed: boolean;
        readonly unit: string;
        readonly constraints: readonly Constraint[];
    }
    | { readonly kind: 'Bds' }
    | {
        readonly kind: 'Dependent';
        /** Item/sub-item names of the discriminant field, e.g. `['380', 'IAS', 'IM']` */
        readonly path: readonly string[];
        readonly cases: readonly DependentCase[];
        readonly fallback: ContentRule;
    };

// ============================================================================
// Items & variations
// ============================================================================

export interface NamedItem {
    readonly kind: 'Item';
    readonly name: string;
    readonly title: string;
    readonly variation: NodeId;
}

export interface SpareItem {
    readonly kind: 'Spare';
    readonly bits: number;
}

/** `null` is a placeholder: an FX position or an unused compound slot. */
export type ItemSlot = NamedItem | SpareItem | null;

export type RepetitionMode =
    | { readonly kind: 'Counted'; readonly bits: number }
    | { readonly kind: 'Fx' }
    | { readonly kind: 'Bounded' };

export type ExplicitPurpose = 'ReservedExpansion' | 'SpecialPurpose';

export interface PlacedField {
    readonly item: NamedItem;
    /** Bit offset from the MSB of the chunk */
    readonly offset: number;
    readonly bits: number;
    /** Declared size; differs from `bits` only for clamped fields */
    readonly declaredBits: number;
}

export interface ExtendedChunk {
    readonly bits: number;
    readonly fields: readonly PlacedField[];
}

export interface ElementNode {
    readonly kind: 'Element';
    readonly bitSize: number;
    readonly rule: ContentRule;
}

export interface GroupNode {
    readonly kind: 'Group';
    readonly bitSize: number;
    readonly items: readonly ItemSlot[];
}

export interface ExtendedNode {
    readonly kind: 'Extended';
    readonly firstBits: number;
    readonly extentBits: number;
    readonly items: readonly ItemSlot[];
    readonly chunks: readonly ExtendedChunk[];
}

export interface RepetitiveNode {
    readonly kind: 'Repetitive';
    readonly rep: RepetitionMode;
    readonly element: NodeId;
    /** Size of one repetition */
    readonly bitSize: number;
}

export interface ExplicitNode {
    readonly kind: 'Explicit';
    readonly purpose: ExplicitPurpose | null;
    readonly nested: NodeId | null;
}

export interface CompoundNode {
    readonly kind: 'Compound';
    /** Fixed FSPEC width in bits, or null for an FX-chained FSPEC */
    readonly fspecBits: number | null;
    readonly items: readonly (NamedItem | null)[];
}

export type VariationNode =
    | ElementNode
    | GroupNode
    | ExtendedNode
    | RepetitiveNode
    | ExplicitNode
    | CompoundNode;

// ============================================================================
// Category
// ============================================================================

export interface DataItemSpec {
    readonly name: string;
    readonly title: string;
    readonly definition: string;
    readonly remark: string;
    readonly variation: NodeId;
}

export interface UapSpec {
    readonly name: string;
    /** Index = FRN - 1; `null` for unused FRNs */
    readonly items: readonly (string | null)[];
}

export interface UapSelector {
    /** Path of the field whose raw value picks the UAP, e.g. `['020', 'TYP']` */
    readonly path: readonly string[];
    readonly cases: ReadonlyMap<number, string>;
}

export interface Edition {
    readonly major: number;
    readonly minor: number;
}

export interface CategorySchema {
    readonly category: number;
    readonly title: string;
    readonly edition: Edition;
    readonly checksum: string | null;
    readonly layoutMode: CodecMode;
    readonly nodes: readonly VariationNode[];
    /** Catalogue in declaration order */
    readonly items: ReadonlyMap<string, DataItemSpec>;
    readonly uaps: readonly UapSpec[];
    readonly selector: UapSelector | null;
}

// ============================================================================
// Lookups
// ============================================================================

export function getNode(schema: CategorySchema, id: NodeId): VariationNode {
    const node = schema.nodes[id];
    if (node === undefined) {
        throw new SchemaError(`Dangling variation reference #${id} in category ${schema.category}`);
    }
    return node;
}

export function getItemSpec(schema: CategorySchema, name: string): DataItemSpec {
    const spec = schema.items.get(name);
    if (!spec) {
        throw new SchemaError(`Unknown data item ${name} in category ${schema.category}`, name);
    }
    return spec;
}

/**
 * Bit size of a variation with an a-priori known size. Repetitive variations
 * report the size of one repetition.
 */
export function getVariationSize(nodes: readonly VariationNode[], id: NodeId): number {
    const node = nodes[id];
    if (node === undefined) throw new SchemaError(`Dangling variation reference #${id}`);
    switch (node.kind) {
        case 'Element':
        case 'Group':
        case 'Repetitive':
            return node.bitSize;
        case 'Extended':
        case 'Explicit':
        case 'Compound':
            throw new SchemaError(`Can not determine item size for type ${node.kind}`);
        default:
            return assertNever(node);
    }
}

/** Size of an item slot; placeholders count as zero. */
export function getItemSize(nodes: readonly VariationNode[], slot: ItemSlot): number {
    if (slot === null) return 0;
    if (slot.kind === 'Spare') return slot.bits;
    return getVariationSize(nodes, slot.variation);
}

export function isBdsElement(node: VariationNode): boolean {
    return node.kind === 'Element' && node.rule.kind === 'Bds';
}

export function scalingFactor(scaling: Scaling): number {
    switch (scaling.kind) {
        case 'Integer':
        case 'Real':
            return scaling.value;
        case 'Ratio':
            return scaling.numerator / scaling.denominator;
        default:
            return assertNever(scaling);
    }
}

/** Value of one LSB of a quantity: scaling / 2^fractionalBits. */
export function quantityLsb(rule: { readonly scaling: Scaling; readonly fractionalBits: number }): number {
    return scalingFactor(rule.scaling) / Math.pow(2, rule.fractionalBits);
}

export function assertNever(value: never): never {
    throw new SchemaError(`Unexpected variant: ${JSON.stringify(value)}`);
}

/** A Map whose contents are fixed once constructed. */
export class FrozenMap<K, V> extends Map<K, V> {
    constructor(entries: Iterable<readonly [K, V]>) {
        super();
        for (const [key, value] of entries) super.set(key, value);
    }

    set(key: K): this {
        throw new TypeError(`Cannot set key ${String(key)} of a compiled schema map`);
    }

    delete(key: K): boolean {
        throw new TypeError(`Cannot delete key ${String(key)} of a compiled schema map`);
    }

    clear(): void {
        throw new TypeError('Cannot clear a compiled schema map');
    }
}

/** Recursively freezes a compiled schema, swapping every Map for a FrozenMap. */
export function deepFreeze<T>(value: T): T {
    if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return value;
    if (value instanceof Map) {
        for (const entry of value.values()) deepFreeze(entry);
    } else {
        for (const key of Object.keys(value)) {
            const child: unknown = Reflect.get(value, key);
            Reflect.set(value, key, child instanceof Map && !(child instanceof FrozenMap) ? deepFreeze(new FrozenMap(child)) : deepFreeze(child));
        }
    }
    Object.freeze(value);
    return value;
}
