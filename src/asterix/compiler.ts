/**
 * Bit-Layout Compiler
 *
 * Turns a category description (either dialect) into an immutable
 * {@link CategorySchema}: variations are interned into a node arena, every
 * fixed block is sized and checked for byte alignment, Extended items get
 * their chunk layout precomputed, and UAPs are validated against the
 * catalogue.
 */
import { describeCategory, describeExpansion } from '../adapters/category-root.js';
import type { CategorySource } from '../asterix-types.js';
import type {
    CategoryDescription, ItemDescription, NamedItemDescription, VariationDescription,
} from './description.js';
import { AlignmentError, SchemaError } from './errors.js';
import { MAX_NUMERIC_BITS } from './format.js';
import {
    assertNever, deepFreeze, getItemSize, getVariationSize,
    type CategorySchema, type ContentRule, type DataItemSpec, type ExplicitPurpose, type ExtendedChunk,
    type ItemSlot, type NamedItem, type NodeId, type PlacedField, type UapSpec, type UapSelector,
    type VariationNode,
} from './schema.js';
import { DEFAULT_COMPILER_OPTIONS, type AsterixLogger, type CodecMode, type CompilerOptions } from './types.js';

interface Owner {
    readonly name: string;
    readonly title: string;
}

export function compileCategory(source: CategorySource, options: CompilerOptions = {}): CategorySchema {
    const opts = { ...DEFAULT_COMPILER_OPTIONS, ...options };
    const description = describeCategory(source.root);
    return compileDescription(description, { ...opts, checksum: opts.checksum ?? source.checksum });
}

export function compileDescription(description: CategoryDescription, options: CompilerOptions = {}): CategorySchema {
    const opts = { ...DEFAULT_COMPILER_OPTIONS, ...options };
    const compiler = new LayoutCompiler(opts.layoutMode, opts.logger, {
        ReservedExpansion: opts.expansions.re === undefined ? null : describeExpansion(opts.expansions.re, 'RE'),
        SpecialPurpose: opts.expansions.sp === undefined ? null : describeExpansion(opts.expansions.sp, 'SP'),
    });

    const items = new Map<string, DataItemSpec>();
    for (const item of description.catalogue) {
        if (items.has(item.name)) {
            throw new SchemaError(`Duplicate data item ${item.name} in category ${description.category}`, item.name);
        }
        const variation = compiler.compileVariation(item.variation, item);
        compiler.requireBlockAligned(variation, item);
        items.set(item.name, {
            name: item.name,
            title: item.title,
            definition: item.definition,
            remark: item.remark,
            variation,
        });
    }

    const uaps = compileUaps(description, items);
    const selector = compileSelector(description, uaps);

    const schema: CategorySchema = {
        category: description.category,
        title: description.title,
        edition: { ...description.edition },
        checksum: opts.checksum,
        layoutMode: opts.layoutMode,
        nodes: compiler.nodes,
        items,
        uaps,
        selector,
    };
    for (const path of compiler.dependentPaths) resolveFieldPath(schema, path);
    if (selector) resolveFieldPath(schema, selector.path);

    opts.logger?.info?.(
        `Compiled category ${schema.category} v${schema.edition.major}.${schema.edition.minor}: ` +
        `${items.size} items, ${uaps.length} UAP(s), ${compiler.nodes.length} nodes`
    );
    return deepFreeze(schema);
}

// ============================================================================
// Variations
// ============================================================================

class LayoutCompiler {
    readonly nodes: VariationNode[] = [];
    readonly dependentPaths: (readonly string[])[] = [];

    constructor(
        private readonly layoutMode: CodecMode,
        private readonly logger: AsterixLogger | null,
        private readonly expansions: Readonly<Record<ExplicitPurpose, NamedItemDescription | null>>
    ) { }

    private push(node: VariationNode): NodeId {
        this.nodes.push(node);
        return this.nodes.length - 1;
    }

    /** `lengthPrefixed` is set only for the payload of an Explicit item, the one place a Bounded repetition has an end. */
    compileVariation(variation: VariationDescription, owner: Owner, lengthPrefixed = false): NodeId {
        switch (variation.type) {
            case 'Element': {
                this.checkElement(variation.size, variation.rule, owner);
                return this.push({ kind: 'Element', bitSize: variation.size, rule: variation.rule });
            }
            case 'Group': {
                const items = variation.items.map((item) => this.compileFixedSlot(item, owner));
                const bitSize = items.reduce((sum, slot) => sum + getItemSize(this.nodes, slot), 0);
                return this.push({ kind: 'Group', bitSize, items });
            }
            case 'Extended':
                return this.compileExtended(variation.first, variation.extents, variation.items, owner);
            case 'Repetitive': {
                const element = this.compileVariation(variation.variation, owner);
                const bitSize = getVariationSize(this.nodes, element);
                const node = this.nodes[element];
                if (node?.kind === 'Repetitive') {
                    throw new SchemaError(`Nested repetition in item ${owner.name} (title: ${owner.title})`, owner.name);
                }
                const rep = variation.rep;
                switch (rep.kind) {
                    case 'Counted':
                        if (rep.bits <= 0 || rep.bits % 8 !== 0) {
                            throw alignmentError(rep.bits, owner, 'repetition counter');
                        }
                        if (bitSize % 8 !== 0) throw alignmentError(bitSize, owner, 'Repetitive element');
                        break;
                    case 'Bounded':
                        if (!lengthPrefixed) {
                            throw new SchemaError(
                                `Bounded repetition in item ${owner.name} (title: ${owner.title}) must be the payload of an Explicit item`,
                                owner.name
                            );
                        }
                        if (bitSize % 8 !== 0) throw alignmentError(bitSize, owner, 'Repetitive element');
                        break;
                    case 'Fx':
                        if ((bitSize + 1) % 8 !== 0) throw alignmentError(bitSize + 1, owner, 'FX-repetitive element');
                        break;
                    default:
                        assertNever(rep);
                }
                if (bitSize <= 0) {
                    throw new SchemaError(`Empty repetitive element in item ${owner.name} (title: ${owner.title})`, owner.name);
                }
                return this.push({ kind: 'Repetitive', rep, element, bitSize });
            }
            case 'Explicit': {
                const expansion = variation.purpose === null ? null : this.expansions[variation.purpose];
                const nested = expansion === null ? null : this.compileVariation(expansion.variation, expansion, true);
                if (nested !== null && expansion !== null) this.requireBlockAligned(nested, expansion);
                return this.push({ kind: 'Explicit', purpose: variation.purpose, nested });
            }
            case 'Compound':
                return this.compileCompound(variation.fspec, variation.items, owner);
            default:
                return assertNever(variation);
        }
    }

    /** Group and Extended members: elements, groups and spares only. */
    private compileFixedSlot(item: ItemDescription, owner: Owner): ItemSlot {
        const slot = this.compileSlot(item);
        if (slot === null || slot.kind === 'Spare') return slot;
        const kind = this.nodes[slot.variation]?.kind;
        if (kind !== 'Element' && kind !== 'Group') {
            throw new SchemaError(
                `Sub-item ${slot.name} of ${owner.name} (title: ${owner.title}) is ${kind ?? 'undefined'}; only fixed sub-items are allowed`,
                slot.name
            );
        }
        return slot;
    }

    private compileSlot(item: ItemDescription): ItemSlot {
        if (item === null) return null;
        if (item.kind === 'Spare') {
            if (item.bits < 0) throw new SchemaError(`Negative spare length ${item.bits}`);
            return { kind: 'Spare', bits: item.bits };
        }
        return this.compileNamed(item);
    }

    private compileNamed(item: NamedItemDescription): NamedItem {
        return { kind: 'Item', name: item.name, title: item.title, variation: this.compileVariation(item.variation, item) };
    }

    /** Items serialized as whole octets (data items, compound sub-items, expansions). */
    requireBlockAligned(id: NodeId, owner: Owner): void {
        const node = this.nodes[id];
        if (node === undefined) throw new SchemaError(`Dangling variation reference #${id}`);
        if ((node.kind === 'Element' || node.kind === 'Group') && node.bitSize % 8 !== 0) {
            throw alignmentError(node.bitSize, owner, 'fixed item');
        }
        if (node.kind === 'Element' && node.bitSize === 0) {
            throw new SchemaError(`Zero-sized fixed item ${owner.name} (title: ${owner.title})`, owner.name);
        }
    }

    private checkElement(bits: number, rule: ContentRule, owner: Owner): void {
        if (!Number.isInteger(bits) || bits < 0) {
            throw new SchemaError(`Invalid element size ${bits} in item ${owner.name}`, owner.name);
        }
        const where = `${owner.name} (title: ${owner.title})`;
        switch (rule.kind) {
            case 'Raw':
            case 'Bds':
                return;
            case 'Table':
            case 'Integer':
            case 'Quantity':
                if (bits > MAX_NUMERIC_BITS) {
                    throw new SchemaError(`${rule.kind} field ${where} is ${bits} bits wide (max ${MAX_NUMERIC_BITS})`, owner.name);
                }
                if (rule.kind === 'Quantity' && rule.scaling.kind === 'Ratio' && rule.scaling.denominator === 0) {
                    throw new SchemaError(`Zero scaling denominator in ${where}`, owner.name);
                }
                return;
            case 'String': {
                const width = rule.encoding === 'ascii' ? 8 : rule.encoding === 'icao6' ? 6 : 3;
                if (bits % width !== 0) {
                    throw new SchemaError(`${rule.encoding} string ${where} of ${bits} bits is not a multiple of ${width}`, owner.name);
                }
                if (rule.encoding === 'octal' && bits > MAX_NUMERIC_BITS) {
                    throw new SchemaError(`Octal field ${where} is ${bits} bits wide (max ${MAX_NUMERIC_BITS})`, owner.name);
                }
                return;
            }
            case 'Dependent':
                if (rule.path.length === 0) throw new SchemaError(`Empty dependency path in ${where}`, owner.name);
                this.dependentPaths.push(rule.path);
                for (const c of rule.cases) this.checkElement(bits, c.rule, owner);
                this.checkElement(bits, rule.fallback, owner);
                return;
            default:
                assertNever(rule);
        }
    }

    // --- Extended ---

    private compileExtended(
        firstBits: number,
        extentBits: number,
        described: readonly ItemDescription[],
        owner: Owner
    ): NodeId {
        for (const bits of [firstBits, extentBits]) {
            if (bits < 8 || bits % 8 !== 0) throw alignmentError(bits, owner, 'Extended chunk');
        }
        const items = described.map((item) => this.compileFixedSlot(item, owner));
        const chunks: ExtendedChunk[] = [];
        let pending = items.filter((slot) => slot !== null && getItemSize(this.nodes, slot) > 0);

        while (pending.length > 0) {
            const chunkBits = chunks.length === 0 ? firstBits : extentBits;
            const fields: PlacedField[] = [];
            // MSB-first bit numbering: bit `chunkBits` is the first data bit, bit 1 is FX
            let bitsFrom = chunkBits;
            while (pending.length > 0 && bitsFrom > 1) {
                const [slot, ...rest] = pending;
                pending = rest;
                if (slot === undefined || slot === null) continue;
                const declared = getItemSize(this.nodes, slot);
                let bits = declared;
                if (bitsFrom - declared + 1 < 2) {
                    const name = slot.kind === 'Item' ? slot.name : 'spare';
                    const message =
                        `Field ${name} (${declared} bits) overruns the FX bit of chunk ${chunks.length + 1} ` +
                        `in Extended item ${owner.name} (title: ${owner.title})`;
                    if (this.layoutMode === 'strict') throw new AlignmentError(message, owner.name, declared);
                    bits = bitsFrom - 1;
                    this.logger?.warn?.(`${message}; clamped to ${bits} bits`);
                }
                if (slot.kind === 'Item') {
                    fields.push({ item: slot, offset: chunkBits - bitsFrom, bits, declaredBits: declared });
                }
                bitsFrom -= bits;
            }
            chunks.push({ bits: chunkBits, fields });
        }
        if (chunks.length === 0) {
            throw new SchemaError(`Extended item ${owner.name} (title: ${owner.title}) has no fields`, owner.name);
        }
        return this.push({ kind: 'Extended', firstBits, extentBits, items, chunks });
    }

    // --- Compound ---

    private compileCompound(fspecBits: number | null, described: readonly ItemDescription[], owner: Owner): NodeId {
        const items = described.map((item): NamedItem | null => {
            if (item === null) return null;
            if (item.kind === 'Spare') {
                throw new SchemaError(`Spare entry in compound item ${owner.name} (title: ${owner.title})`, owner.name);
            }
            const named = this.compileNamed(item);
            this.requireBlockAligned(named.variation, item);
            return named;
        });
        if (fspecBits !== null) {
            if (fspecBits % 8 !== 0) throw alignmentError(fspecBits, owner, 'compound FSPEC');
            if (fspecBits !== items.length) {
                throw new SchemaError(
                    `Compound item ${owner.name} (title: ${owner.title}): fixed FSPEC of ${fspecBits} bits ` +
                    `does not match ${items.length} sub-items`,
                    owner.name
                );
            }
        }
        if (!items.some((item) => item !== null)) {
            throw new SchemaError(`Compound item ${owner.name} (title: ${owner.title}) has no sub-items`, owner.name);
        }
        return this.push({ kind: 'Compound', fspecBits, items });
    }
}

function alignmentError(bitSize: number, owner: Owner, what: string): AlignmentError {
    return new AlignmentError(
        `bit alignment error: ${what} bitSize=${bitSize} (not multiple of 8) in item ${owner.name} (title: ${owner.title})`,
        owner.name,
        bitSize
    );
}

// ============================================================================
// UAPs
// ============================================================================

function compileUaps(description: CategoryDescription, items: ReadonlyMap<string, DataItemSpec>): UapSpec[] {
    if (description.uaps.length === 0) {
        throw new SchemaError(`Category ${description.category} declares no UAP`);
    }
    const names = new Set<string>();
    return description.uaps.map((uap) => {
        if (names.has(uap.name)) throw new SchemaError(`Duplicate UAP ${uap.name} in category ${description.category}`);
        names.add(uap.name);
        const seen = new Set<string>();
        for (const [i, name] of uap.items.entries()) {
            if (name === null) continue;
            if (!items.has(name)) {
                throw new SchemaError(`UAP ${uap.name} FRN ${i + 1} references unknown item ${name}`, name);
            }
            if (seen.has(name)) throw new SchemaError(`UAP ${uap.name} lists item ${name} twice`, name);
            seen.add(name);
        }
        return { name: uap.name, items: [...uap.items] };
    });
}

function compileSelector(description: CategoryDescription, uaps: readonly UapSpec[]): UapSelector | null {
    const selector = description.selector;
    if (selector === null) return null;
    const cases = new Map<number, string>();
    for (const [value, name] of selector.cases) {
        if (!uaps.some((uap) => uap.name === name)) {
            throw new SchemaError(`UAP selector case ${value} references unknown UAP ${name}`);
        }
        cases.set(value, name);
    }
    return { path: [...selector.path], cases };
}

// ============================================================================
// Paths
// ============================================================================

/**
 * Resolves `['020', 'TYP']` to the element it names. Only catalogue items and
 * sub-items of Group, Extended and Compound variations can be addressed.
 */
export function resolveFieldPath(schema: CategorySchema, path: readonly string[]): NodeId {
    const [head, ...rest] = path;
    const spec = head === undefined ? undefined : schema.items.get(head);
    if (spec === undefined) {
        throw new SchemaError(`Field path ${path.join('/')} does not start at a catalogue item`);
    }
    let id = spec.variation;
    for (const name of rest) {
        const node = schema.nodes[id];
        const children: readonly ItemSlot[] =
            node?.kind === 'Group' || node?.kind === 'Extended' || node?.kind === 'Compound' ? node.items : [];
        const child = children.find((slot): slot is NamedItem => slot !== null && slot.kind === 'Item' && slot.name === name);
        if (child === undefined) throw new SchemaError(`Field path ${path.join('/')} has no sub-item ${name}`);
        id = child.variation;
    }
    if (schema.nodes[id]?.kind !== 'Element') {
        throw new SchemaError(`Field path ${path.join('/')} does not name an element`);
    }
    return id;
}
