/**
 * XML layout export
 *
 * Renders a compiled category into the fixed-layout XML description format
 * (`<Category>` / `<DataItem>` / `<Fixed>` / `<Variable>` / `<Bits>` ...).
 * Bits are numbered from the MSB of their block down to 1; in Variable and
 * FX-chained FSPEC blocks bit 1 is the FX indicator. One-way: nothing in the
 * codec reads this format back.
 */
import {
    assertNever, getNode, getItemSize, isBdsElement, quantityLsb,
    type CategorySchema, type CompoundNode, type ContentRule, type DataItemSpec, type ExtendedNode,
    type ItemSlot, type NamedItem, type NodeId, type RepetitiveNode, type UapSpec, type VariationNode,
} from './schema.js';

interface Owner {
    readonly name: string;
    readonly title: string;
}

const STRING_ENCODE_NAMES = { ascii: 'ascii', icao6: '6bitschar', octal: 'octal' } as const;

const TYPOGRAPHY: readonly [string, string][] = [
    ['–', '-'],
    ['“', ''],
    ['”', ''],
    ['°', 'deg'],
];

export function xmlQuote(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/"/g, '&quot;')
        .replace(/['‘’]/g, '&apos;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}

/** Scale attribute: the exact decimal LSB without trailing zeros, always with a fraction digit. */
export function formatScale(rule: Extract<ContentRule, { kind: 'Quantity' }>): string {
    const lsb = quantityLsb(rule);
    let text = rule.fractionalBits > 0
        ? lsb.toFixed(29).replace(/0+$/, '')
        : Number.isInteger(lsb) ? `${lsb}.` : String(lsb);
    if (text.endsWith('.')) text += '0';
    return text;
}

class XmlWriter {
    private readonly lines: string[] = [];
    private level = 0;

    tell(line: string): void {
        let text = line;
        for (const [from, to] of TYPOGRAPHY) text = text.split(from).join(to);
        this.lines.push(`${' '.repeat(this.level * 4)}${text}`.trimEnd());
    }

    indent(body: () => void): void {
        this.level++;
        try {
            body();
        } finally {
            this.level--;
        }
    }

    toString(): string {
        return this.lines.map((line) => `${line}\n`).join('');
    }
}

export function exportCategoryXml(schema: CategorySchema): string {
    return new XmlExporter(schema).render();
}

class XmlExporter {
    private readonly out = new XmlWriter();

    constructor(private readonly schema: CategorySchema) { }

    render(): string {
        const { category, title, edition, checksum } = this.schema;
        const version = `${edition.major}.${edition.minor}`;
        const out = this.out;
        out.tell('<?xml version="1.0" encoding="UTF-8"?>');
        out.tell('<!DOCTYPE Category SYSTEM "asterix.dtd">');
        out.tell('');
        out.tell('<!--');
        out.indent(() => {
            out.tell('');
            out.tell(`Asterix Category ${String(category).padStart(3, '0')} v${version} definition`);
            out.tell('');
            out.tell('Do not edit this file!');
            out.tell('');
            out.tell('This file is generated from the JSON category description.');
            out.tell(`sha1sum of concatenated json input(s): ${checksum ?? 'unknown'}`);
            out.tell('');
        });
        out.tell('-->');
        out.tell('');
        out.tell(`<Category id="${category}" name="${xmlQuote(title)}" ver="${version}">`);
        out.indent(() => {
            for (const item of this.schema.items.values()) this.renderDataItem(item);
        });
        out.indent(() => {
            for (const uap of this.schema.uaps) this.renderUap(uap);
        });
        out.tell('');
        out.tell('</Category>');
        return out.toString();
    }

    private node(id: NodeId): VariationNode {
        return getNode(this.schema, id);
    }

    // --- Data items ---

    private renderDataItem(item: DataItemSpec): void {
        const out = this.out;
        out.tell('');
        out.tell(`<DataItem id="${xmlQuote(item.name)}">`);
        out.indent(() => {
            if (item.title) out.tell(`<DataItemName>${xmlQuote(item.title)}</DataItemName>`);
            if (item.definition) {
                out.tell('<DataItemDefinition>');
                out.indent(() => {
                    for (const line of item.definition.split(/\r?\n/)) out.tell(xmlQuote(line));
                });
                out.tell('</DataItemDefinition>');
            }
            this.renderFormat(item.variation, item);
            if (item.remark) {
                out.tell('<DataItemNote>');
                out.indent(() => {
                    for (const line of item.remark.split(/\r?\n/)) out.tell(xmlQuote(line));
                });
                out.tell('</DataItemNote>');
            }
        });
        out.tell('</DataItem>');
    }

    private renderFormat(id: NodeId, owner: Owner): void {
        this.out.tell(`<DataItemFormat desc="${this.describeFormat(this.node(id))}">`);
        this.out.indent(() => this.renderVariation(id, owner));
        this.out.tell('</DataItemFormat>');
    }

    private describeFormat(node: VariationNode): string {
        switch (node.kind) {
            case 'Element':
            case 'Group':
                return `${node.bitSize / 8}-octet fixed length data item.`;
            case 'Extended':
                return 'Variable data item.';
            case 'Repetitive':
                return node.rep.kind === 'Fx' ? 'Variable data item.' : 'Repetitive data item.';
            case 'Explicit':
                return 'Explicit data item.';
            case 'Compound':
                return 'Compound data item.';
            default:
                return assertNever(node);
        }
    }

    private renderVariation(id: NodeId, owner: Owner): void {
        const node = this.node(id);
        switch (node.kind) {
            case 'Element':
                this.renderFixed(node.bitSize, [{ kind: 'Item', name: owner.name, title: owner.title, variation: id }], owner);
                return;
            case 'Group':
                this.renderFixed(node.bitSize, node.items, owner);
                return;
            case 'Extended':
                this.renderExtended(node, owner);
                return;
            case 'Repetitive':
                this.renderRepetitive(node, owner);
                return;
            case 'Explicit':
                this.out.tell('<Explicit>');
                if (node.nested !== null) {
                    this.renderFormat(node.nested, owner);
                } else {
                    this.out.indent(() => {
                        this.out.tell('<Fixed length="1">');
                        this.out.indent(() => {
                            this.out.tell('<Bits from="8" to="1">');
                            this.out.indent(() => this.out.tell('<BitsShortName>VAL</BitsShortName>'));
                            this.out.tell('</Bits>');
                        });
                        this.out.tell('</Fixed>');
                    });
                }
                this.out.tell('</Explicit>');
                return;
            case 'Compound':
                this.renderCompound(node);
                return;
            default:
                assertNever(node);
        }
    }

    private renderFixed(bitSize: number, items: readonly ItemSlot[], owner: Owner): void {
        const out = this.out;
        const [only] = items;
        if (items.length === 1 && only?.kind === 'Item' && isBdsElement(this.node(only.variation))) {
            // A lone BDS register carries no Fixed wrapper
            this.renderBits(only, bitSize, bitSize - getItemSize(this.schema.nodes, only) + 1, owner);
            return;
        }
        out.tell(`<Fixed length="${bitSize / 8}">`);
        let bitsFrom = bitSize;
        for (const slot of items) {
            const bits = getItemSize(this.schema.nodes, slot);
            if (slot === null || bits <= 0) continue;
            const from = bitsFrom;
            out.indent(() => this.renderBits(slot, from, from - bits + 1, owner));
            bitsFrom -= bits;
        }
        out.tell('</Fixed>');
    }

    private renderExtended(node: ExtendedNode, owner: Owner): void {
        const out = this.out;
        out.tell('<Variable>');
        out.indent(() => {
            for (const chunk of node.chunks) {
                out.tell(`<Fixed length="${chunk.bits / 8}">`);
                out.indent(() => {
                    let next = 0;
                    for (const field of chunk.fields) {
                        if (field.offset > next) this.renderSpare(chunk.bits - next, chunk.bits - field.offset + 1);
                        const from = chunk.bits - field.offset;
                        this.renderBits(field.item, from, from - field.bits + 1, owner);
                        next = field.offset + field.bits;
                    }
                    if (next < chunk.bits - 1) this.renderSpare(chunk.bits - next, 2);
                    this.renderFx('Extension Indicator', ['End of Data Item', 'Extension']);
                });
                out.tell('</Fixed>');
            }
        });
        out.tell('</Variable>');
    }

    private renderRepetitive(node: RepetitiveNode, owner: Owner): void {
        const out = this.out;
        const element = this.node(node.element);
        if (node.rep.kind === 'Fx') {
            // An FX repetition is laid out as a Variable item of identical chunks
            const bits = node.bitSize + 1;
            out.tell('<Variable>');
            out.indent(() => {
                out.tell(`<Fixed length="${bits / 8}">`);
                out.indent(() => {
                    this.renderElementBits(node.element, element, bits, owner);
                    this.renderFx('Extension Indicator', ['End of Data Item', 'Extension']);
                });
                out.tell('</Fixed>');
            });
            out.tell('</Variable>');
            return;
        }
        out.tell('<Repetitive>');
        out.indent(() => {
            if (isBdsElement(element)) {
                out.tell('<BDS/>');
                return;
            }
            out.tell(`<Fixed length="${node.bitSize / 8}">`);
            out.indent(() => this.renderElementBits(node.element, element, node.bitSize, owner));
            out.tell('</Fixed>');
        });
        out.tell('</Repetitive>');
    }

    /** Bits of one repetition, numbered from `blockBits` down. */
    private renderElementBits(id: NodeId, element: VariationNode, blockBits: number, owner: Owner): void {
        if (element.kind === 'Group') {
            let bitsFrom = blockBits;
            for (const slot of element.items) {
                const bits = getItemSize(this.schema.nodes, slot);
                if (slot === null || bits <= 0) continue;
                this.renderBits(slot, bitsFrom, bitsFrom - bits + 1, owner);
                bitsFrom -= bits;
            }
            return;
        }
        const self: NamedItem = { kind: 'Item', name: owner.name, title: owner.title, variation: id };
        this.renderBits(self, blockBits, blockBits - getItemSize(this.schema.nodes, self) + 1, owner);
    }

    private renderCompound(node: CompoundNode): void {
        const out = this.out;
        out.tell('<Compound>');
        out.indent(() => {
            out.tell('<Variable>');
            out.indent(() => {
                if (node.fspecBits !== null) {
                    out.tell(`<Fixed length="${node.fspecBits / 8}">`);
                    let n = node.items.length;
                    let presence = 1;
                    for (const item of node.items) {
                        const bit = n;
                        out.indent(() => {
                            if (item) this.renderPresenceBit(item, bit, presence++);
                            else this.renderPresenceSpare(bit);
                        });
                        n--;
                    }
                    out.tell('</Fixed>');
                } else {
                    this.renderChainedFspec(node.items);
                }
            });
            out.tell('</Variable>');
            for (const item of node.items) {
                out.tell('');
                if (item !== null) this.renderVariation(item.variation, item);
            }
        });
        out.tell('</Compound>');
    }

    private renderChainedFspec(items: readonly (NamedItem | null)[]): void {
        const out = this.out;
        let rest = items;
        let presence = 1;
        for (;;) {
            out.tell('<Fixed length="1">');
            for (let bit = 8; bit > 1; bit--) {
                const [item = null, ...tail] = rest;
                rest = tail;
                out.indent(() => {
                    if (item) this.renderPresenceBit(item, bit, presence++);
                    else this.renderPresenceSpare(bit);
                });
            }
            out.indent(() => this.renderFx('Extension indicator', ['no extension', 'extension']));
            out.tell('</Fixed>');
            if (rest.length === 0) break;
        }
    }

    private renderPresenceBit(item: NamedItem, bit: number, presence: number): void {
        this.out.tell(`<Bits bit="${bit}">`);
        this.out.indent(() => {
            this.out.tell(`<BitsShortName>${xmlQuote(item.name)}</BitsShortName>`);
            this.out.tell(`<BitsName>${xmlQuote(item.title)}</BitsName>`);
            this.out.tell(`<BitsPresence>${presence}</BitsPresence>`);
        });
        this.out.tell('</Bits>');
    }

    private renderPresenceSpare(bit: number): void {
        this.out.tell(`<Bits bit="${bit}">`);
        this.out.indent(() => {
            this.out.tell('<BitsShortName>spare</BitsShortName>');
            this.out.tell('<BitsName>Spare bits set to 0</BitsName>');
        });
        this.out.tell('</Bits>');
    }

    // --- Bits ---

    private renderFx(name: string, values: readonly [string, string]): void {
        this.out.tell('<Bits bit="1" fx="1">');
        this.out.indent(() => {
            this.out.tell('<BitsShortName>FX</BitsShortName>');
            this.out.tell(`<BitsName>${name}</BitsName>`);
            this.out.tell(`<BitsValue val="0">${values[0]}</BitsValue>`);
            this.out.tell(`<BitsValue val="1">${values[1]}</BitsValue>`);
        });
        this.out.tell('</Bits>');
    }

    private renderSpare(bitsFrom: number, bitsTo: number): void {
        this.out.tell(bitsOpen(bitsFrom, bitsTo));
        this.out.indent(() => {
            this.out.tell('<BitsShortName>spare</BitsShortName>');
            this.out.tell('<BitsName>Spare bit(s) set to 0</BitsName>');
            this.out.tell('<BitsConst>0</BitsConst>');
        });
        this.out.tell('</Bits>');
    }

    private renderBits(slot: NamedItem | { readonly kind: 'Spare'; readonly bits: number }, bitsFrom: number, bitsTo: number, owner: Owner): void {
        if (slot.kind === 'Spare') {
            this.renderSpare(bitsFrom, bitsTo);
            return;
        }
        const node = this.node(slot.variation);
        const rule: ContentRule = node.kind === 'Element' ? node.rule : { kind: 'Raw' };
        const out = this.out;
        const name = shortName(slot, owner);
        const header = (): void => {
            out.tell(`<BitsShortName>${xmlQuote(name)}</BitsShortName>`);
            if (slot.title) out.tell(`<BitsName>${xmlQuote(slot.title)}</BitsName>`);
        };
        switch (rule.kind) {
            case 'Raw':
            case 'Dependent':
                out.tell(bitsOpen(bitsFrom, bitsTo));
                out.indent(header);
                break;
            case 'Table':
                out.tell(bitsOpen(bitsFrom, bitsTo));
                out.indent(() => {
                    header();
                    const entries = [...rule.values].sort(([a], [b]) => a - b);
                    for (const [value, label] of entries) {
                        out.tell(`<BitsValue val="${value}">${xmlQuote(label)}</BitsValue>`);
                    }
                });
                break;
            case 'String':
                out.tell(`<Bits from="${bitsFrom}" to="${bitsTo}" encode="${STRING_ENCODE_NAMES[rule.encoding]}">`);
                out.indent(header);
                break;
            case 'Integer':
            case 'Quantity': {
                const signed = rule.signed ? 'signed' : 'unsigned';
                out.tell(bitsOpen(bitsFrom, bitsTo, signed));
                out.indent(() => {
                    header();
                    const scale = rule.kind === 'Quantity' ? ` scale="${formatScale(rule)}"` : '';
                    const unit = rule.kind === 'Quantity' ? rule.unit : '';
                    const min = rule.constraints.find((c) => c.op === '>=' || c.op === '>');
                    const max = rule.constraints.find((c) => c.op === '<=' || c.op === '<');
                    const limits = `${min ? ` min="${min.bound}"` : ''}${max ? ` max="${max.bound}"` : ''}`;
                    out.tell(`<BitsUnit${scale}${limits}>${xmlQuote(unit)}</BitsUnit>`);
                });
                break;
            }
            case 'Bds':
                out.tell('<BDS/>');
                return;
            default:
                assertNever(rule);
        }
        out.tell('</Bits>');
    }

    // --- UAP ---

    private renderUap(uap: UapSpec): void {
        const out = this.out;
        out.tell('');
        out.tell('<UAP>');
        out.indent(() => {
            let rest = uap.items;
            let bit = 0;
            let frn = 1;
            for (;;) {
                const chunk = rest.slice(0, 7);
                rest = rest.slice(7);
                for (const name of chunk) {
                    out.tell(`<UAPItem bit="${bit}" frn="${frn}">${name === null ? '-' : xmlQuote(name)}</UAPItem>`);
                    bit++;
                    frn++;
                }
                if (rest.length === 0) {
                    while (bit % 8 !== 7) {
                        out.tell(`<UAPItem bit="${bit}" frn="${frn}">-</UAPItem>`);
                        bit++;
                        frn++;
                    }
                }
                out.tell(`<UAPItem bit="${bit}" frn="FX" len="-">-</UAPItem>`);
                bit++;
                if (rest.length === 0) break;
            }
        });
        out.tell('</UAP>');
    }
}

function bitsOpen(bitsFrom: number, bitsTo: number, encode?: string): string {
    if (bitsFrom === bitsTo) return `<Bits bit="${bitsFrom}">`;
    return encode === undefined
        ? `<Bits from="${bitsFrom}" to="${bitsTo}">`
        : `<Bits from="${bitsFrom}" to="${bitsTo}" encode="${encode}">`;
}

/** Numeric item names (`"010"`) are replaced by the initials of the owner's title. */
function shortName(item: NamedItem, owner: Owner): string {
    if (!/^\d+$/.test(item.name)) return item.name;
    return owner.title
        .split(/\s+/)
        .map((word) => word.replace(/^[()]+|[()]+$/g, '').charAt(0))
        .join('');
}
