/**
 * Structural encoding of one data item. Octet-aligned blocks (data items,
 * compound sub-items, explicit payloads) are produced as separate byte
 * arrays and concatenated; fixed-size parts are written bit by bit into a
 * {@link BitWriter} sized from the compiled layout.
 */
import type { ItemInput } from '../asterix-types.js';
import { BitWriter, concatBytes } from '../asterix-utils.js';
import { EncodeInputError, SchemaError, ValueRangeError } from './errors.js';
import { EXPLICIT_LENGTH_SIZE, MAX_EXPLICIT_LENGTH } from './format.js';
import { Fspec } from './fspec.js';
import {
    assertNever, getNode,
    type CategorySchema, type CompoundNode, type ExtendedNode, type NodeId, type RepetitiveNode,
} from './schema.js';
import { ValueCodec, contextKey, describeInput, type FieldContext, type ValueEncodeOptions } from './values.js';

type InputObject = { readonly [name: string]: ItemInput };

export function isInputObject(value: ItemInput): value is InputObject {
    return typeof value === 'object' && !(value instanceof Uint8Array) && !Array.isArray(value);
}

function isInputList(value: ItemInput): value is readonly ItemInput[] {
    return Array.isArray(value);
}

export class ItemEncoder {
    constructor(
        private readonly schema: CategorySchema,
        private readonly options: ValueEncodeOptions,
        /** Raw values encoded so far in the current record */
        readonly context: FieldContext = new Map()
    ) { }

    /** Encodes an octet-aligned item. */
    encode(id: NodeId, value: ItemInput, path: readonly string[]): Uint8Array {
        const node = getNode(this.schema, id);
        switch (node.kind) {
            case 'Element':
            case 'Group': {
                const writer = new BitWriter(node.bitSize / 8);
                this.writeFixed(id, value, writer, path);
                return writer.bytes;
            }
            case 'Extended':
                return this.encodeExtended(node, value, path);
            case 'Repetitive':
                return this.encodeRepetitive(node, value, path);
            case 'Explicit': {
                const payload = node.nested === null
                    ? expectBytes(value, path)
                    : this.encode(node.nested, value, path);
                const length = payload.length + EXPLICIT_LENGTH_SIZE;
                if (length > MAX_EXPLICIT_LENGTH) {
                    throw new ValueRangeError(`Explicit item ${path.join('/')} of ${length} bytes exceeds LEN ${MAX_EXPLICIT_LENGTH}`, path.join('/'));
                }
                return concatBytes([Uint8Array.of(length), payload]);
            }
            case 'Compound':
                return this.encodeCompound(node, value, path);
            default:
                return assertNever(node);
        }
    }

    /** Writes an Element or Group at the writer's current position. */
    private writeFixed(id: NodeId, value: ItemInput, writer: BitWriter, path: readonly string[]): void {
        const node = getNode(this.schema, id);
        if (node.kind === 'Element') {
            const raw = ValueCodec.encode(node.rule, writer, node.bitSize, value, path.join('/'), this.context, this.options);
            if (raw !== null) this.context.set(contextKey(path), raw);
            return;
        }
        if (node.kind !== 'Group') {
            throw new SchemaError(`${node.kind} variation at ${path.join('/')} has no fixed size`);
        }
        const input = expectObject(value, path);
        const names = new Set<string>();
        for (const slot of node.items) {
            if (slot === null) continue;
            if (slot.kind === 'Spare') {
                writer.writeZeros(slot.bits);
                continue;
            }
            const child = input[slot.name];
            if (child === undefined) throw new EncodeInputError(`${path.join('/')}: missing sub-item ${slot.name}`);
            names.add(slot.name);
            this.writeFixed(slot.variation, child, writer, [...path, slot.name]);
        }
        rejectUnknownKeys(input, names, path);
    }

    // --- Extended ---

    private encodeExtended(node: ExtendedNode, value: ItemInput, path: readonly string[]): Uint8Array {
        const input = expectObject(value, path);
        const names = new Set<string>();
        let lastChunk = 0;
        for (const [index, chunk] of node.chunks.entries()) {
            for (const field of chunk.fields) {
                names.add(field.item.name);
                if (input[field.item.name] !== undefined) lastChunk = index;
            }
        }
        rejectUnknownKeys(input, names, path);

        const chunks = node.chunks.slice(0, lastChunk + 1);
        const writer = new BitWriter(chunks.reduce((sum, c) => sum + c.bits, 0) / 8);
        let start = 0;
        for (const [index, chunk] of chunks.entries()) {
            for (const field of chunk.fields) {
                const child = input[field.item.name];
                if (child === undefined) {
                    throw new EncodeInputError(`${path.join('/')}: missing sub-item ${field.item.name}`);
                }
                writer.seek(start + field.offset);
                if (field.bits < field.declaredBits) {
                    writer.writeUnsigned(expectNumber(child, [...path, field.item.name]), field.bits);
                    continue;
                }
                this.writeFixed(field.item.variation, child, writer, [...path, field.item.name]);
            }
            writer.seek(start + chunk.bits - 1);
            writer.writeBit(index < chunks.length - 1 ? 1 : 0);
            start += chunk.bits;
        }
        return writer.bytes;
    }

    // --- Repetitive ---

    private encodeRepetitive(node: RepetitiveNode, value: ItemInput, path: readonly string[]): Uint8Array {
        if (!isInputList(value)) {
            throw new EncodeInputError(`${path.join('/')}: expected an array, got ${describeInput(value)}`);
        }
        const count = value.length;
        const rep = node.rep;
        switch (rep.kind) {
            case 'Counted': {
                const max = Math.pow(2, rep.bits) - 1;
                if (count > max) {
                    throw new ValueRangeError(`${path.join('/')}: ${count} repetitions exceed the maximum of ${max}`, path.join('/'));
                }
                const writer = new BitWriter((rep.bits + count * node.bitSize) / 8);
                writer.writeUnsigned(count, rep.bits);
                for (const element of value) this.writeFixed(node.element, element, writer, path);
                return writer.bytes;
            }
            case 'Fx': {
                if (count === 0) throw new EncodeInputError(`${path.join('/')}: FX repetition needs at least one element`);
                const writer = new BitWriter((count * (node.bitSize + 1)) / 8);
                for (const [i, element] of value.entries()) {
                    this.writeFixed(node.element, element, writer, path);
                    writer.writeBit(i < count - 1 ? 1 : 0);
                }
                return writer.bytes;
            }
            case 'Bounded': {
                const writer = new BitWriter((count * node.bitSize) / 8);
                for (const element of value) this.writeFixed(node.element, element, writer, path);
                return writer.bytes;
            }
            default:
                return assertNever(rep);
        }
    }

    // --- Compound ---

    private encodeCompound(node: CompoundNode, value: ItemInput, path: readonly string[]): Uint8Array {
        const input = expectObject(value, path);
        const names = new Set<string>();
        const frns: number[] = [];
        const blocks: Uint8Array[] = [];
        for (const [index, item] of node.items.entries()) {
            if (item === null) continue;
            names.add(item.name);
            const child = input[item.name];
            if (child === undefined) continue;
            frns.push(index + 1);
            blocks.push(this.encode(item.variation, child, [...path, item.name]));
        }
        rejectUnknownKeys(input, names, path);
        const fspec = node.fspecBits === null ? Fspec.encode(frns) : Fspec.encodeFixed(frns, node.fspecBits);
        return concatBytes([fspec, ...blocks]);
    }
}

function expectObject(value: ItemInput, path: readonly string[]): InputObject {
    if (!isInputObject(value)) {
        throw new EncodeInputError(`${path.join('/')}: expected an object, got ${describeInput(value)}`);
    }
    return value;
}

function expectBytes(value: ItemInput, path: readonly string[]): Uint8Array {
    if (!(value instanceof Uint8Array)) {
        throw new EncodeInputError(`${path.join('/')}: expected a byte array, got ${describeInput(value)}`);
    }
    return value;
}

function expectNumber(value: ItemInput, path: readonly string[]): number {
    if (typeof value !== 'number') {
        throw new EncodeInputError(`${path.join('/')}: expected a number, got ${describeInput(value)}`);
    }
    return value;
}

function rejectUnknownKeys(input: InputObject, known: ReadonlySet<string>, path: readonly string[]): void {
    for (const key of Object.keys(input)) {
        if (!known.has(key)) throw new EncodeInputError(`${path.join('/')}: unknown sub-item ${key}`);
    }
}
