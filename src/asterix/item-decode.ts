/**
 * Structural decoding of one data item: walks the variation arena and
 * consumes bits from a {@link BitReader}. Every loop reads at least one bit
 * per iteration, so malformed input ends in a TruncatedInputError or
 * MalformedDataError.
 */
import type { FieldValue } from '../asterix-types.js';
import { BitReader } from '../asterix-utils.js';
import { MalformedDataError } from './errors.js';
import { EXPLICIT_LENGTH_SIZE, MAX_NUMERIC_BITS } from './format.js';
import { Fspec } from './fspec.js';
import {
    assertNever, getNode,
    type CategorySchema, type CompoundNode, type ExtendedNode, type NodeId, type RepetitiveNode,
} from './schema.js';
import type { AsterixLogger, CodecMode } from './types.js';
import { ValueCodec, contextKey, type FieldContext } from './values.js';

type FieldObject = { [name: string]: FieldValue };

export class ItemDecoder {
    constructor(
        private readonly schema: CategorySchema,
        private readonly mode: CodecMode,
        private readonly logger: AsterixLogger | null,
        /** Raw values decoded so far in the current record */
        readonly context: FieldContext = new Map()
    ) { }

    decode(id: NodeId, reader: BitReader, path: readonly string[]): FieldValue {
        const node = getNode(this.schema, id);
        switch (node.kind) {
            case 'Element': {
                const { value, raw } = ValueCodec.decode(node.rule, reader, node.bitSize, this.context);
                if (raw !== null) this.context.set(contextKey(path), raw);
                return value;
            }
            case 'Group': {
                const out: FieldObject = {};
                for (const slot of node.items) {
                    if (slot === null) continue;
                    if (slot.kind === 'Spare') {
                        reader.skip(slot.bits);
                        continue;
                    }
                    out[slot.name] = this.decode(slot.variation, reader, [...path, slot.name]);
                }
                return out;
            }
            case 'Extended':
                return this.decodeExtended(node, reader, path);
            case 'Repetitive':
                return this.decodeRepetitive(node, reader, path);
            case 'Explicit': {
                const start = reader.bytePosition;
                const length = reader.readUnsigned(EXPLICIT_LENGTH_SIZE * 8);
                if (length < EXPLICIT_LENGTH_SIZE) {
                    throw new MalformedDataError(`Explicit item ${path.join('/')} declares LEN ${length}`, start);
                }
                const payload = reader.take(length - EXPLICIT_LENGTH_SIZE);
                if (node.nested === null) return payload.readBytes(payload.remainingBits);
                const value = this.decode(node.nested, payload, path);
                if (payload.remainingBits > 0) {
                    const message = `Explicit item ${path.join('/')} leaves ${payload.remainingBits / 8} byte(s) undecoded`;
                    if (this.mode === 'strict') throw new MalformedDataError(message, start);
                    this.logger?.warn?.(message);
                }
                return value;
            }
            case 'Compound':
                return this.decodeCompound(node, reader, path);
            default:
                return assertNever(node);
        }
    }

    // --- Extended ---

    private decodeExtended(node: ExtendedNode, reader: BitReader, path: readonly string[]): FieldValue {
        const out: FieldObject = {};
        for (const [index, chunk] of node.chunks.entries()) {
            const start = reader.position;
            for (const field of chunk.fields) {
                reader.skip(start + field.offset - reader.position);
                const fieldPath = [...path, field.item.name];
                if (field.bits < field.declaredBits) {
                    // Clamped at compile time: only the bits before FX are on the wire
                    out[field.item.name] = field.bits > MAX_NUMERIC_BITS
                        ? reader.readBytes(field.bits)
                        : reader.readUnsigned(field.bits);
                    continue;
                }
                out[field.item.name] = this.decode(field.item.variation, reader, fieldPath);
            }
            reader.skip(start + chunk.bits - 1 - reader.position);
            if (reader.readBit() === 0) return out;
            if (index === node.chunks.length - 1) this.skipUnexpectedExtents(node, reader, path);
        }
        return out;
    }

    private skipUnexpectedExtents(node: ExtendedNode, reader: BitReader, path: readonly string[]): void {
        const message = `Extended item ${path.join('/')} sets FX after its last declared extent`;
        if (this.mode === 'strict') throw new MalformedDataError(message, Math.floor(reader.position / 8) - 1);
        let skipped = 0;
        let fx = 1;
        while (fx === 1) {
            reader.skip(node.extentBits - 1);
            fx = reader.readBit();
            skipped++;
        }
        this.logger?.warn?.(`${message}; skipped ${skipped} extent(s)`);
    }

    // --- Repetitive ---

    private decodeRepetitive(node: RepetitiveNode, reader: BitReader, path: readonly string[]): FieldValue {
        const out: FieldValue[] = [];
        const rep = node.rep;
        switch (rep.kind) {
            case 'Counted': {
                const count = reader.readUnsigned(rep.bits);
                for (let i = 0; i < count; i++) out.push(this.decode(node.element, reader, path));
                return out;
            }
            case 'Fx': {
                let fx = 1;
                while (fx === 1) {
                    out.push(this.decode(node.element, reader, path));
                    fx = reader.readBit();
                }
                return out;
            }
            case 'Bounded': {
                const remaining = reader.remainingBits;
                if (remaining % node.bitSize !== 0) {
                    throw new MalformedDataError(
                        `Repetitive item ${path.join('/')}: ${remaining / 8} byte(s) left is not a multiple of ${node.bitSize / 8}`,
                        Math.floor(reader.position / 8)
                    );
                }
                for (let i = 0; i < remaining / node.bitSize; i++) out.push(this.decode(node.element, reader, path));
                return out;
            }
            default:
                return assertNever(rep);
        }
    }

    // --- Compound ---

    private decodeCompound(node: CompoundNode, reader: BitReader, path: readonly string[]): FieldValue {
        const start = reader.bytePosition;
        const { frns, bytesConsumed } = node.fspecBits === null
            ? Fspec.decode(reader.buffer, start, reader.endByte)
            : Fspec.decodeFixed(reader.buffer, start, node.fspecBits, reader.endByte);
        reader.skip(bytesConsumed * 8);

        const out: FieldObject = {};
        for (const frn of frns) {
            const item = node.items[frn - 1];
            if (item === undefined || item === null) {
                throw new MalformedDataError(`Compound item ${path.join('/')} flags unused position ${frn}`, start);
            }
            out[item.name] = this.decode(item.variation, reader, [...path, item.name]);
        }
        return out;
    }
}
