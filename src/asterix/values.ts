/**
 * Value Codec
 *
 * Converts between the bits of one element and its {@link FieldValue}
 * according to the element's content rule.
 */
import type { FieldValue, ItemInput } from '../asterix-types.js';
import { BitReader, BitWriter, toSigned, toUnsigned } from '../asterix-utils.js';
import { EncodeInputError, ValueRangeError } from './errors.js';
import { ICAO6_CHARSET, MAX_NUMERIC_BITS } from './format.js';
import { assertNever, quantityLsb, type Constraint, type ContentRule } from './schema.js';
import type { AsterixLogger } from './types.js';

/**
 * Raw values of the elements decoded (or encoded) so far in one record, keyed
 * by their joined path (`"020/TYP"`). Dependent rules and the UAP selector
 * read from it.
 */
export type FieldContext = Map<string, number>;

export function contextKey(path: readonly string[]): string {
    return path.join('/');
}

export type ResolvedRule = Exclude<ContentRule, { kind: 'Dependent' }>;

export interface ElementDecodeResult {
    value: FieldValue;
    /** Unsigned raw bits, when the element fits in a number */
    raw: number | null;
}

export interface ValueEncodeOptions {
    strictConstraints: boolean;
    logger: AsterixLogger | null;
}

const STRING_CHAR_BITS = { ascii: 8, icao6: 6, octal: 3 } as const;

export class ValueCodec {

    /** Picks the case of a dependent rule from values already in the context. */
    static resolveRule(rule: ContentRule, context: FieldContext): ResolvedRule {
        let current = rule;
        while (current.kind === 'Dependent') {
            const discriminant = context.get(contextKey(current.path));
            const match = discriminant === undefined ? undefined : current.cases.find((c) => c.key === discriminant);
            current = match ? match.rule : current.fallback;
        }
        return current;
    }

    // --- DECODE ---

    static decode(rule: ContentRule, reader: BitReader, bits: number, context: FieldContext): ElementDecodeResult {
        const resolved = ValueCodec.resolveRule(rule, context);
        switch (resolved.kind) {
            case 'Bds':
                return { value: reader.readBytes(bits), raw: null };
            case 'Raw':
                if (bits > MAX_NUMERIC_BITS) return { value: reader.readBytes(bits), raw: null };
                return ValueCodec.withRaw(reader.readUnsigned(bits), (raw) => raw);
            case 'String':
                if (resolved.encoding === 'octal') {
                    const digits = bits / STRING_CHAR_BITS.octal;
                    return ValueCodec.withRaw(reader.readUnsigned(bits), (raw) => raw.toString(8).padStart(digits, '0'));
                }
                return { value: ValueCodec.readString(reader, bits, resolved.encoding), raw: null };
            case 'Table':
                return ValueCodec.withRaw(reader.readUnsigned(bits), (raw) => resolved.values.get(raw) ?? raw);
            case 'Integer':
                return ValueCodec.withRaw(reader.readUnsigned(bits), (raw) =>
                    resolved.signed ? toSigned(raw, bits) : raw);
            case 'Quantity': {
                const lsb = quantityLsb(resolved);
                return ValueCodec.withRaw(reader.readUnsigned(bits), (raw) =>
                    (resolved.signed ? toSigned(raw, bits) : raw) * lsb);
            }
            default:
                return assertNever(resolved);
        }
    }

    private static withRaw(raw: number, convert: (raw: number) => FieldValue): ElementDecodeResult {
        return { value: convert(raw), raw };
    }

    private static readString(reader: BitReader, bits: number, encoding: 'ascii' | 'icao6'): string {
        const width = STRING_CHAR_BITS[encoding];
        let text = '';
        for (let i = 0; i < bits / width; i++) {
            const code = reader.readUnsigned(width);
            text += encoding === 'ascii' ? String.fromCharCode(code) : ICAO6_CHARSET.charAt(code);
        }
        // Fields are space padded on the right
        return text.replace(/ +$/, '');
    }

    // --- ENCODE ---

    /**
     * Writes one element and returns its unsigned raw bits (null for byte
     * payloads and character strings).
     */
    static encode(
        rule: ContentRule,
        writer: BitWriter,
        bits: number,
        value: ItemInput,
        field: string,
        context: FieldContext,
        options: ValueEncodeOptions
    ): number | null {
        const resolved = ValueCodec.resolveRule(rule, context);
        switch (resolved.kind) {
            case 'Bds':
                writer.writeBytes(ValueCodec.expectBytes(value, field), bits);
                return null;
            case 'Raw':
                if (value instanceof Uint8Array) {
                    writer.writeBytes(value, bits);
                    return null;
                }
                return ValueCodec.writeRaw(writer, ValueCodec.expectNumber(value, field), bits, field);
            case 'String':
                if (resolved.encoding === 'octal') {
                    return ValueCodec.writeRaw(writer, ValueCodec.parseOctal(value, bits, field), bits, field);
                }
                ValueCodec.writeString(writer, ValueCodec.expectString(value, field), bits, resolved.encoding, field);
                return null;
            case 'Table': {
                if (typeof value === 'string') {
                    for (const [raw, label] of resolved.values) {
                        if (label === value) return ValueCodec.writeRaw(writer, raw, bits, field);
                    }
                    throw new EncodeInputError(`${field}: "${value}" is not a label of this table`);
                }
                return ValueCodec.writeRaw(writer, ValueCodec.expectNumber(value, field), bits, field);
            }
            case 'Integer': {
                const n = ValueCodec.expectNumber(value, field);
                if (!Number.isInteger(n)) throw new ValueRangeError(`${field}: ${n} is not an integer`, field);
                ValueCodec.enforceConstraints(resolved.constraints, n, field, options);
                return ValueCodec.writeNumeric(writer, n, bits, resolved.signed, field);
            }
            case 'Quantity': {
                const v = ValueCodec.expectNumber(value, field);
                ValueCodec.enforceConstraints(resolved.constraints, v, field, options);
                return ValueCodec.writeNumeric(writer, ValueCodec.quantityToRaw(resolved, v), bits, resolved.signed, field);
            }
            default:
                return assertNever(resolved);
        }
    }

    /** Nearest raw step; ties round away from zero. */
    static quantityToRaw(rule: Extract<ContentRule, { kind: 'Quantity' }>, value: number): number {
        if (!Number.isFinite(value)) throw new ValueRangeError(`Quantity ${value} is not finite`);
        const steps = value / quantityLsb(rule);
        return Math.sign(steps) * Math.round(Math.abs(steps));
    }

    /** Integer range of a field: two's-complement when signed. */
    static rangeOf(bits: number, signed: boolean): { min: number; max: number } {
        return signed
            ? { min: -Math.pow(2, bits - 1), max: Math.pow(2, bits - 1) - 1 }
            : { min: 0, max: Math.pow(2, bits) - 1 };
    }

    private static writeNumeric(writer: BitWriter, n: number, bits: number, signed: boolean, field: string): number {
        const { min, max } = ValueCodec.rangeOf(bits, signed);
        if (n < min || n > max) {
            throw new ValueRangeError(
                `${field}: raw value ${n} outside the ${signed ? 'signed' : 'unsigned'} ${bits}-bit range [${min}, ${max}]`,
                field
            );
        }
        return ValueCodec.writeRaw(writer, toUnsigned(n, bits), bits, field);
    }

    private static writeRaw(writer: BitWriter, raw: number, bits: number, field: string): number {
        const { max } = ValueCodec.rangeOf(bits, false);
        if (!Number.isInteger(raw) || raw < 0 || raw > max) {
            throw new ValueRangeError(`${field}: ${raw} does not fit in ${bits} unsigned bits`, field);
        }
        writer.writeUnsigned(raw, bits);
        return raw;
    }

    private static writeString(
        writer: BitWriter,
        text: string,
        bits: number,
        encoding: 'ascii' | 'icao6',
        field: string
    ): void {
        const width = STRING_CHAR_BITS[encoding];
        const length = bits / width;
        if (text.length > length) {
            throw new ValueRangeError(`${field}: "${text}" is longer than ${length} characters`, field);
        }
        const padded = text.padEnd(length, ' ');
        for (const ch of padded) {
            const code = encoding === 'ascii' ? ch.charCodeAt(0) : ValueCodec.icao6Code(ch);
            if (code < 0 || code >= Math.pow(2, width)) {
                throw new EncodeInputError(`${field}: character "${ch}" cannot be encoded as ${encoding}`);
            }
            writer.writeUnsigned(code, width);
        }
    }

    private static icao6Code(ch: string): number {
        const upper = ch.toUpperCase();
        return upper === '#' ? 0 : ICAO6_CHARSET.indexOf(upper);
    }

    private static parseOctal(value: ItemInput, bits: number, field: string): number {
        if (typeof value === 'number') return value;
        const digits = bits / STRING_CHAR_BITS.octal;
        if (typeof value !== 'string' || !/^[0-7]+$/.test(value) || value.length > digits) {
            throw new EncodeInputError(`${field}: expected up to ${digits} octal digits, got ${JSON.stringify(value)}`);
        }
        return parseInt(value, 8);
    }

    // --- CONSTRAINTS ---

    private static enforceConstraints(
        constraints: readonly Constraint[],
        value: number,
        field: string,
        options: ValueEncodeOptions
    ): void {
        const violated = checkConstraints(constraints, value);
        if (violated.length === 0) return;
        const message = `${field}: ${value} violates ${violated.map((c) => `${c.op} ${c.bound}`).join(', ')}`;
        if (options.strictConstraints) throw new ValueRangeError(message, field);
        options.logger?.warn?.(message);
    }

    // --- INPUT SHAPES ---

    private static expectNumber(value: ItemInput, field: string): number {
        if (typeof value !== 'number') {
            throw new EncodeInputError(`${field}: expected a number, got ${describeInput(value)}`);
        }
        return value;
    }

    private static expectString(value: ItemInput, field: string): string {
        if (typeof value !== 'string') {
            throw new EncodeInputError(`${field}: expected a string, got ${describeInput(value)}`);
        }
        return value;
    }

    private static expectBytes(value: ItemInput, field: string): Uint8Array {
        if (!(value instanceof Uint8Array)) {
            throw new EncodeInputError(`${field}: expected a byte array, got ${describeInput(value)}`);
        }
        return value;
    }
}

/** Constraints the value violates; an empty list means it is within bounds. */
export function checkConstraints(constraints: readonly Constraint[], value: number): Constraint[] {
    return constraints.filter((c) => {
        switch (c.op) {
            case '<':
                return !(value < c.bound);
            case '<=':
                return !(value <= c.bound);
            case '>':
                return !(value > c.bound);
            case '>=':
                return !(value >= c.bound);
            default:
                return assertNever(c.op);
        }
    });
}

export function describeInput(value: ItemInput): string {
    if (value instanceof Uint8Array) return `${value.length} byte(s)`;
    if (Array.isArray(value)) return 'an array';
    if (typeof value === 'object') return 'an object';
    return JSON.stringify(value);
}
