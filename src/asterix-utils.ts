/**
 * ASTERIX Utilities
 *
 * @module asterix
 *
 * MSB-first bit access over byte buffers. Values up to 53 bits are handled
 * with plain arithmetic (no 32-bit shifts) so every width the wire format uses
 * stays exact in a JS number.
 */
import { MalformedDataError, TruncatedInputError, ValueRangeError } from './asterix/errors.js';
import { MAX_NUMERIC_BITS } from './asterix/format.js';

export class BitReader {
    private bitPos: number;
    private readonly endBit: number;

    /**
     * @param start - byte offset of the first bit
     * @param end - byte offset one past the last readable byte
     */
    constructor(private readonly data: Uint8Array, start: number, end: number = data.length) {
        this.bitPos = start * 8;
        this.endBit = Math.min(end, data.length) * 8;
    }

    get position(): number {
        return this.bitPos;
    }

    get remainingBits(): number {
        return this.endBit - this.bitPos;
    }

    get buffer(): Uint8Array {
        return this.data;
    }

    /** Byte offset one past the last readable byte. */
    get endByte(): number {
        return this.endBit / 8;
    }

    /** Current byte offset; the cursor must sit on an octet boundary. */
    get bytePosition(): number {
        if (this.bitPos % 8 !== 0) {
            throw new MalformedDataError(`Cursor at bit ${this.bitPos} is not octet aligned`, Math.floor(this.bitPos / 8));
        }
        return this.bitPos / 8;
    }

    skip(bits: number): void {
        this.ensure(bits);
        this.bitPos += bits;
    }

    /** Splits off a reader over the next `bytes` octets and moves past them. */
    take(bytes: number): BitReader {
        const start = this.bytePosition;
        this.ensure(bytes * 8);
        this.bitPos += bytes * 8;
        return new BitReader(this.data, start, start + bytes);
    }

    readBit(): number {
        this.ensure(1);
        const byte = this.data[Math.floor(this.bitPos / 8)];
        const bit = (byte >> (7 - (this.bitPos % 8))) & 1;
        this.bitPos++;
        return bit;
    }

    /** Unsigned read of up to 53 bits. */
    readUnsigned(bits: number): number {
        if (bits > MAX_NUMERIC_BITS) {
            throw new ValueRangeError(`Cannot read ${bits} bits into a number (max ${MAX_NUMERIC_BITS})`);
        }
        this.ensure(bits);
        let value = 0;
        for (let i = 0; i < bits; i++) {
            value = value * 2 + this.readBit();
        }
        return value;
    }

    /** Two's-complement read of up to 53 bits. */
    readSigned(bits: number): number {
        const raw = this.readUnsigned(bits);
        return toSigned(raw, bits);
    }

    /** Reads `bits` bits right-aligned into ceil(bits/8) bytes. */
    readBytes(bits: number): Uint8Array {
        this.ensure(bits);
        const out = new Uint8Array(Math.ceil(bits / 8));
        const pad = out.length * 8 - bits;
        for (let i = 0; i < bits; i++) {
            if (this.readBit()) {
                const target = pad + i;
                out[Math.floor(target / 8)] |= 0x80 >> (target % 8);
            }
        }
        return out;
    }

    private ensure(bits: number): void {
        if (this.bitPos + bits > this.endBit) {
            throw new TruncatedInputError(
                `Need ${bits} bit(s) at byte ${Math.floor(this.bitPos / 8)}, only ${this.endBit - this.bitPos} left`,
                Math.floor(this.bitPos / 8)
            );
        }
    }
}

export class BitWriter {
    private bitPos = 0;
    readonly bytes: Uint8Array;

    constructor(byteLength: number) {
        this.bytes = new Uint8Array(byteLength);
    }

    get position(): number {
        return this.bitPos;
    }

    seek(bitPos: number): void {
        this.bitPos = bitPos;
    }

    writeBit(bit: number): void {
        if (this.bitPos >= this.bytes.length * 8) {
            throw new ValueRangeError(`Bit writer overflow at bit ${this.bitPos}`);
        }
        if (bit) {
            this.bytes[Math.floor(this.bitPos / 8)] |= 0x80 >> (this.bitPos % 8);
        }
        this.bitPos++;
    }

    /** Writes a non-negative integer below 2^bits, MSB first. */
    writeUnsigned(value: number, bits: number): void {
        if (!Number.isInteger(value) || value < 0 || value >= Math.pow(2, bits)) {
            throw new ValueRangeError(`Value ${value} does not fit in ${bits} unsigned bits`);
        }
        let p2 = Math.pow(2, bits - 1);
        for (let i = 0; i < bits; i++) {
            this.writeBit(Math.floor(value / p2) % 2);
            p2 /= 2;
        }
    }

    /** Writes the right-aligned `bits` bits of a byte array. */
    writeBytes(src: Uint8Array, bits: number): void {
        const expected = Math.ceil(bits / 8);
        if (src.length !== expected) {
            throw new ValueRangeError(`Expected ${expected} byte(s) for a ${bits}-bit field, got ${src.length}`);
        }
        const pad = expected * 8 - bits;
        for (let i = 0; i < pad; i++) {
            if ((src[0] >> (7 - i)) & 1) {
                throw new ValueRangeError(`Byte value overflows the ${bits}-bit field`);
            }
        }
        for (let i = 0; i < bits; i++) {
            const source = pad + i;
            this.writeBit((src[Math.floor(source / 8)] >> (7 - (source % 8))) & 1);
        }
    }

    writeZeros(bits: number): void {
        for (let i = 0; i < bits; i++) this.writeBit(0);
    }
}

export function toSigned(raw: number, bits: number): number {
    const half = Math.pow(2, bits - 1);
    return raw >= half ? raw - half * 2 : raw;
}

export function toUnsigned(value: number, bits: number): number {
    return value < 0 ? value + Math.pow(2, bits) : value;
}

/** Concatenates byte chunks. */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
    const total = chunks.reduce((sum, c) => sum + c.length, 0);
    const out = new Uint8Array(total);
    let pos = 0;
    for (const c of chunks) {
        out.set(c, pos);
        pos += c.length;
    }
    return out;
}

export function toHex(data: Uint8Array): string {
    let s = '';
    for (const b of data) s += b.toString(16).padStart(2, '0');
    return s;
}

export function fromHex(hex: string): Uint8Array {
    const clean = hex.replace(/\s+/g, '');
    if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
        throw new ValueRangeError(`Invalid hex string: ${hex}`);
    }
    const out = new Uint8Array(clean.length / 2);
    for (let i = 0; i < out.length; i++) {
        out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
    }
    return out;
}
