import { describe, it, expect } from 'vitest';
import { BitReader, BitWriter, fromHex, toHex, toSigned, toUnsigned } from '../src/asterix-utils.js';
import { MalformedDataError, TruncatedInputError, ValueRangeError } from '../src/asterix/errors.js';
import { bytes, hex } from './helpers/test-utils.js';

describe('BitReader', () => {
    it('reads MSB-first across octet boundaries', () => {
        const reader = new BitReader(bytes('a5c3'), 0);
        expect(reader.readUnsigned(3)).toBe(5);
        expect(reader.readUnsigned(7)).toBe(0x17);
        expect(reader.readUnsigned(6)).toBe(0x03);
        expect(reader.remainingBits).toBe(0);
    });

    it('reads two\'s-complement values', () => {
        expect(new BitReader(bytes('ff'), 0).readSigned(8)).toBe(-1);
        expect(new BitReader(bytes('c0'), 0).readSigned(2)).toBe(-1);
        expect(new BitReader(bytes('80'), 0).readSigned(8)).toBe(-128);
        expect(new BitReader(bytes('7f'), 0).readSigned(8)).toBe(127);
    });

    it('reads 53-bit values exactly', () => {
        const reader = new BitReader(bytes('ff ff ff ff ff ff f8'), 0);
        expect(reader.readUnsigned(53)).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('refuses numbers wider than 53 bits', () => {
        expect(() => new BitReader(new Uint8Array(8), 0).readUnsigned(54)).toThrow(ValueRangeError);
    });

    it('reads byte payloads right-aligned', () => {
        expect(hex(new BitReader(bytes('abcd'), 0).readBytes(12))).toBe('0abc');
        expect(hex(new BitReader(bytes('abcd'), 0).readBytes(16))).toBe('abcd');
    });

    it('throws TruncatedInputError past the end bound', () => {
        const reader = new BitReader(bytes('0102'), 0, 1);
        reader.skip(8);
        expect(() => reader.readBit()).toThrow(TruncatedInputError);
    });

    it('splits off a bounded sub-reader', () => {
        const reader = new BitReader(bytes('010203'), 0);
        reader.skip(8);
        const sub = reader.take(1);
        expect(reader.position).toBe(16);
        expect(sub.remainingBits).toBe(8);
        expect(sub.readUnsigned(8)).toBe(2);
        expect(() => sub.readBit()).toThrow(TruncatedInputError);
    });

    it('requires octet alignment for byte positions', () => {
        const reader = new BitReader(bytes('00'), 0);
        reader.skip(3);
        expect(() => reader.bytePosition).toThrow(MalformedDataError);
    });
});

describe('BitWriter', () => {
    it('writes MSB-first across octet boundaries', () => {
        const writer = new BitWriter(2);
        writer.writeUnsigned(5, 3);
        writer.writeUnsigned(0x17, 7);
        writer.writeUnsigned(0x03, 6);
        expect(hex(writer.bytes)).toBe('a5c3');
    });

    it('seeks to write into a pre-sized buffer', () => {
        const writer = new BitWriter(1);
        writer.seek(7);
        writer.writeBit(1);
        expect(hex(writer.bytes)).toBe('01');
    });

    it('rejects values that do not fit', () => {
        expect(() => new BitWriter(1).writeUnsigned(8, 3)).toThrow(ValueRangeError);
        expect(() => new BitWriter(1).writeUnsigned(-1, 3)).toThrow(ValueRangeError);
    });

    it('rejects writes past the buffer', () => {
        const writer = new BitWriter(1);
        writer.writeUnsigned(0, 8);
        expect(() => writer.writeBit(0)).toThrow(ValueRangeError);
    });

    it('writes right-aligned byte payloads', () => {
        const writer = new BitWriter(2);
        writer.writeUnsigned(0xA, 4);
        writer.writeBytes(bytes('0bcd'), 12);
        expect(hex(writer.bytes)).toBe('abcd');
    });

    it('rejects payloads overflowing their field', () => {
        expect(() => new BitWriter(2).writeBytes(bytes('1bcd'), 12)).toThrow(ValueRangeError);
        expect(() => new BitWriter(2).writeBytes(bytes('bc'), 12)).toThrow(ValueRangeError);
    });
});

describe('number helpers', () => {
    it('converts between signed and unsigned representations', () => {
        expect(toSigned(0xB6, 8)).toBe(-74);
        expect(toUnsigned(-74, 8)).toBe(0xB6);
        expect(toUnsigned(5, 8)).toBe(5);
    });

    it('round-trips hex strings', () => {
        expect(toHex(fromHex('00 7f FF'))).toBe('007fff');
        expect(() => fromHex('abc')).toThrow(ValueRangeError);
        expect(() => fromHex('zz')).toThrow(ValueRangeError);
    });
});
