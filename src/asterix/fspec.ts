import { TruncatedInputError, ValueRangeError } from './errors.js';
import { FSPEC_BITS_PER_OCTET, FX_MASK } from './format.js';

export interface FspecDecodeResult {
    /** Present FRNs, ascending */
    frns: number[];
    bytesConsumed: number;
}

export class Fspec {

    // --- FX-CHAINED ---
    // FRN n lives in octet floor((n-1)/7) at bit 8-1-((n-1)%7) (MSB = bit 8).
    // Bit 1 of every octet but the last is the FX flag.

    static encode(frns: Iterable<number>): Uint8Array {
        const sorted = Fspec.normalize(frns);
        const last = sorted.length === 0 ? 0 : sorted[sorted.length - 1];
        const octets = Math.max(1, Math.ceil(last / FSPEC_BITS_PER_OCTET));
        const out = new Uint8Array(octets);
        for (const frn of sorted) {
            const index = Math.floor((frn - 1) / FSPEC_BITS_PER_OCTET);
            const bit = 8 - 1 - ((frn - 1) % FSPEC_BITS_PER_OCTET);
            out[index] |= 1 << bit;
        }
        for (let i = 0; i < octets - 1; i++) out[i] |= FX_MASK;
        return out;
    }

    static decode(data: Uint8Array, offset: number = 0, end: number = data.length): FspecDecodeResult {
        const limit = Math.min(end, data.length);
        const frns: number[] = [];
        let pos = offset;
        for (;;) {
            if (pos >= limit) {
                throw new TruncatedInputError(
                    pos === offset ? `Empty FSPEC at byte ${pos}` : `FSPEC extension octet missing at byte ${pos}`,
                    pos
                );
            }
            const octet = data[pos];
            const base = (pos - offset) * FSPEC_BITS_PER_OCTET;
            for (let i = 0; i < FSPEC_BITS_PER_OCTET; i++) {
                if ((octet >> (7 - i)) & 1) frns.push(base + i + 1);
            }
            pos++;
            if ((octet & FX_MASK) === 0) break;
        }
        return { frns, bytesConsumed: pos - offset };
    }

    // --- FIXED LENGTH ---
    // Used by compound items declaring an FSPEC size: no FX bit, one presence
    // bit per declared sub-item, MSB first, ceil(bitCount/8) octets.

    static encodeFixed(frns: Iterable<number>, bitCount: number): Uint8Array {
        const out = new Uint8Array(Math.ceil(bitCount / 8));
        for (const frn of Fspec.normalize(frns)) {
            if (frn > bitCount) {
                throw new ValueRangeError(`FRN ${frn} exceeds the fixed FSPEC width of ${bitCount} bits`);
            }
            out[Math.floor((frn - 1) / 8)] |= 0x80 >> ((frn - 1) % 8);
        }
        return out;
    }

    static decodeFixed(data: Uint8Array, offset: number, bitCount: number, end: number = data.length): FspecDecodeResult {
        const octets = Math.ceil(bitCount / 8);
        if (offset + octets > Math.min(end, data.length)) {
            throw new TruncatedInputError(`Fixed FSPEC of ${octets} octet(s) truncated at byte ${offset}`, offset);
        }
        const frns: number[] = [];
        for (let i = 0; i < bitCount; i++) {
            if ((data[offset + Math.floor(i / 8)] >> (7 - (i % 8))) & 1) frns.push(i + 1);
        }
        return { frns, bytesConsumed: octets };
    }

    private static normalize(frns: Iterable<number>): number[] {
        const unique = new Set<number>();
        for (const frn of frns) {
            if (!Number.isInteger(frn) || frn <= 0) {
                throw new ValueRangeError(`Invalid FRN ${frn}: must be a positive integer`);
            }
            unique.add(frn);
        }
        return [...unique].sort((a, b) => a - b);
    }
}
