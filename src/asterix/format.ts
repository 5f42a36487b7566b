// Data block: [CAT u8][LEN u16 BE, includes header][records...]
export const DATA_BLOCK_HEADER_SIZE = 3;
export const MAX_DATA_BLOCK_LENGTH = 0xFFFF;

// FSPEC / Extended octets: bits 8..2 carry data, bit 1 is FX
export const FSPEC_BITS_PER_OCTET = 7;
export const FX_MASK = 0x01;

// Explicit items: [LEN u8, includes itself][payload]
export const EXPLICIT_LENGTH_SIZE = 1;
export const MAX_EXPLICIT_LENGTH = 0xFF;

/** Default REP counter width for repetitive items. */
export const DEFAULT_REP_BITS = 8;

/** Mode S BDS register payload. */
export const BDS_BITS = 56;

/** Widest field returned as a plain number (Number.MAX_SAFE_INTEGER). */
export const MAX_NUMERIC_BITS = 53;

// ICAO 6-bit character set (Annex 10): index = code. '#' stands for codes
// without a character and encodes back as 0.
export const ICAO6_CHARSET =
    '#ABCDEFGHIJKLMNOPQRSTUVWXYZ##### ###############0123456789######';
