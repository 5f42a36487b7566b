/**
 * ASTERIX Types - Record and value shapes shared by the decoder, encoder and validator
 *
 * @module asterix
 *
 * The schema AST lives in `asterix/schema.ts`; everything here is per-call data
 * owned by the caller.
 */

// ============================================================================
// Field values
// ============================================================================

/**
 * A decoded data item or sub-field.
 *
 * - Raw / Integer / Quantity fields: `number` (quantities already scaled)
 * - Table fields: the label, or the raw number when the table has no entry
 * - String fields: `string` (octal fields as zero-padded octal digits)
 * - Bds fields and raw fields wider than 53 bits: `Uint8Array`
 * - Group / Extended / Compound: object keyed by sub-item name
 * - Repetitive: array of element values
 * - Explicit without a nested definition: `Uint8Array` payload
 */
export type FieldValue =
    | number
    | string
    | Uint8Array
    | FieldValue[]
    | { [name: string]: FieldValue };

/**
 * Encoder input. Same shapes as {@link FieldValue}: every decoded value is
 * accepted back by the encoder.
 */
export type ItemInput =
    | number
    | string
    | Uint8Array
    | readonly ItemInput[]
    | { readonly [name: string]: ItemInput };

/** Values for one record, keyed by data item name (e.g. `"010"`). */
export type RecordInput = { readonly [itemName: string]: ItemInput };

// ============================================================================
// Records & data blocks
// ============================================================================

export interface AsterixRecord {
    /** ASTERIX category (1-255) */
    category: number;
    /** Record length in bytes (FSPEC included) */
    length: number;
    /** Byte offset of the record's FSPEC in the input buffer */
    offset: number;
    /** Name of the UAP the record was decoded with */
    uap: string;
    /** Present FRNs, ascending */
    frns: number[];
    /** Decoded items in FRN order */
    items: Map<string, FieldValue>;
}

export interface RecordError {
    /** Byte offset of the record that failed */
    offset: number;
    error: Error;
}

export interface DataBlock {
    category: number;
    /** LEN field of the block header */
    length: number;
    /** Byte offset of the CAT octet in the input buffer */
    offset: number;
    records: AsterixRecord[];
    /** Errors of records that could not be decoded; decoding of the block stops at the first one */
    errors: RecordError[];
}

export interface DecodeResult {
    blocks: DataBlock[];
    /** Convenience flattening of `blocks[].records` */
    records: AsterixRecord[];
    errors: RecordError[];
    bytesConsumed: number;
}

/**
 * Result of incremental decoding. Decoding stops before a data block that is
 * not fully contained in the buffer.
 */
export interface OffsetDecodeResult {
    records: AsterixRecord[];
    errors: RecordError[];
    /** Bytes consumed starting at the given offset */
    bytesConsumed: number;
    /** Estimated number of complete blocks still in the buffer */
    remainingBlocks: number;
}

// ============================================================================
// Schema sources
// ============================================================================

/**
 * A parsed declarative category description, as read from disk or handed
 * over by the caller.
 */
export interface CategorySource {
    /** Parsed JSON root (either dialect, optionally wrapped in `contents`) */
    root: unknown;
    /** sha1 hex of the raw bytes the root was parsed from */
    checksum: string | null;
}
