export type AsterixLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * How the codec reacts to layouts or data it can still make sense of.
 *
 * - `strict`: throw (default)
 * - `lenient`: repair where possible and log a warning
 */
export type CodecMode = 'strict' | 'lenient';

/** Nested definitions for Explicit items (`RE` / `SP`), in either schema dialect. */
export type ExpansionSources = {
    re?: unknown;
    sp?: unknown;
};

export type CompilerOptions = {
    /** Extended items whose fields overrun the FX bit: throw or clamp. */
    layoutMode?: CodecMode;
    /** Optional logger hook; src/ never writes to the console itself. */
    logger?: AsterixLogger | null;
    /** sha1 of the source bytes, carried into the schema and XML export. */
    checksum?: string | null;
    expansions?: ExpansionSources;
};

export type DecoderOptions = {
    /**
     * - 'strict' (default): unknown categories and unexpected FX extensions throw
     * - 'lenient': skip them and log a warning
     */
    mode?: CodecMode;
    /** Only return data blocks of this category; others are consumed and dropped. */
    filterCategory?: number | null;
    /** Stop after this many records (0 = unlimited). */
    maxRecords?: number;
    /** Force a named UAP instead of the default / selector choice. */
    uap?: string | null;
    logger?: AsterixLogger | null;
};

export type EncoderOptions = {
    /** Throw ValueRangeError when a value violates its declared constraints. */
    strictConstraints?: boolean;
    logger?: AsterixLogger | null;
};

export const DEFAULT_COMPILER_OPTIONS: Required<CompilerOptions> = {
    layoutMode: 'strict',
    logger: null,
    checksum: null,
    expansions: {},
};

export const DEFAULT_DECODER_OPTIONS: Required<DecoderOptions> = {
    mode: 'strict',
    filterCategory: null,
    maxRecords: 0,
    uap: null,
    logger: null,
};

export const DEFAULT_ENCODER_OPTIONS: Required<EncoderOptions> = {
    strictConstraints: false,
    logger: null,
};
