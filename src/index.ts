/**
 * ASTERIX Codec Public API
 *
 * @module asterix
 */

import { compileCategory } from './asterix/compiler.js';
import { AsterixDecoder } from './asterix/decode.js';
import { AsterixEncoder, type RecordValues } from './asterix/encode.js';
import { SchemaRegistry } from './asterix/registry.js';
import { loadCategory } from './asterix/source-loader.js';
import { exportCategoryXml } from './asterix/xml-export.js';
import type { CategorySchema } from './asterix/schema.js';
import type { DecoderOptions, EncoderOptions } from './asterix/types.js';
import type { DecodeResult } from './asterix-types.js';

export type {
    FieldValue, ItemInput, RecordInput, AsterixRecord, RecordError, DataBlock, DecodeResult, OffsetDecodeResult,
    CategorySource,
} from './asterix-types.js';
export type {
    AsterixLogger, CodecMode, CompilerOptions, DecoderOptions, EncoderOptions, ExpansionSources,
} from './asterix/types.js';
export type {
    CategorySchema, VariationNode, ContentRule, NamedItem, ItemSlot, DataItemSpec, UapSpec, UapSelector, NodeId,
} from './asterix/schema.js';
export type { CategoryDescription, VariationDescription, ItemDescription } from './asterix/description.js';
export {
    AsterixError, SchemaError, AlignmentError, TruncatedInputError, MalformedDataError, UnknownCategoryError,
    EncodeInputError, ValueRangeError,
} from './asterix/errors.js';
export { compileCategory, compileDescription } from './asterix/compiler.js';
export { describeCategory } from './adapters/category-root.js';
export { SchemaRegistry } from './asterix/registry.js';
export { AsterixDecoder, readBlockHeader } from './asterix/decode.js';
export type { BlockHeader, BlockDecodeResult } from './asterix/decode.js';
export { AsterixEncoder } from './asterix/encode.js';
export type { RecordValues } from './asterix/encode.js';
export { Fspec } from './asterix/fspec.js';
export { BitReader, BitWriter, toHex, fromHex } from './asterix-utils.js';
export { loadCategory, loadCategorySource, parseCategorySource, sourceChecksum } from './asterix/source-loader.js';
export type { ExpansionBytes, ExpansionPaths, ParsedCategory } from './asterix/source-loader.js';
export { exportCategoryXml } from './asterix/xml-export.js';
export {
    validateRecord, validateRoundTrip, compareValues, compareAngles, getFieldValue, successRate, summarizeErrors,
    fieldSummaries, createValidationStats,
} from './asterix/validator.js';
export type {
    ToleranceRule, ToleranceSpec, ExpectedRecord, ExpectedValue, FieldCheck, ValidationStats, ValidationResult,
    ErrorSummary,
} from './asterix/validator.js';

// The ASTERIX Namespace Object
export const ASTERIX = {
    /**
     * Decodes every data block in `data` against the given schemas.
     */
    decode: (schemas: SchemaRegistry | readonly CategorySchema[], data: Uint8Array, options?: DecoderOptions): DecodeResult => {
        const registry = schemas instanceof SchemaRegistry ? schemas : SchemaRegistry.of(schemas);
        return new AsterixDecoder(registry, options).decodeAll(data);
    },

    /**
     * Encodes `records` of one category into a single data block.
     */
    encode: (
        schema: CategorySchema,
        records: readonly RecordValues[],
        options?: EncoderOptions & { uap?: string }
    ): Uint8Array => {
        const encoder = new AsterixEncoder(SchemaRegistry.of([schema]), options);
        return encoder.encodeDataBlock(schema.category, records, options?.uap);
    },

    compile: compileCategory,
    load: loadCategory,
    toXml: exportCategoryXml,

    Registry: SchemaRegistry,
    Decoder: AsterixDecoder,
    Encoder: AsterixEncoder,
};

export default ASTERIX;
