import type {
    AsterixRecord, DataBlock, DecodeResult, FieldValue, OffsetDecodeResult, RecordError,
} from '../asterix-types.js';
import { BitReader } from '../asterix-utils.js';
import { AsterixError, MalformedDataError, TruncatedInputError, UnknownCategoryError } from './errors.js';
import { DATA_BLOCK_HEADER_SIZE } from './format.js';
import { Fspec } from './fspec.js';
import { ItemDecoder } from './item-decode.js';
import type { SchemaRegistry } from './registry.js';
import { getItemSpec, type CategorySchema } from './schema.js';
import { DEFAULT_DECODER_OPTIONS, type DecoderOptions } from './types.js';
import { defaultUap, findUap, selectUap } from './uap.js';

export interface BlockHeader {
    category: number;
    /** LEN field: header included */
    length: number;
}

export interface BlockDecodeResult {
    /** Null when the block was skipped (filtered out, or unknown category in lenient mode) */
    block: DataBlock | null;
    bytesConsumed: number;
}

const ERR_HEADER_TRUNCATED = 'Data block header truncated';

/**
 * Reads and checks a data block header.
 *
 * @throws TruncatedInputError when the header or the declared block runs past the buffer
 * @throws MalformedDataError when LEN is smaller than the header
 */
export function readBlockHeader(data: Uint8Array, offset: number): BlockHeader {
    if (data.length - offset < DATA_BLOCK_HEADER_SIZE) {
        throw new TruncatedInputError(`${ERR_HEADER_TRUNCATED} at byte ${offset}`, offset);
    }
    const header = peekBlockHeader(data, offset);
    if (header.length < DATA_BLOCK_HEADER_SIZE) {
        throw new MalformedDataError(`Data block at byte ${offset} declares LEN ${header.length}`, offset);
    }
    if (offset + header.length > data.length) {
        throw new TruncatedInputError(
            `Data block at byte ${offset} declares LEN ${header.length} but only ${data.length - offset} byte(s) remain`,
            offset
        );
    }
    return header;
}

function peekBlockHeader(data: Uint8Array, offset: number): BlockHeader {
    return { category: data[offset], length: (data[offset + 1] << 8) | data[offset + 2] };
}

/** True for errors that belong to a record's bytes rather than to the codec. */
function isRecordError(error: unknown): error is Error {
    return error instanceof AsterixError || error instanceof RangeError;
}

export class AsterixDecoder {
    private readonly options: Required<DecoderOptions>;

    constructor(private readonly registry: SchemaRegistry, options: DecoderOptions = {}) {
        this.options = { ...DEFAULT_DECODER_OPTIONS, ...options };
    }

    /** Decodes every data block in the buffer. */
    decodeAll(data: Uint8Array): DecodeResult {
        const blocks: DataBlock[] = [];
        let offset = 0;
        let budget = this.recordBudget();
        while (offset < data.length && budget > 0) {
            const { block, bytesConsumed } = this.decodeBlockWithin(data, offset, budget);
            offset += bytesConsumed;
            if (block === null) continue;
            blocks.push(block);
            budget -= block.records.length;
        }
        return {
            blocks,
            records: blocks.flatMap((b) => b.records),
            errors: blocks.flatMap((b) => b.errors),
            bytesConsumed: offset,
        };
    }

    decodeBlock(data: Uint8Array, offset: number = 0): BlockDecodeResult {
        return this.decodeBlockWithin(data, offset, this.recordBudget());
    }

    /**
     * Incremental decoding for stream consumers: decodes whole blocks starting
     * at `offset` and stops, without throwing, before a block that is not
     * complete in the buffer yet.
     *
     * @param maxBlocks - stop after this many blocks (0 = no limit)
     */
    decodeWithOffset(data: Uint8Array, offset: number = 0, maxBlocks: number = 0): OffsetDecodeResult {
        const records: AsterixRecord[] = [];
        const errors: RecordError[] = [];
        let pos = offset;
        let blocks = 0;
        let budget = this.recordBudget();
        while (budget > 0 && (maxBlocks === 0 || blocks < maxBlocks) && this.hasCompleteBlock(data, pos)) {
            const { block, bytesConsumed } = this.decodeBlockWithin(data, pos, budget);
            pos += bytesConsumed;
            blocks++;
            if (block === null) continue;
            records.push(...block.records);
            errors.push(...block.errors);
            budget -= block.records.length;
        }
        return { records, errors, bytesConsumed: pos - offset, remainingBlocks: this.countCompleteBlocks(data, pos) };
    }

    /**
     * Decodes one record (FSPEC + items) between `offset` and `end`.
     *
     * @param uapName - force a UAP; defaults to the decoder option, then the selector
     */
    decodeRecord(
        schema: CategorySchema,
        data: Uint8Array,
        offset: number,
        end: number = data.length,
        uapName: string | null = this.options.uap
    ): AsterixRecord {
        const { frns, bytesConsumed } = Fspec.decode(data, offset, end);
        const reader = new BitReader(data, offset + bytesConsumed, end);
        const decoder = new ItemDecoder(schema, this.options.mode, this.options.logger);
        const forced = uapName !== null;
        let uap = uapName !== null ? findUap(schema, uapName) : defaultUap(schema);

        const items = new Map<string, FieldValue>();
        for (const frn of frns) {
            const name = uap.items[frn - 1];
            if (name === undefined || name === null) {
                throw new MalformedDataError(
                    `Record at byte ${offset} of category ${schema.category} flags FRN ${frn}, unused in UAP ${uap.name}`,
                    offset
                );
            }
            items.set(name, decoder.decode(getItemSpec(schema, name).variation, reader, [name]));
            if (!forced) uap = selectUap(schema, decoder.context) ?? uap;
        }
        return {
            category: schema.category,
            length: reader.position / 8 - offset,
            offset,
            uap: uap.name,
            frns,
            items,
        };
    }

    // --- internals ---

    private recordBudget(): number {
        return this.options.maxRecords > 0 ? this.options.maxRecords : Number.POSITIVE_INFINITY;
    }

    private decodeBlockWithin(data: Uint8Array, offset: number, budget: number): BlockDecodeResult {
        const { category, length } = readBlockHeader(data, offset);
        const { filterCategory, logger } = this.options;
        if (filterCategory !== null && category !== filterCategory) {
            return { block: null, bytesConsumed: length };
        }
        const schema = this.registry.find(category);
        if (schema === undefined) {
            if (this.options.mode === 'strict') throw new UnknownCategoryError(category);
            logger?.warn?.(`Skipping data block of unknown category ${category} at byte ${offset}`);
            return { block: null, bytesConsumed: length };
        }

        const block: DataBlock = { category, length, offset, records: [], errors: [] };
        const end = offset + length;
        let pos = offset + DATA_BLOCK_HEADER_SIZE;
        while (pos < end && block.records.length < budget) {
            try {
                const record = this.decodeRecord(schema, data, pos, end);
                block.records.push(record);
                pos += record.length;
            } catch (error) {
                if (!isRecordError(error)) throw error;
                logger?.error?.(`Category ${category} record at byte ${pos}: ${error.message}`);
                block.errors.push({ offset: pos, error });
                break;
            }
        }
        return { block, bytesConsumed: length };
    }

    private hasCompleteBlock(data: Uint8Array, offset: number): boolean {
        if (data.length - offset < DATA_BLOCK_HEADER_SIZE) return false;
        const { length } = peekBlockHeader(data, offset);
        if (length < DATA_BLOCK_HEADER_SIZE) {
            throw new MalformedDataError(`Data block at byte ${offset} declares LEN ${length}`, offset);
        }
        return offset + length <= data.length;
    }

    private countCompleteBlocks(data: Uint8Array, offset: number): number {
        let count = 0;
        let pos = offset;
        while (data.length - pos >= DATA_BLOCK_HEADER_SIZE) {
            const { length } = peekBlockHeader(data, pos);
            if (length < DATA_BLOCK_HEADER_SIZE || pos + length > data.length) break;
            count++;
            pos += length;
        }
        return count;
    }
}
