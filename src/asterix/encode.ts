import type { ItemInput, RecordInput } from '../asterix-types.js';
import { concatBytes } from '../asterix-utils.js';
import { EncodeInputError, ValueRangeError } from './errors.js';
import { DATA_BLOCK_HEADER_SIZE, MAX_DATA_BLOCK_LENGTH } from './format.js';
import { Fspec } from './fspec.js';
import { ItemEncoder } from './item-encode.js';
import type { SchemaRegistry } from './registry.js';
import { getItemSpec, type CategorySchema, type UapSpec } from './schema.js';
import { DEFAULT_ENCODER_OPTIONS, type EncoderOptions } from './types.js';
import { defaultUap, findUap, frnOf, selectUap } from './uap.js';

/** Record values as a plain object or as the `items` map of a decoded record. */
export type RecordValues = RecordInput | ReadonlyMap<string, ItemInput>;

function isValueMap(values: RecordValues): values is ReadonlyMap<string, ItemInput> {
    return values instanceof Map;
}

function entriesOf(values: RecordValues): [string, ItemInput][] {
    return isValueMap(values) ? [...values.entries()] : Object.entries(values);
}

export class AsterixEncoder {
    private readonly options: Required<EncoderOptions>;

    constructor(private readonly registry: SchemaRegistry, options: EncoderOptions = {}) {
        this.options = { ...DEFAULT_ENCODER_OPTIONS, ...options };
    }

    /**
     * Encodes one record: FSPEC followed by the items in FRN order.
     *
     * @param uapName - UAP to encode with; defaults to the one chosen by the
     *   category's selector field, then to the first UAP
     */
    encodeRecord(category: number, values: RecordValues, uapName?: string): Uint8Array {
        const schema = this.registry.get(category);
        const entries = entriesOf(values);
        const uap = uapName === undefined ? this.chooseUap(schema, entries) : findUap(schema, uapName);

        const present = entries.map(([name, value]) => {
            const frn = frnOf(uap, name);
            if (frn === 0) {
                throw new EncodeInputError(`Item ${name} is not part of UAP ${uap.name} of category ${category}`);
            }
            return { name, value, frn };
        }).sort((a, b) => a.frn - b.frn);

        const encoder = new ItemEncoder(schema, this.options);
        const blocks = present.map(({ name, value }) => encoder.encode(getItemSpec(schema, name).variation, value, [name]));
        return concatBytes([Fspec.encode(present.map((p) => p.frn)), ...blocks]);
    }

    /** Wraps encoded records into one data block: CAT, LEN (big-endian), records. */
    encodeDataBlock(category: number, records: readonly RecordValues[], uapName?: string): Uint8Array {
        const body = records.map((record) => this.encodeRecord(category, record, uapName));
        const length = body.reduce((sum, r) => sum + r.length, DATA_BLOCK_HEADER_SIZE);
        if (length > MAX_DATA_BLOCK_LENGTH) {
            throw new ValueRangeError(`Data block of ${length} bytes exceeds LEN ${MAX_DATA_BLOCK_LENGTH}`);
        }
        this.options.logger?.info?.(`Encoded category ${category} block: ${records.length} record(s), ${length} bytes`);
        return concatBytes([Uint8Array.of(category, length >> 8, length & 0xFF), ...body]);
    }

    /** Encodes the selector item on its own to learn which UAP the values ask for. */
    private chooseUap(schema: CategorySchema, entries: readonly [string, ItemInput][]): UapSpec {
        const selector = schema.selector;
        if (selector === null) return defaultUap(schema);
        const itemName = selector.path[0];
        const entry = entries.find(([name]) => name === itemName);
        if (itemName === undefined || entry === undefined) return defaultUap(schema);
        const probe = new ItemEncoder(schema, this.options);
        probe.encode(getItemSpec(schema, itemName).variation, entry[1], [itemName]);
        return selectUap(schema, probe.context) ?? defaultUap(schema);
    }
}
