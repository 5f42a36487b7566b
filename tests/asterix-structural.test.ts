import { describe, it, expect } from 'vitest';
import { AsterixDecoder } from '../src/asterix/decode.js';
import { AsterixEncoder, type RecordValues } from '../src/asterix/encode.js';
import { AsterixError, EncodeInputError, MalformedDataError, TruncatedInputError, ValueRangeError } from '../src/asterix/errors.js';
import { SchemaRegistry } from '../src/asterix/registry.js';
import type { CategorySchema } from '../src/asterix/schema.js';
import type { DecoderOptions } from '../src/asterix/types.js';
import {
    bytes, captureLogger, compileInline, element, hex, item, loadCat034, loadCat048, quantity, spare, table,
} from './helpers/test-utils.js';

function encodeWith(schema: CategorySchema, values: RecordValues): string {
    return hex(new AsterixEncoder(SchemaRegistry.of([schema])).encodeRecord(schema.category, values));
}

function decodeWith(schema: CategorySchema, record: string, options: DecoderOptions = {}) {
    return new AsterixDecoder(SchemaRegistry.of([schema]), options).decodeRecord(schema, bytes(record), 0);
}

const cat048 = loadCat048();

describe('Extended items', () => {
    it('emits only the first chunk when later fields are absent', () => {
        expect(encodeWith(cat048, { '020': { TYP: 'Single ModeS Roll-Call', SIM: 0, RDP: 0, SPI: 0, RAB: 0 } })).toBe('20a0');
    });

    it('decodes fields of the chunks present', () => {
        expect(decodeWith(cat048, '20a0').items.get('020')).toEqual({
            TYP: 'Single ModeS Roll-Call',
            SIM: 'Actual target report',
            RDP: 0,
            SPI: 0,
            RAB: 0,
        });
    });

    it('chains extents with FX', () => {
        expect(encodeWith(cat048, { '020': { TYP: 2, SIM: 1, RDP: 0, SPI: 0, RAB: 0, TST: 1, ERR: 0, XPP: 0, ME: 0, MI: 0, FOEFRI: 3 } })).toBe('205186');
        expect(decodeWith(cat048, '205186').items.get('020')).toEqual({
            TYP: 'Single SSR detection',
            SIM: 'Simulated target report',
            RDP: 0,
            SPI: 0,
            RAB: 0,
            TST: 1,
            ERR: 0,
            XPP: 0,
            ME: 0,
            MI: 0,
            FOEFRI: 3,
        });
    });

    it('rejects FX after the last declared extent in strict mode', () => {
        expect(() => decodeWith(cat048, '20a10100')).toThrow(MalformedDataError);
        expect(() => decodeWith(cat048, '20a10100')).toThrow('Extended item 020 sets FX after its last declared extent');
    });

    it('skips unexpected extents in lenient mode', () => {
        const logger = captureLogger();
        const record = decodeWith(cat048, '20a10100', { mode: 'lenient', logger });
        expect(record.length).toBe(4);
        expect(record.items.get('020')).toMatchObject({ TYP: 'Single ModeS Roll-Call', FOEFRI: 0 });
        expect(logger.messages).toEqual([{
            level: 'warn',
            msg: 'Extended item 020 sets FX after its last declared extent; skipped 1 extent(s)',
        }]);
    });

    it('refuses to emit a chunk with fields missing', () => {
        expect(() => encodeWith(cat048, { '020': { TST: 1 } })).toThrow(EncodeInputError);
        expect(() => encodeWith(cat048, { '020': { TST: 1 } })).toThrow('020: missing sub-item TYP');
        expect(() => encodeWith(cat048, { '020': { TYP: 0, SIM: 0, RDP: 0, SPI: 0, RAB: 0, FOEFRI: 1 } }))
            .toThrow('020: missing sub-item TST');
    });

    it('rejects unknown sub-items', () => {
        expect(() => encodeWith(cat048, { '020': { TYP: 0, NOPE: 1 } })).toThrow('020: unknown sub-item NOPE');
    });

    it('reads clamped fields as raw bits', () => {
        const schema = compileInline({
            category: 2,
            edition: '1.0',
            catalogue: [{
                name: '020',
                variation: {
                    type: 'Extended',
                    first: 8,
                    extents: 8,
                    items: [
                        { name: 'A', variation: { type: 'Element', size: 4, rule: { type: 'ContextFree', content: { type: 'Raw' } } } },
                        { name: 'B', variation: { type: 'Element', size: 4, rule: { type: 'ContextFree', content: { type: 'Raw' } } } },
                    ],
                },
            }],
            uap: { type: 'uap', items: ['020'] },
        }, { layoutMode: 'lenient' });
        expect(decodeWith(schema, '805a').items.get('020')).toEqual({ A: 5, B: 5 });
        expect(encodeWith(schema, { '020': { A: 5, B: 5 } })).toBe('805a');
    });
});

describe('Repetitive items', () => {
    it('prefixes counted repetitions with REP', () => {
        const values = { '250': [{ MBDATA: bytes('01020304050607'), BDS1: 4, BDS2: 0 }] };
        expect(encodeWith(cat048, values)).toBe('01800101020304050607' + '40');
        const decoded = decodeWith(cat048, '0180010102030405060740').items.get('250');
        expect(decoded).toEqual([{ MBDATA: bytes('01020304050607'), BDS1: 4, BDS2: 0 }]);
    });

    it('accepts zero repetitions', () => {
        expect(encodeWith(cat048, { '250': [] })).toBe('018000');
        expect(decodeWith(cat048, '018000').items.get('250')).toEqual([]);
    });

    it('reports a REP larger than the remaining data', () => {
        expect(() => decodeWith(cat048, '0180020102030405060740')).toThrow(TruncatedInputError);
    });

    const fxList = compileInline({
        category: 3,
        edition: '1.0',
        catalogue: [item('010', { type: 'Repetitive', rep: { type: 'Fx' }, variation: element(7) })],
        uap: { type: 'uap', items: ['010'] },
    });

    it('chains FX repetitions', () => {
        expect(encodeWith(fxList, { '010': [1, 2, 3] })).toBe('80030506');
        expect(decodeWith(fxList, '80030506').items.get('010')).toEqual([1, 2, 3]);
    });

    it('needs at least one FX repetition', () => {
        expect(() => encodeWith(fxList, { '010': [] })).toThrow(EncodeInputError);
    });

    it('rejects a REP counter overflow', () => {
        const values = { '250': Array.from({ length: 256 }, () => ({ MBDATA: bytes('00000000000000'), BDS1: 0, BDS2: 0 })) };
        expect(() => encodeWith(cat048, values)).toThrow(ValueRangeError);
    });
});

describe('Explicit items', () => {
    it('carries opaque payloads', () => {
        expect(encodeWith(cat048, { SP: bytes('aabb') })).toBe('010203aabb');
        expect(decodeWith(cat048, '010203aabb').items.get('SP')).toEqual(bytes('aabb'));
    });

    it('rejects a LEN smaller than itself', () => {
        expect(() => decodeWith(cat048, '010200')).toThrow('Explicit item SP declares LEN 0');
    });

    it('rejects payloads over 255 bytes', () => {
        expect(() => encodeWith(cat048, { SP: new Uint8Array(255) })).toThrow(ValueRangeError);
    });

    it('decodes the nested expansion', () => {
        expect(encodeWith(cat048, { RE: { SRC: 5 } })).toBe('010180038005');
        expect(decodeWith(cat048, '010180038005').items.get('RE')).toEqual({ SRC: 5 });
    });

    it('flags bytes left over by the expansion', () => {
        expect(() => decodeWith(cat048, '010180048005ff')).toThrow('Explicit item RE leaves 1 byte(s) undecoded');
        const logger = captureLogger();
        const record = decodeWith(cat048, '010180048005ff', { mode: 'lenient', logger });
        expect(record.items.get('RE')).toEqual({ SRC: 5 });
        expect(record.length).toBe(7);
        expect(logger.messages.map((m) => m.level)).toEqual(['warn']);
    });

    it('fills bounded repetitions from the payload', () => {
        const schema = compileInline({
            category: 4,
            edition: '1.0',
            catalogue: [item('SP', { type: 'Explicit', expl: { type: 'SpecialPurpose' } })],
            uap: { type: 'uap', items: ['SP'] },
        }, {
            expansions: { sp: { rule: { type: 'ContextFree', value: { type: 'Repetitive', rep: { type: 'Bounded' }, variation: element(16) } } } },
        });
        expect(encodeWith(schema, { SP: [0x0102, 0x0304] })).toBe('800501020304');
        expect(decodeWith(schema, '800501020304').items.get('SP')).toEqual([0x0102, 0x0304]);
        expect(() => decodeWith(schema, '8004010203')).toThrow(MalformedDataError);
    });
});

describe('Compound items', () => {
    it('encodes present sub-items behind their own FSPEC', () => {
        expect(encodeWith(cat048, { '130': { SRR: 3, SAM: -74 } })).toBe('046003b6');
        expect(decodeWith(cat048, '046003b6').items.get('130')).toEqual({ SRR: 3, SAM: -74 });
    });

    it('decodes quantities inside compounds', () => {
        expect(decodeWith(cat048, '04800a').items.get('130')).toEqual({ SRL: 0.439453125 });
    });

    it('numbers sub-items by position, skipping empty slots', () => {
        const schema = compileInline({
            category: 6,
            edition: '1.0',
            catalogue: [item('010', { type: 'Compound', items: [null, item('A', element(8)), null, item('B', element(16))] })],
            uap: { type: 'uap', items: ['010'] },
        });
        expect(encodeWith(schema, { '010': { A: 0x11, B: 0x2233 } })).toBe('80' + '50' + '11' + '2233');
        expect(encodeWith(schema, { '010': { B: 0x2233 } })).toBe('80' + '10' + '2233');
        expect(decodeWith(schema, '805011' + '2233').items.get('010')).toEqual({ A: 0x11, B: 0x2233 });
        expect(decodeWith(schema, '80102233').items.get('010')).toEqual({ B: 0x2233 });
        expect(() => decodeWith(schema, '8080')).toThrow('Compound item 010 flags unused position 1');
    });

    it('rejects flags for unused positions', () => {
        const cat034 = loadCat034();
        expect(() => decodeWith(cat034, '0820')).toThrow('Compound item 050 flags unused position 3');
        expect(() => decodeWith(cat048, '01018003200000')).toThrow('Compound item RE flags unused position 3');
    });
});

describe('Group items', () => {
    it('requires every sub-item', () => {
        expect(() => encodeWith(cat048, { '010': { SAC: 1 } })).toThrow('010: missing sub-item SIC');
    });

    it('rejects unknown sub-items', () => {
        expect(() => encodeWith(cat048, { '010': { SAC: 1, SIC: 2, X: 3 } })).toThrow('010: unknown sub-item X');
    });

    it('skips spare bits', () => {
        expect(encodeWith(cat048, { '070': { V: 0, G: 'Garbled code', L: 0, MODE3A: '7777' } })).toBe('084fff');
        expect(decodeWith(cat048, '084fff').items.get('070')).toEqual({
            V: 'Code validated',
            G: 'Garbled code',
            L: 'Mode-3/A code derived from the reply of the transponder',
            MODE3A: '7777',
        });
    });
});

describe('Dependent rules', () => {
    const schema = compileInline({
        category: 5,
        edition: '1.0',
        catalogue: [
            item('010', { type: 'Group', items: [item('IM', element(1, table([0, 'IAS'], [1, 'Mach']))), spare(7)] }),
            item('020', {
                type: 'Element',
                size: 16,
                rule: {
                    type: 'Dependent',
                    path: ['010', 'IM'],
                    default: { type: 'Raw' },
                    cases: [
                        [[0], quantity(1, 14, 'NM/s')],
                        [[1], { type: 'Quantity', signed: false, lsb: { type: 'Real', value: 0.001 }, unit: 'Mach' }],
                    ],
                },
            }),
        ],
        uap: { type: 'uap', items: ['010', '020'] },
    });

    it('scales by the case the discriminant selects', () => {
        expect(encodeWith(schema, { '010': { IM: 'Mach' }, '020': 0.1 })).toBe('c0800064');
        expect(encodeWith(schema, { '010': { IM: 'IAS' }, '020': 0.5 })).toBe('c0002000');
        expect(decodeWith(schema, 'c0002000').items.get('020')).toBe(0.5);
        expect(decodeWith(schema, 'c0800064').items.get('020')).toBeCloseTo(0.1, 12);
    });

    it('encodes in FRN order whatever the key order', () => {
        expect(encodeWith(schema, { '020': 0.1, '010': { IM: 'Mach' } })).toBe('c0800064');
    });

    it('falls back to the default without the discriminant', () => {
        expect(decodeWith(schema, '400064').items.get('020')).toBe(100);
    });
});

describe('UAP selection', () => {
    const schema = compileInline({
        category: 1,
        edition: '1.0',
        catalogue: [
            item('010', { type: 'Group', items: [item('SAC', element(8)), item('SIC', element(8))] }),
            item('020', { type: 'Extended', items: [
                item('TYP', element(1, table([0, 'Plot'], [1, 'Track']))),
                item('SIM', element(1)),
                item('SSRPSR', element(2)),
                item('ANT', element(1)),
                item('SPI', element(1)),
                item('RAB', element(1)),
                null,
            ] }),
            item('040', { type: 'Group', items: [item('RHO', element(16, quantity(1, 7, 'NM'))), item('THETA', element(16, quantity(360, 16, 'deg')))] }),
            item('161', element(16)),
        ],
        uap: {
            type: 'uaps',
            variations: [
                { name: 'plot', items: ['010', '020', '040'] },
                { name: 'track', items: ['010', '020', '161'] },
            ],
            selector: { item: ['020', 'TYP'], cases: [[0, 'plot'], [1, 'track']] },
        },
    });

    const PLAIN_TRD = { SIM: 0, SSRPSR: 0, ANT: 0, SPI: 0, RAB: 0 };

    it('encodes with the UAP the selector field asks for', () => {
        expect(encodeWith(schema, { '010': { SAC: 1, SIC: 2 }, '020': { TYP: 'Track', ...PLAIN_TRD }, '161': 0x0102 })).toBe('e00102800102');
        expect(encodeWith(schema, { '010': { SAC: 1, SIC: 2 }, '020': { TYP: 'Plot', ...PLAIN_TRD }, '040': { RHO: 1, THETA: 180 } }))
            .toBe('e0010200' + '0080' + '8000');
    });

    it('switches UAP once the selector field is decoded', () => {
        const record = decodeWith(schema, 'e00102800102');
        expect(record.uap).toBe('track');
        expect(record.items.get('161')).toBe(0x0102);
        expect(decodeWith(schema, 'e001020000808000').uap).toBe('plot');
    });

    it('refuses items outside the chosen UAP', () => {
        expect(() => encodeWith(schema, { '020': { TYP: 'Plot', ...PLAIN_TRD }, '161': 1 })).toThrow('Item 161 is not part of UAP plot of category 1');
    });

    it('honours a forced UAP', () => {
        // TYP says Plot, so the selector alone would expect a 4-byte 040
        expect(() => decodeWith(schema, 'e00102000102')).toThrow(TruncatedInputError);
        const record = decodeWith(schema, 'e00102000102', { uap: 'track' });
        expect(record.uap).toBe('track');
        expect(record.items.get('161')).toBe(0x0102);
    });

    it('rejects an unknown forced UAP', () => {
        expect(() => decodeWith(schema, 'e00102800102', { uap: 'nope' })).toThrow(AsterixError);
        expect(() => new AsterixEncoder(SchemaRegistry.of([schema])).encodeRecord(1, {}, 'nope')).toThrow('has no UAP named nope');
    });
});

describe('record framing', () => {
    it('rejects FRNs the UAP leaves unused', () => {
        expect(() => decodeWith(cat048, '0140')).toThrow('Record at byte 0 of category 48 flags FRN 9, unused in UAP uap');
    });
});

describe('repeated decoding', () => {
    it('returns the same result for the same buffer every time', () => {
        const registry = SchemaRegistry.of([cat048]);
        const data = new AsterixEncoder(registry).encodeDataBlock(48, [
            { '010': { SAC: 1, SIC: 2 }, '130': { SRR: 3, SAM: -74 }, '250': [{ MBDATA: bytes('01020304050607'), BDS1: 4, BDS2: 0 }] },
            { '070': { V: 0, G: 0, L: 0, MODE3A: '1234' }, 'RE': { SRC: 5 } },
        ]);
        const before = hex(data);
        const decoder = new AsterixDecoder(registry);
        const first = decoder.decodeAll(data);
        expect(first.records).toHaveLength(2);
        for (let i = 0; i < 5; i++) {
            expect(decoder.decodeAll(data)).toEqual(first);
            expect(new AsterixDecoder(registry).decodeAll(data)).toEqual(first);
        }
        expect(hex(data)).toBe(before);
    });
});
