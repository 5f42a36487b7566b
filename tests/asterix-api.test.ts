import { describe, it, expect } from 'vitest';
import ASTERIX, { SchemaRegistry, UnknownCategoryError } from '../src/index.js';
import { captureLogger, fixturePath, hex, loadCat034, loadCat048 } from './helpers/test-utils.js';

describe('ASTERIX namespace', () => {
    const cat048 = loadCat048();

    it('encodes a block from one schema', () => {
        expect(hex(ASTERIX.encode(cat048, [{ '010': { SAC: 12, SIC: 34 } }]))).toBe('300006800c22');
    });

    it('passes encoder options through', () => {
        const logger = captureLogger();
        ASTERIX.encode(cat048, [], { logger });
        expect(logger.messages).toEqual([{ level: 'info', msg: 'Encoded category 48 block: 0 record(s), 3 bytes' }]);
    });

    it('decodes against a schema list or a registry', () => {
        const data = ASTERIX.encode(cat048, [{ '010': { SAC: 12, SIC: 34 } }]);
        expect(ASTERIX.decode([cat048], data).records[0]?.items.get('010')).toEqual({ SAC: 12, SIC: 34 });
        expect(ASTERIX.decode(SchemaRegistry.of([cat048, loadCat034()]), data).records).toHaveLength(1);
    });

    it('passes decoder options through', () => {
        const data = ASTERIX.encode(cat048, [{ '010': { SAC: 12, SIC: 34 } }]);
        expect(() => ASTERIX.decode([loadCat034()], data)).toThrow(UnknownCategoryError);
        expect(ASTERIX.decode([loadCat034()], data, { mode: 'lenient' }).blocks).toEqual([]);
    });

    it('loads and exports categories', async () => {
        const schema = await ASTERIX.load(fixturePath('cat034-legacy.json'));
        expect(schema.checksum).toBe('d16c2c9af61e9f6725cb6a4f827f40ee2c52f924');
        expect(ASTERIX.toXml(schema).split('\n')).toContain('<Category id="34" name="Transmission of Monopulse Secondary Surveillance Radar Service Messages" ver="1.29">');
    });
});
