import { describe, it, expect } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { SchemaError } from '../src/asterix/errors.js';
import { loadCategory, loadCategorySource, parseCategorySource, sourceChecksum } from '../src/asterix/source-loader.js';
import { getItemSpec } from '../src/asterix/schema.js';
import { category, element, fixturePath, item, readFixture } from './helpers/test-utils.js';

const encoder = new TextEncoder();

function scratch(name: string): string {
    const root = process.env.ASTERIX_TEST_ROOT;
    if (root === undefined) throw new Error('ASTERIX_TEST_ROOT is not set');
    return join(root, name);
}

describe('sourceChecksum', () => {
    it('hashes the inputs in order', () => {
        expect(sourceChecksum([encoder.encode('{}')])).toBe('bf21a9e8fbc5a3846fb05b4fa0859e0917b2202f');
        expect(sourceChecksum([encoder.encode('{'), encoder.encode('}')])).toBe('bf21a9e8fbc5a3846fb05b4fa0859e0917b2202f');
    });
});

describe('parseCategorySource', () => {
    it('parses the category and its expansions', () => {
        const { source, expansions } = parseCategorySource(readFixture('cat048-rule.json'), {
            re: readFixture('cat048-re.json'),
        });
        expect(source.checksum).toBe('d6113a76fab3e0ac8df7443ea3c44d6b65dd88a6');
        expect(expansions.sp).toBeUndefined();
        expect(expansions.re).toMatchObject({ type: 'Expansion', fspecByteSize: 1 });
    });

    it('rejects invalid JSON', () => {
        expect(() => parseCategorySource(encoder.encode('{"category":'))).toThrow(SchemaError);
        expect(() => parseCategorySource(encoder.encode('{'), {}, 'cat999.json')).toThrow(/^cat999\.json: not valid UTF-8 JSON/);
    });

    it('rejects invalid UTF-8', () => {
        expect(() => parseCategorySource(Uint8Array.of(0x7B, 0xFF, 0x7D))).toThrow(/^category: not valid UTF-8 JSON/);
    });

    it('names the expansion that failed to parse', () => {
        expect(() => parseCategorySource(encoder.encode('{}'), { sp: encoder.encode('[') }))
            .toThrow(/^category \(SP expansion\): /);
    });
});

describe('loadCategory', () => {
    it('loads and compiles a fixture with its expansion', async () => {
        const schema = await loadCategory(fixturePath('cat048-rule.json'), { re: fixturePath('cat048-re.json') });
        expect(schema.category).toBe(48);
        expect(schema.checksum).toBe('d6113a76fab3e0ac8df7443ea3c44d6b65dd88a6');
    });

    it('loads a category written to disk', async () => {
        const path = scratch('cat001.json');
        const text = JSON.stringify(category(1, [item('010', element(16), 'Data Source Identifier')], ['010']));
        await writeFile(path, text);
        const schema = await loadCategory(path);
        expect(schema.category).toBe(1);
        expect(getItemSpec(schema, '010').title).toBe('Data Source Identifier');
        expect(schema.checksum).toBe(sourceChecksum([encoder.encode(text)]));
    });

    it('rejects missing files', async () => {
        await expect(loadCategorySource(scratch('missing.json'))).rejects.toThrow(/ENOENT/);
    });
});
