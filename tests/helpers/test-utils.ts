import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { compileCategory } from '../../src/asterix/compiler.js';
import { parseCategorySource } from '../../src/asterix/source-loader.js';
import type { CategorySchema } from '../../src/asterix/schema.js';
import type { AsterixLogger, CompilerOptions } from '../../src/asterix/types.js';

export function fixturePath(name: string): string {
    return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

export function readFixture(name: string): Uint8Array {
    return readFileSync(fixturePath(name));
}

/** CAT048 subset in the rule dialect, with its RE expansion. */
export function loadCat048(options: CompilerOptions = {}): CategorySchema {
    const { source, expansions } = parseCategorySource(readFixture('cat048-rule.json'), {
        re: readFixture('cat048-re.json'),
    });
    return compileCategory(source, { ...options, expansions });
}

/** CAT034 subset in the legacy variation dialect. */
export function loadCat034(options: CompilerOptions = {}): CategorySchema {
    const { source } = parseCategorySource(readFixture('cat034-legacy.json'));
    return compileCategory(source, options);
}

/** Compiles an inline category root (no checksum). */
export function compileInline(root: unknown, options: CompilerOptions = {}): CategorySchema {
    return compileCategory({ root, checksum: null }, options);
}

export function hex(data: Uint8Array): string {
    return Buffer.from(data).toString('hex');
}

export function bytes(text: string): Uint8Array {
    return Uint8Array.from(Buffer.from(text.replace(/\s+/g, ''), 'hex'));
}

/** Data block around already encoded records. */
export function block(category: number, ...records: string[]): Uint8Array {
    const body = bytes(records.join(''));
    const length = body.length + 3;
    return Uint8Array.from([category, length >> 8, length & 0xFF, ...body]);
}

export interface CapturedLogger extends AsterixLogger {
    messages: { level: 'info' | 'warn' | 'error'; msg: string }[];
}

export function captureLogger(): CapturedLogger {
    const messages: CapturedLogger['messages'] = [];
    return {
        messages,
        info: (msg) => { messages.push({ level: 'info', msg }); },
        warn: (msg) => { messages.push({ level: 'warn', msg }); },
        error: (msg) => { messages.push({ level: 'error', msg }); },
    };
}

// ============================================================================
// Rule-dialect builders for inline categories
// ============================================================================

type Json = unknown;

export const RAW = { type: 'Raw' };

export function contextFree(value: Json): Json {
    return { type: 'ContextFree', value };
}

export function element(size: number, content: Json = RAW): Json {
    return { type: 'Element', size, rule: contextFree(content) };
}

export function item(name: string, variation: Json, title = ''): Json {
    return { name, title, rule: contextFree(variation) };
}

export function spare(length: number): Json {
    return { spare: true, length };
}

export function table(...entries: [number, string][]): Json {
    return { type: 'Table', values: entries };
}

export function quantity(numerator: number, exponent: number, unit: string, signed = false): Json {
    return {
        type: 'Quantity',
        signed,
        unit,
        lsb: {
            type: 'Div',
            numerator: { type: 'Integer', value: numerator },
            denominator: { type: 'Pow', base: 2, exponent },
        },
    };
}

/** Single-UAP category root. */
export function category(number: number, catalogue: Json[], uap: (string | null)[]): Json {
    return {
        category: number,
        title: `Test Category ${number}`,
        edition: '1.0',
        catalogue,
        uap: { type: 'uap', items: uap },
    };
}
