import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import type { CategorySource } from '../asterix-types.js';
import { compileCategory } from './compiler.js';
import { SchemaError } from './errors.js';
import type { CategorySchema } from './schema.js';
import type { CompilerOptions, ExpansionSources } from './types.js';

export type ExpansionBytes = {
    re?: Uint8Array;
    sp?: Uint8Array;
};

export type ExpansionPaths = {
    re?: string;
    sp?: string;
};

export interface ParsedCategory {
    source: CategorySource;
    expansions: ExpansionSources;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function parseJson(bytes: Uint8Array, where: string): unknown {
    try {
        return JSON.parse(utf8.decode(bytes));
    } catch (error) {
        throw new SchemaError(`${where}: not valid UTF-8 JSON (${error instanceof Error ? error.message : String(error)})`);
    }
}

/** sha1 hex over the concatenated inputs, in the order given. */
export function sourceChecksum(inputs: readonly Uint8Array[]): string {
    const hash = createHash('sha1');
    for (const input of inputs) hash.update(input);
    return hash.digest('hex');
}

/**
 * Parses a category document and its optional expansion documents. The
 * checksum covers the category bytes followed by the RE and SP bytes.
 */
export function parseCategorySource(bytes: Uint8Array, expansions: ExpansionBytes = {}, where = 'category'): ParsedCategory {
    const inputs = [bytes];
    const parsed: ExpansionSources = {};
    if (expansions.re) {
        inputs.push(expansions.re);
        parsed.re = parseJson(expansions.re, `${where} (RE expansion)`);
    }
    if (expansions.sp) {
        inputs.push(expansions.sp);
        parsed.sp = parseJson(expansions.sp, `${where} (SP expansion)`);
    }
    return {
        source: { root: parseJson(bytes, where), checksum: sourceChecksum(inputs) },
        expansions: parsed,
    };
}

export async function loadCategorySource(path: string, expansionPaths: ExpansionPaths = {}): Promise<ParsedCategory> {
    const [bytes, re, sp] = await Promise.all([
        readFile(path),
        expansionPaths.re === undefined ? undefined : readFile(expansionPaths.re),
        expansionPaths.sp === undefined ? undefined : readFile(expansionPaths.sp),
    ]);
    return parseCategorySource(bytes, { re, sp }, path);
}

/** Reads, parses and compiles one category file (plus expansions). */
export async function loadCategory(
    path: string,
    expansionPaths: ExpansionPaths = {},
    options: CompilerOptions = {}
): Promise<CategorySchema> {
    const { source, expansions } = await loadCategorySource(path, expansionPaths);
    return compileCategory(source, { ...options, expansions: { ...expansions, ...options.expansions } });
}
