import type { CategorySource } from '../asterix-types.js';
import { compileCategory } from './compiler.js';
import { SchemaError, UnknownCategoryError } from './errors.js';
import type { CategorySchema } from './schema.js';
import type { CompilerOptions } from './types.js';

/**
 * Immutable map of category number to compiled schema. Built once and passed
 * to every decoder and encoder; `with` returns a new registry instead of
 * mutating this one.
 */
export class SchemaRegistry {
    private constructor(private readonly schemas: ReadonlyMap<number, CategorySchema>) {
        Object.freeze(this);
    }

    static of(schemas: Iterable<CategorySchema>): SchemaRegistry {
        const map = new Map<number, CategorySchema>();
        for (const schema of schemas) {
            if (map.has(schema.category)) {
                throw new SchemaError(`Category ${schema.category} registered twice`);
            }
            map.set(schema.category, schema);
        }
        return new SchemaRegistry(map);
    }

    static compile(sources: Iterable<CategorySource>, options: CompilerOptions = {}): SchemaRegistry {
        return SchemaRegistry.of([...sources].map((source) => compileCategory(source, options)));
    }

    get size(): number {
        return this.schemas.size;
    }

    /** @throws UnknownCategoryError */
    get(category: number): CategorySchema {
        const schema = this.schemas.get(category);
        if (!schema) throw new UnknownCategoryError(category);
        return schema;
    }

    find(category: number): CategorySchema | undefined {
        return this.schemas.get(category);
    }

    has(category: number): boolean {
        return this.schemas.has(category);
    }

    categories(): number[] {
        return [...this.schemas.keys()].sort((a, b) => a - b);
    }

    /** New registry with `schema` added, replacing any schema of the same category. */
    with(schema: CategorySchema): SchemaRegistry {
        const map = new Map(this.schemas);
        map.set(schema.category, schema);
        return new SchemaRegistry(map);
    }
}
