export class AsterixError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'AsterixError';
    }
}

/**
 * Malformed declarative input. Raised while compiling a category, never
 * while decoding.
 */
export class SchemaError extends AsterixError {
    constructor(message: string, public readonly itemName?: string) {
        super(message);
        this.name = 'SchemaError';
    }
}

export class AlignmentError extends SchemaError {
    constructor(message: string, itemName: string | undefined, public readonly bitSize: number) {
        super(message, itemName);
        this.name = 'AlignmentError';
    }
}

/** Buffer ended before an FSPEC octet, data item or data block was complete. */
export class TruncatedInputError extends AsterixError {
    constructor(message: string, public readonly offset: number) {
        super(message);
        this.name = 'TruncatedInputError';
    }
}

/** Bytes are present but contradict the schema (bad LEN, spare FSPEC bit, ...). */
export class MalformedDataError extends AsterixError {
    constructor(message: string, public readonly offset: number) {
        super(message);
        this.name = 'MalformedDataError';
    }
}

export class UnknownCategoryError extends AsterixError {
    constructor(public readonly category: number) {
        super(`No compiled schema for category ${category}`);
        this.name = 'UnknownCategoryError';
    }
}

export class EncodeInputError extends AsterixError {
    constructor(message: string) {
        super(message);
        this.name = 'EncodeInputError';
    }
}

/** Value does not fit the field it is encoded into. */
export class ValueRangeError extends RangeError {
    constructor(message: string, public readonly field?: string) {
        super(message);
        this.name = 'ValueRangeError';
    }
}
