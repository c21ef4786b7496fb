import { DocumentValue, StoredDocument } from './document-store.interface';

export class DocumentSerializationError extends Error {
    constructor(
        message: string,
        readonly path: string,
    ) {
        super(message);
        this.name = 'DocumentSerializationError';
    }
}

/**
 * Converts a value object into the store's document form.
 *
 * Fields holding `undefined` are left out instead of being written as null.
 * Dates become epoch milliseconds. Non-finite numbers, functions, symbols,
 * bigints and cycles are rejected with a {@link DocumentSerializationError}.
 */
export function serializeDocument(value: object): StoredDocument {
    const serialized = serializeValue(value, '$', new Set());
    if (serialized === null || typeof serialized !== 'object' || Array.isArray(serialized)) {
        throw new DocumentSerializationError('Document root must be a keyed object', '$');
    }
    return serialized;
}

function serializeValue(value: unknown, path: string, ancestors: Set<object>): DocumentValue | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new DocumentSerializationError(`Non-finite number ${value} at ${path}`, path);
        }
        return value;
    }
    if (typeof value !== 'object') {
        throw new DocumentSerializationError(`Cannot serialize ${typeof value} at ${path}`, path);
    }
    if (value instanceof Date) {
        const time = value.getTime();
        if (Number.isNaN(time)) {
            throw new DocumentSerializationError(`Invalid date at ${path}`, path);
        }
        return time;
    }
    if (ancestors.has(value)) {
        throw new DocumentSerializationError(`Circular reference at ${path}`, path);
    }

    ancestors.add(value);
    try {
        if (Array.isArray(value)) {
            return value.map((item, position) => serializeValue(item, `${path}[${position}]`, ancestors) ?? null);
        }

        const document: StoredDocument = {};
        for (const [key, field] of Object.entries(value)) {
            const serialized = serializeValue(field, `${path}.${key}`, ancestors);
            if (serialized !== undefined) {
                document[key] = serialized;
            }
        }
        return document;
    } finally {
        ancestors.delete(value);
    }
}
