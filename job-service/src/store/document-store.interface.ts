/** Any value a stored document can hold once serialized. */
export type DocumentValue =
    | string
    | number
    | boolean
    | null
    | DocumentValue[]
    | { [key: string]: DocumentValue };

/** A flat keyed document as written to the store. */
export type StoredDocument = { [key: string]: DocumentValue };

export const DOCUMENT_STORE = Symbol('DOCUMENT_STORE');

export interface IndexAction {
    index: string;
    kind: string;
    id: string;
    document: StoredDocument;
}

export interface BulkItemResult {
    index: string;
    id: string;
    ok: boolean;
    error?: string;
}

export interface BulkResponse {
    hasFailures: boolean;
    items: BulkItemResult[];
}

export class DocumentExistsError extends Error {
    constructor(readonly index: string, readonly id: string) {
        super(`Document [${id}] already exists in [${index}]`);
        this.name = 'DocumentExistsError';
    }
}

/**
 * Narrow view of the document store used by the persistence layer.
 *
 * Writes are upserts by id. A write becomes visible to `get` only after a
 * `refresh` of its index; until then readers keep seeing the version
 * published before it, if any.
 */
export interface DocumentStore {
    index(action: IndexAction): Promise<void>;
    /** Writes a document that must not exist yet, published or pending. Throws `DocumentExistsError` otherwise. */
    create(action: IndexAction): Promise<void>;
    bulk(actions: IndexAction[]): Promise<BulkResponse>;
    refresh(index: string): Promise<void>;
    get(index: string, id: string): Promise<StoredDocument | null>;
}

export function buildFailureMessage(response: BulkResponse): string {
    return response.items
        .filter((item) => !item.ok)
        .map((item) => `[${item.index}][${item.id}]: ${item.error ?? 'unknown failure'}`)
        .join(', ');
}
