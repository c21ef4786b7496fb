import { Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import {
    AnyBulkWriteOperation,
    Collection,
    Document,
    MongoBulkWriteError,
    MongoClient,
    MongoServerError,
} from 'mongodb';
import {
    BulkItemResult,
    BulkResponse,
    DocumentExistsError,
    DocumentStore,
    IndexAction,
    StoredDocument,
} from './document-store.interface';

interface StoredRecord {
    _id: string;
    kind: string;
    /** The version readers see. */
    source?: Document;
    /** The latest write, promoted to `source` by the next refresh. */
    pendingSource?: Document;
}

const CONNECT_TIMEOUT_MS = 5_000;
const DUPLICATE_KEY = 11000;

/**
 * Document store backed by MongoDB, one collection per index.
 *
 * Writes only touch `pendingSource`, so readers keep getting the published
 * `source` of a record until `refresh` promotes the pending version.
 */
export class MongoDocumentStore implements DocumentStore, OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(MongoDocumentStore.name);

    constructor(
        private readonly client: MongoClient,
        private readonly databaseName: string,
    ) { }

    async onModuleInit(): Promise<void> {
        let timer: NodeJS.Timeout | undefined;
        try {
            await Promise.race([
                this.client.connect(),
                new Promise<never>((_, reject) => {
                    timer = setTimeout(
                        () => reject(new Error(`MongoDB connection timed out after ${CONNECT_TIMEOUT_MS}ms`)),
                        CONNECT_TIMEOUT_MS,
                    );
                }),
            ]);
        } finally {
            clearTimeout(timer);
        }
        this.logger.log({ database: this.databaseName }, 'Connected to MongoDB');
    }

    async onModuleDestroy(): Promise<void> {
        await this.client.close();
    }

    async index(action: IndexAction): Promise<void> {
        await this.collection(action.index).updateOne(
            { _id: action.id },
            { $set: { kind: action.kind, pendingSource: action.document } },
            { upsert: true },
        );
    }

    async create(action: IndexAction): Promise<void> {
        try {
            await this.collection(action.index).insertOne({
                _id: action.id,
                kind: action.kind,
                pendingSource: action.document,
            });
        } catch (error) {
            if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
                throw new DocumentExistsError(action.index, action.id);
            }
            throw error;
        }
    }

    async bulk(actions: IndexAction[]): Promise<BulkResponse> {
        const items: BulkItemResult[] = actions.map((action) => ({
            index: action.index,
            id: action.id,
            ok: true,
        }));

        const byIndex = new Map<string, number[]>();
        actions.forEach((action, position) => {
            const positions = byIndex.get(action.index) ?? [];
            positions.push(position);
            byIndex.set(action.index, positions);
        });

        for (const [index, positions] of byIndex) {
            const operations: AnyBulkWriteOperation<StoredRecord>[] = positions.map((position) => {
                const action = actions[position];
                return {
                    updateOne: {
                        filter: { _id: action.id },
                        update: { $set: { kind: action.kind, pendingSource: action.document } },
                        upsert: true,
                    },
                };
            });

            try {
                await this.collection(index).bulkWrite(operations, { ordered: false });
            } catch (error) {
                if (!(error instanceof MongoBulkWriteError)) {
                    throw error;
                }
                const writeErrors = Array.isArray(error.writeErrors) ? error.writeErrors : [error.writeErrors];
                if (writeErrors.length === 0) {
                    // A write concern error names no item, so none of them can be trusted.
                    for (const position of positions) {
                        items[position].ok = false;
                        items[position].error = error.message;
                    }
                    continue;
                }
                for (const writeError of writeErrors) {
                    const item = items[positions[writeError.index]];
                    item.ok = false;
                    item.error = writeError.errmsg ?? error.message;
                }
            }
        }

        return { hasFailures: items.some((item) => !item.ok), items };
    }

    async refresh(index: string): Promise<void> {
        const result = await this.collection(index).updateMany(
            { pendingSource: { $exists: true } },
            [{ $set: { source: '$pendingSource' } }, { $unset: 'pendingSource' }],
        );
        this.logger.verbose({ index, published: result.modifiedCount }, 'Refreshed collection');
    }

    async get(index: string, id: string): Promise<StoredDocument | null> {
        const record = await this.collection(index).findOne({ _id: id, source: { $exists: true } });
        return record?.source ?? null;
    }

    private collection(index: string): Collection<StoredRecord> {
        return this.client.db(this.databaseName).collection<StoredRecord>(index);
    }
}
