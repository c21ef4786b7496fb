import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DOCUMENT_STORE, DocumentStore, StoredDocument } from '../store/document-store.interface';
import { DocumentSerializationError, serializeDocument } from '../store/document-serializer';
import { PERSISTENCE_ERROR_SINK, PersistenceErrorSink } from './persistence-error-sink';

export interface WriteRequest {
    jobId: string;
    index: string;
    kind: string;
    /** Generated when absent. */
    id?: string;
    payload?: object | null;
}

/**
 * Writes one document at a time. Failures are reported to the error sink
 * and surface as `false`; the caller decides whether that matters.
 */
@Injectable()
export class DocumentWriter {
    private readonly logger = new Logger(DocumentWriter.name);

    constructor(
        @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
        @Inject(PERSISTENCE_ERROR_SINK) private readonly errorSink: PersistenceErrorSink,
    ) { }

    async write(request: WriteRequest): Promise<boolean> {
        const { jobId, index, kind, payload } = request;

        if (payload === undefined || payload === null) {
            this.errorSink.documentDropped({
                jobId,
                kind,
                index,
                id: request.id,
                reason: 'missing_payload',
                message: `No ${kind} to persist`,
            });
            return false;
        }

        const id = request.id ?? uuidv4();

        let document: StoredDocument;
        try {
            document = serializeDocument(payload);
        } catch (error) {
            if (!(error instanceof DocumentSerializationError)) {
                throw error;
            }
            this.errorSink.documentDropped({ jobId, kind, index, id, reason: 'serialization', message: error.message });
            return false;
        }

        this.logger.verbose(
            { jobId, kind, index, id, generatedId: request.id === undefined },
            'Indexing document',
        );

        try {
            await this.store.index({ index, kind, id, document });
            return true;
        } catch (error) {
            this.errorSink.documentDropped({
                jobId,
                kind,
                index,
                id,
                reason: 'store_write',
                message: error instanceof Error ? error.message : 'Unknown error',
            });
            return false;
        }
    }
}
