import { Injectable, Logger } from '@nestjs/common';
import { BulkItemResult } from '../store/document-store.interface';

export const PERSISTENCE_ERROR_SINK = Symbol('PERSISTENCE_ERROR_SINK');

export type DropReason = 'missing_payload' | 'serialization' | 'store_write';

export interface DroppedDocument {
    jobId: string;
    kind: string;
    index: string;
    id?: string;
    reason: DropReason;
    message: string;
}

export interface BulkFailureReport {
    jobId: string;
    index: string;
    failed: BulkItemResult[];
    message: string;
}

/**
 * Receives the writes the best-effort persistence paths give up on. Nothing
 * reported here is retried or raised to the caller.
 */
export interface PersistenceErrorSink {
    documentDropped(event: DroppedDocument): void;
    bulkFailed(report: BulkFailureReport): void;
}

@Injectable()
export class LoggingPersistenceErrorSink implements PersistenceErrorSink {
    private readonly logger = new Logger(LoggingPersistenceErrorSink.name);

    documentDropped(event: DroppedDocument): void {
        if (event.reason === 'missing_payload') {
            this.logger.warn(
                { jobId: event.jobId, kind: event.kind },
                `No ${event.kind} to persist for job`,
            );
            return;
        }

        this.logger.error(
            { jobId: event.jobId, kind: event.kind, index: event.index, id: event.id, reason: event.reason, error: event.message },
            `Error writing ${event.kind}`,
        );
    }

    bulkFailed(report: BulkFailureReport): void {
        this.logger.error(
            { jobId: report.jobId, index: report.index, failedCount: report.failed.length },
            `Bulk index of results has errors: ${report.message}`,
        );
    }
}
