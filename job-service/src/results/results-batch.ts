import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
    buildFailureMessage,
    DocumentStore,
    IndexAction,
    StoredDocument,
} from '../store/document-store.interface';
import { DocumentSerializationError, serializeDocument } from '../store/document-serializer';
import { documentIds } from './document-identity';
import { PersistenceErrorSink } from './persistence-error-sink';
import {
    AnomalyRecord,
    Bucket,
    Influencer,
    PerPartitionMaxProbabilities,
    ResultDocument,
} from './result.types';

/**
 * Collects the result documents of one job into a single bulk request.
 *
 * A batch belongs to one pipeline stage and is used once: after `execute()`
 * nothing more can be added.
 */
export class ResultsBatch {
    private readonly logger = new Logger(ResultsBatch.name);
    private readonly actions: IndexAction[] = [];
    private executed = false;

    constructor(
        readonly jobId: string,
        readonly indexName: string,
        private readonly store: DocumentStore,
        private readonly errorSink: PersistenceErrorSink,
    ) { }

    get size(): number {
        return this.actions.length;
    }

    /**
     * Queues the bucket without its records, followed by each of its bucket
     * influencers as a standalone document. Influencers take the job,
     * timestamp and span of their bucket, so a rewritten bucket overwrites them.
     */
    addBucket(bucket: Bucket): this {
        this.assertOpen();

        const bucketWithoutRecords: Bucket = bucket.records.length > 0 ? { ...bucket, records: [] } : bucket;
        this.queue(bucketWithoutRecords);

        for (const bucketInfluencer of bucketWithoutRecords.bucketInfluencers) {
            this.queue({
                ...bucketInfluencer,
                jobId: bucket.jobId,
                timestamp: bucket.timestamp,
                bucketSpan: bucket.bucketSpan,
            });
        }
        return this;
    }

    addRecords(records: readonly AnomalyRecord[]): this {
        this.assertOpen();
        records.forEach((record) => this.queue(record));
        return this;
    }

    addInfluencers(influencers: readonly Influencer[]): this {
        this.assertOpen();
        influencers.forEach((influencer) => this.queue(influencer));
        return this;
    }

    addPartitionProbabilities(partitionProbabilities: PerPartitionMaxProbabilities): this {
        this.assertOpen();
        this.queue(partitionProbabilities);
        return this;
    }

    /**
     * Sends everything queued in one bulk call. Items the store rejects are
     * reported to the error sink and not retried.
     */
    async execute(): Promise<void> {
        if (this.executed) {
            return;
        }
        this.executed = true;

        if (this.actions.length === 0) {
            return;
        }

        this.logger.verbose(
            { jobId: this.jobId, index: this.indexName, actions: this.actions.length },
            'Executing bulk request',
        );

        const response = await this.store.bulk(this.actions);
        if (response.hasFailures) {
            this.errorSink.bulkFailed({
                jobId: this.jobId,
                index: this.indexName,
                failed: response.items.filter((item) => !item.ok),
                message: buildFailureMessage(response),
            });
        }
    }

    private queue(result: ResultDocument): void {
        let document: StoredDocument;
        try {
            document = serializeDocument(result);
        } catch (error) {
            if (!(error instanceof DocumentSerializationError)) {
                throw error;
            }
            this.errorSink.documentDropped({
                jobId: this.jobId,
                kind: result.resultType,
                index: this.indexName,
                reason: 'serialization',
                message: error.message,
            });
            return;
        }

        for (const id of documentIds(result)) {
            this.actions.push({ index: this.indexName, kind: result.resultType, id: id ?? uuidv4(), document });
        }
    }

    private assertOpen(): void {
        if (this.executed) {
            throw new Error(`Results batch for job [${this.jobId}] has already been executed`);
        }
    }
}
