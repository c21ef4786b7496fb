import { Inject, Injectable, Logger } from '@nestjs/common';
import { DOCUMENT_STORE, DocumentStore } from '../store/document-store.interface';
import { serializeDocument } from '../store/document-serializer';
import { deterministicId, documentIds } from './document-identity';
import { DocumentWriter } from './document-writer.service';
import { IndexCommitter } from './index-committer.service';
import { JobIndices } from './job-indices';
import { PERSISTENCE_ERROR_SINK, PersistenceErrorSink } from './persistence-error-sink';
import {
    CategoryDefinition,
    ModelDebugOutput,
    ModelSizeStats,
    ModelSnapshot,
    Quantiles,
    ResultDocument,
} from './result.types';
import { ResultsBatch } from './results-batch';

/**
 * Persists the documents an analysis run produces.
 *
 * Buckets, records, influencers and partition probabilities go through a
 * {@link ResultsBatch}. The other kinds are written one at a time: quantiles
 * to the shared state index, everything else to the job's results index.
 */
@Injectable()
export class JobResultsPersister {
    private readonly logger = new Logger(JobResultsPersister.name);

    constructor(
        @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
        @Inject(PERSISTENCE_ERROR_SINK) private readonly errorSink: PersistenceErrorSink,
        private readonly writer: DocumentWriter,
        private readonly committer: IndexCommitter,
        private readonly indices: JobIndices,
    ) { }

    bulkPersister(jobId: string): ResultsBatch {
        return new ResultsBatch(jobId, this.indices.resultsIndexName(jobId), this.store, this.errorSink);
    }

    /** Not committed: categories arrive in volume and this process never reads them back. */
    async persistCategoryDefinition(category: CategoryDefinition): Promise<boolean> {
        return this.persist(category, this.indices.resultsIndexName(category.jobId));
    }

    /**
     * Quantiles feed normalization, so the state index is committed as soon
     * as the write succeeds.
     */
    async persistQuantiles(quantiles: Quantiles): Promise<boolean> {
        const persisted = await this.persist(quantiles, this.indices.stateIndexName());
        if (persisted) {
            await this.committer.commitState(quantiles.jobId);
        }
        return persisted;
    }

    async persistModelSnapshot(modelSnapshot: ModelSnapshot): Promise<boolean> {
        return this.persist(modelSnapshot, this.indices.resultsIndexName(modelSnapshot.jobId));
    }

    /**
     * Re-indexes an existing snapshot under its id. Unlike the other paths,
     * serialization and store errors reach the caller.
     */
    async updateModelSnapshot(modelSnapshot: ModelSnapshot): Promise<void> {
        const index = this.indices.resultsIndexName(modelSnapshot.jobId);
        const id = deterministicId(modelSnapshot);
        if (id === undefined) {
            throw new Error(`Model snapshot of job [${modelSnapshot.jobId}] has no stable id`);
        }

        await this.store.index({
            index,
            kind: modelSnapshot.resultType,
            id,
            document: serializeDocument(modelSnapshot),
        });
        this.logger.log({ jobId: modelSnapshot.jobId, snapshotId: modelSnapshot.snapshotId }, 'Model snapshot updated');
    }

    /**
     * Written to the stats slot of the job and again as a history entry.
     * Not committed: stats are frequent and only read at the API level.
     */
    async persistModelSizeStats(modelSizeStats: ModelSizeStats): Promise<boolean> {
        this.logger.verbose(
            { jobId: modelSizeStats.jobId, modelBytes: modelSizeStats.modelBytes },
            'Persisting model size stats',
        );
        return this.persist(modelSizeStats, this.indices.resultsIndexName(modelSizeStats.jobId));
    }

    async persistModelDebugOutput(modelDebugOutput: ModelDebugOutput): Promise<boolean> {
        return this.persist(modelDebugOutput, this.indices.resultsIndexName(modelDebugOutput.jobId));
    }

    async commitResultWrites(jobId: string): Promise<void> {
        await this.committer.commitResults(jobId);
    }

    async commitStateWrites(jobId: string): Promise<void> {
        await this.committer.commitState(jobId);
    }

    private async persist(document: ResultDocument, index: string): Promise<boolean> {
        let persisted = true;
        for (const id of documentIds(document)) {
            const written = await this.writer.write({
                jobId: document.jobId,
                index,
                kind: document.resultType,
                id,
                payload: document,
            });
            persisted = persisted && written;
        }
        return persisted;
    }
}
