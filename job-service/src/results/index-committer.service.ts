import { Inject, Injectable, Logger } from '@nestjs/common';
import { DOCUMENT_STORE, DocumentStore } from '../store/document-store.interface';
import { JobIndices } from './job-indices';

/**
 * Makes acknowledged writes visible to readers. Results are committed when
 * the pipeline asks for it; state is committed right after writes that other
 * computations wait on, and job configuration on every change. Refresh
 * failures propagate.
 */
@Injectable()
export class IndexCommitter {
    private readonly logger = new Logger(IndexCommitter.name);

    constructor(
        @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
        private readonly indices: JobIndices,
    ) { }

    async commitResults(jobId: string): Promise<void> {
        const index = this.indices.resultsIndexName(jobId);
        this.logger.verbose({ jobId, index }, 'Refreshing results index');
        await this.store.refresh(index);
    }

    async commitState(jobId: string): Promise<void> {
        const index = this.indices.stateIndexName();
        this.logger.verbose({ jobId, index }, 'Refreshing state index');
        await this.store.refresh(index);
    }

    async commitConfig(jobId: string): Promise<void> {
        const index = this.indices.configIndexName();
        this.logger.verbose({ jobId, index }, 'Refreshing config index');
        await this.store.refresh(index);
    }
}
