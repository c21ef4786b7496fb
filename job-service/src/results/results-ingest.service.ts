import { Injectable, Logger } from '@nestjs/common';
import { JobResultsPersister } from './job-results.persister';
import { ResultsMessage } from './results.schema';

export interface IngestSummary {
    jobId: string;
    batchedDocuments: number;
    failedWrites: number;
    committed: boolean;
}

@Injectable()
export class ResultsIngestService {
    private readonly logger = new Logger(ResultsIngestService.name);

    constructor(private readonly persister: JobResultsPersister) { }

    async ingest(message: ResultsMessage): Promise<IngestSummary> {
        const { jobId } = message;

        const batch = this.persister.bulkPersister(jobId);
        for (const bucket of message.buckets ?? []) {
            batch.addBucket(bucket);
        }
        batch.addRecords(message.records ?? []);
        batch.addInfluencers(message.influencers ?? []);
        for (const partitionProbabilities of message.partitionProbabilities ?? []) {
            batch.addPartitionProbabilities(partitionProbabilities);
        }
        const batchedDocuments = batch.size;
        await batch.execute();

        const writes: boolean[] = [];
        for (const category of message.categoryDefinitions ?? []) {
            writes.push(await this.persister.persistCategoryDefinition(category));
        }
        for (const modelSnapshot of message.modelSnapshots ?? []) {
            writes.push(await this.persister.persistModelSnapshot(modelSnapshot));
        }
        for (const modelSizeStats of message.modelSizeStats ?? []) {
            writes.push(await this.persister.persistModelSizeStats(modelSizeStats));
        }
        for (const modelDebugOutput of message.modelDebugOutput ?? []) {
            writes.push(await this.persister.persistModelDebugOutput(modelDebugOutput));
        }
        if (message.quantiles) {
            writes.push(await this.persister.persistQuantiles(message.quantiles));
        }

        if (message.commit) {
            await this.persister.commitResultWrites(jobId);
        }

        const summary: IngestSummary = {
            jobId,
            batchedDocuments,
            failedWrites: writes.filter((written) => !written).length,
            committed: message.commit,
        };
        this.logger.log(summary, 'Results persisted');
        return summary;
    }
}
