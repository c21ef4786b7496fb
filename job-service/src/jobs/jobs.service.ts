import {
    ConflictException,
    Inject,
    Injectable,
    InternalServerErrorException,
    Logger,
    NotFoundException,
} from '@nestjs/common';
import { ClientProxy } from '@nestjs/microservices';
import { ClsService } from 'nestjs-cls';
import pLimit from 'p-limit';
import { catchError, lastValueFrom, timeout } from 'rxjs';
import {
    DOCUMENT_STORE,
    DocumentExistsError,
    DocumentStore,
    IndexAction,
} from '../store/document-store.interface';
import { serializeDocument } from '../store/document-serializer';
import { modelSnapshotDocumentId } from '../results/document-identity';
import { IndexCommitter } from '../results/index-committer.service';
import { JobIndices } from '../results/job-indices';
import { JobResultsPersister } from '../results/job-results.persister';
import { ModelSnapshot } from '../results/result.types';
import { ModelSnapshotUpdate, modelSnapshotSchema } from '../results/results.schema';
import { JobDefinition, jobSchema } from './job.schema';
import { Job, JobUpdate } from './job.types';
import { isProcessUpdate, mergeJobUpdate, toJobUpdateDocument } from './job-update';

export const ANALYSIS_QUEUE_SERVICE = 'ANALYSIS_QUEUE_SERVICE';

const JOB_KIND = 'job';

type JobLimit = ReturnType<typeof pLimit>;

@Injectable()
export class JobsService {
    private readonly logger = new Logger(JobsService.name);
    /** One-at-a-time queues for read-merge-write changes, keyed by job id. */
    private readonly jobLimits = new Map<string, JobLimit>();

    constructor(
        private readonly clsService: ClsService,
        @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
        private readonly indices: JobIndices,
        private readonly committer: IndexCommitter,
        private readonly persister: JobResultsPersister,
        @Inject(ANALYSIS_QUEUE_SERVICE) private readonly analysisClient: ClientProxy,
    ) { }

    async createJob(jobId: string, definition: JobDefinition): Promise<Job> {
        const job: Job = { ...definition, jobId, createTime: Date.now() };
        try {
            await this.store.create(this.jobAction(job));
        } catch (error) {
            if (error instanceof DocumentExistsError) {
                throw new ConflictException(`Job [${jobId}] already exists`);
            }
            throw error;
        }
        await this.committer.commitConfig(jobId);
        this.logger.log({ jobId }, 'Job created');
        return job;
    }

    async getJob(jobId: string): Promise<Job> {
        const job = await this.findJob(jobId);
        if (!job) {
            throw new NotFoundException(`Job [${jobId}] not found`);
        }
        return job;
    }

    /**
     * Merges `update` into the published job and publishes the result. A
     * running analysis process is told about the changes it applies itself.
     */
    async updateJob(jobId: string, update: JobUpdate): Promise<Job> {
        const updated = await this.exclusive(jobId, async () => {
            const source = await this.getJob(jobId);
            const merged = mergeJobUpdate(source, update);
            await this.publishJob(merged);
            return merged;
        });
        this.logger.log({ jobId }, 'Job updated');

        if (isProcessUpdate(update)) {
            await this.notifyProcess(jobId, update);
        }
        return updated;
    }

    async updateModelSnapshot(
        jobId: string,
        snapshotId: string,
        changes: ModelSnapshotUpdate,
    ): Promise<ModelSnapshot> {
        return this.exclusive(jobId, async () => {
            await this.getJob(jobId);

            const stored = await this.store.get(
                this.indices.resultsIndexName(jobId),
                modelSnapshotDocumentId(jobId, snapshotId),
            );
            if (!stored) {
                throw new NotFoundException(`Model snapshot [${snapshotId}] of job [${jobId}] not found`);
            }
            const parsed = modelSnapshotSchema.safeParse(stored);
            if (!parsed.success) {
                throw new InternalServerErrorException(`Stored model snapshot [${snapshotId}] is malformed`);
            }

            const updated: ModelSnapshot = {
                ...parsed.data,
                ...(changes.description !== undefined ? { description: changes.description } : {}),
                ...(changes.retain !== undefined ? { retain: changes.retain } : {}),
            };
            await this.persister.updateModelSnapshot(updated);
            await this.persister.commitResultWrites(jobId);
            return updated;
        });
    }

    private async findJob(jobId: string): Promise<Job | null> {
        const stored = await this.store.get(this.indices.configIndexName(), jobId);
        if (!stored) {
            return null;
        }
        const parsed = jobSchema.safeParse(stored);
        if (!parsed.success) {
            this.logger.error({ jobId }, 'Stored job document is malformed');
            throw new InternalServerErrorException(`Stored job [${jobId}] is malformed`);
        }
        return parsed.data;
    }

    private async publishJob(job: Job): Promise<void> {
        await this.store.index(this.jobAction(job));
        await this.committer.commitConfig(job.jobId);
    }

    private jobAction(job: Job): IndexAction {
        return {
            index: this.indices.configIndexName(),
            kind: JOB_KIND,
            id: job.jobId,
            document: serializeDocument(job),
        };
    }

    /** Runs `work` after every earlier change to the same job has settled. */
    private async exclusive<T>(jobId: string, work: () => Promise<T>): Promise<T> {
        let limit = this.jobLimits.get(jobId);
        if (!limit) {
            limit = pLimit(1);
            this.jobLimits.set(jobId, limit);
        }
        try {
            return await limit(work);
        } finally {
            if (limit.activeCount === 0 && limit.pendingCount === 0) {
                this.jobLimits.delete(jobId);
            }
        }
    }

    private async notifyProcess(jobId: string, update: JobUpdate): Promise<void> {
        try {
            await lastValueFrom(
                this.analysisClient.emit('update_job_process', {
                    jobId,
                    update: toJobUpdateDocument(update),
                    correlationId: this.clsService.get('correlationId'),
                }).pipe(
                    timeout(5000),
                    catchError((error: Error) => {
                        this.logger.error(`Failed to send process update to RabbitMQ for job ${jobId}: ${error.message}`);
                        throw error;
                    }),
                ),
            );
            this.logger.log({ jobId }, 'Process update sent to RabbitMQ');
        } catch (error) {
            throw new InternalServerErrorException('Job updated but the analysis process could not be notified');
        }
    }
}
