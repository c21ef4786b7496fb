import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/** Index names used by the service, taken from configuration. */
@Injectable()
export class JobIndices {
    private readonly resultsPrefix: string;
    private readonly stateIndex: string;
    private readonly configIndex: string;

    constructor(configService: ConfigService) {
        this.resultsPrefix = configService.getOrThrow<string>('RESULTS_INDEX_PREFIX');
        this.stateIndex = configService.getOrThrow<string>('STATE_INDEX');
        this.configIndex = configService.getOrThrow<string>('CONFIG_INDEX');
    }

    /** One results index per job. */
    resultsIndexName(jobId: string): string {
        return `${this.resultsPrefix}${jobId}`;
    }

    /** Shared by all jobs. */
    stateIndexName(): string {
        return this.stateIndex;
    }

    configIndexName(): string {
        return this.configIndex;
    }
}
