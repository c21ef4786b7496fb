import { Controller, Logger } from '@nestjs/common';
import { EventPattern, Payload } from '@nestjs/microservices';
import { ClsService } from 'nestjs-cls';
import { z } from 'zod';
import { resultsMessageSchema } from './results.schema';
import { ResultsIngestService } from './results-ingest.service';

@Controller()
export class ResultsEventsController {
    private readonly logger = new Logger(ResultsEventsController.name);

    constructor(
        private readonly resultsIngestService: ResultsIngestService,
        private readonly clsService: ClsService,
    ) { }

    @EventPattern('job_results')
    async handleJobResults(@Payload() payload: unknown) {
        await this.clsService.run(async () => {
            const parsed = resultsMessageSchema.safeParse(payload);
            if (!parsed.success) {
                this.logger.error(
                    { error: z.prettifyError(parsed.error) },
                    'Dropping malformed results message',
                );
                return;
            }

            const message = parsed.data;
            if (message.correlationId) {
                this.clsService.set('correlationId', message.correlationId);
            }

            try {
                await this.resultsIngestService.ingest(message);
            } catch (error) {
                this.logger.error(
                    { jobId: message.jobId, error: error instanceof Error ? error.message : 'Unknown error' },
                    'Failed to persist results',
                );
                throw error;
            }
        });
    }
}
