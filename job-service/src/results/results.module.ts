import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DocumentStoreModule } from '../store/document-store.module';
import { DocumentWriter } from './document-writer.service';
import { IndexCommitter } from './index-committer.service';
import { JobIndices } from './job-indices';
import { JobResultsPersister } from './job-results.persister';
import { LoggingPersistenceErrorSink, PERSISTENCE_ERROR_SINK } from './persistence-error-sink';
import { ResultsEventsController } from './results-events.controller';
import { ResultsIngestService } from './results-ingest.service';

@Module({
  imports: [ConfigModule, DocumentStoreModule],
  controllers: [ResultsEventsController],
  providers: [
    JobIndices,
    DocumentWriter,
    IndexCommitter,
    JobResultsPersister,
    ResultsIngestService,
    {
      provide: PERSISTENCE_ERROR_SINK,
      useClass: LoggingPersistenceErrorSink,
    },
  ],
  exports: [JobIndices, DocumentWriter, IndexCommitter, JobResultsPersister],
})
export class ResultsModule { }
