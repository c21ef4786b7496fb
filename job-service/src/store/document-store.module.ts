import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongoClient } from 'mongodb';
import { DOCUMENT_STORE, DocumentStore } from './document-store.interface';
import { InMemoryDocumentStore } from './in-memory-document-store';
import { MongoDocumentStore } from './mongo-document-store';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: DOCUMENT_STORE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): DocumentStore => {
        const logger = new Logger(DocumentStoreModule.name);
        const storeType = configService.getOrThrow<string>('STORE_TYPE');

        if (storeType === 'mongodb') {
          const client = new MongoClient(configService.getOrThrow<string>('MONGODB_URL'));
          return new MongoDocumentStore(client, configService.getOrThrow<string>('MONGODB_DATABASE'));
        }

        logger.warn('STORE_TYPE is memory, documents are kept in process only');
        return new InMemoryDocumentStore();
      },
    },
  ],
  exports: [DOCUMENT_STORE],
})
export class DocumentStoreModule { }
