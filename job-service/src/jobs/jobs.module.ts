import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ClientsModule, Transport } from '@nestjs/microservices';
import { ResultsModule } from '../results/results.module';
import { DocumentStoreModule } from '../store/document-store.module';
import { JobsController } from './jobs.controller';
import { ANALYSIS_QUEUE_SERVICE, JobsService } from './jobs.service';

@Module({
  imports: [
    ConfigModule,
    DocumentStoreModule,
    ResultsModule,
    ClientsModule.registerAsync([
      {
        name: ANALYSIS_QUEUE_SERVICE,
        imports: [ConfigModule],
        useFactory: async (configService: ConfigService) => ({
          transport: Transport.RMQ,
          options: {
            urls: [configService.getOrThrow<string>('RABBITMQ_URL')],
            queue: configService.getOrThrow<string>('RABBITMQ_JOBS_QUEUE'),
            queueOptions: {
              durable: true,
            },
          },
        }),
        inject: [ConfigService],
      }
    ])
  ],
  controllers: [JobsController],
  providers: [JobsService]
})
export class JobsModule { }
