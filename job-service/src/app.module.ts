import { Module } from '@nestjs/common';
import { JobsModule } from './jobs/jobs.module';
import { ResultsModule } from './results/results.module';
import { DocumentStoreModule } from './store/document-store.module';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { validateEnv } from './env.schema';
import { LoggerModule } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { ClsModule, ClsService } from 'nestjs-cls';
import { v4 as uuidv4 } from 'uuid';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    ClsModule.forRoot({
      global: true,
      middleware: {
        mount: true,
        setup: (cls: ClsService, req: IncomingMessage) => {
          const correlationId = req.headers['x-correlation-id'] || uuidv4();
          cls.set('correlationId', correlationId);
        },
      },
    }),
    LoggerModule.forRootAsync({
      imports: [ConfigModule, ClsModule],
      inject: [ConfigService, ClsService],
      useFactory: (configService: ConfigService, clsService: ClsService) => {
        const nodeEnv = configService.get<string>('NODE_ENV');
        const isProduction = nodeEnv === 'production';

        let level = 'debug';
        if (isProduction) {
          level = 'info';
        } else if (nodeEnv === 'test') {
          level = 'silent';
        }

        return {
          pinoHttp: {
            level,
            serializers: {
              req: (req: IncomingMessage) => ({
                id: req.id,
                method: req.method,
                url: req.url,
              }),
              res: (res: ServerResponse) => ({
                statusCode: res.statusCode,
              }),
            },
            mixin: () => {
              const correlationId = clsService.isActive() ? clsService.get('correlationId') : undefined;
              return { correlationId };
            },
            customProps: () => ({
              context: 'HTTP',
            }),
            transport: nodeEnv === 'development'
              ? {
                  target: 'pino-pretty',
                  options: {
                    singleLine: true,
                    colorize: true,
                    ignore: 'pid,hostname,req,res,context',
                  },
                }
              : undefined,
          },
        };
      },
    }),
    DocumentStoreModule,
    ResultsModule,
    JobsModule,
  ],
})
export class AppModule { }
