import { randomUUID } from 'node:crypto';
import { createLoggerOptions } from '@drive-explorer/logger';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { context, trace } from '@opentelemetry/api';
import { OpenTelemetryModule } from 'nestjs-otel';
import { LoggerModule } from 'nestjs-pino';
import { ZodValidationPipe } from 'nestjs-zod';
import { type AppConfig, appConfig, browseConfig, graphConfig, transferConfig } from './config';
import { DriveExplorerErrorFilter } from './file-explorer/drive-explorer-error.filter';
import { FileExplorerModule } from './file-explorer/file-explorer.module';
import { ProbeController } from './probe/probe.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      load: [appConfig, graphConfig, browseConfig, transferConfig],
    }),
    LoggerModule.forRootAsync({
      useFactory(appConfig: AppConfig) {
        const defaults = createLoggerOptions(appConfig.nodeEnv);
        return {
          ...defaults,
          pinoHttp: {
            ...defaults.pinoHttp,
            level: appConfig.logLevel,
            genReqId: () => {
              const ctx = trace.getSpanContext(context.active());
              if (!ctx) return randomUUID();
              return ctx.traceId;
            },
          },
        };
      },
      inject: [appConfig.KEY],
    }),
    OpenTelemetryModule.forRoot({
      metrics: {
        hostMetrics: true,
        apiMetrics: {
          enable: true,
        },
      },
    }),
    FileExplorerModule,
  ],
  controllers: [ProbeController],
  providers: [
    { provide: APP_PIPE, useClass: ZodValidationPipe },
    { provide: APP_FILTER, useClass: DriveExplorerErrorFilter },
  ],
})
export class AppModule {}
