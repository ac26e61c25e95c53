// Must stay first so the auto instrumentations patch modules before they load.
import './instrumentation';
import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import type { Config } from './config';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });

  const configService = app.get<ConfigService<Config, true>>(ConfigService);

  app.enableShutdownHooks();

  const logger = app.get(Logger);
  app.useLogger(logger);

  if (configService.get('app.isDev', { infer: true })) {
    app.enableCors({ origin: true });
  }

  const port = configService.get('app.port', { infer: true });
  await app.listen(port);
  logger.log(`Server is running on http://localhost:${port}`);
}

void bootstrap();
