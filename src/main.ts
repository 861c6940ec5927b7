import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule);
  // Running jobs are aborted on SIGTERM and picked up again by recovery
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = Number(configService.get('PORT', 3000));

  await app.listen(port);
  logger.log(`Transcription service listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error);
  process.exit(1);
});
