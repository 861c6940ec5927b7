import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { TranscriptionModule } from './transcription/transcription.module';
import { QueuesModule } from './queues/queues.module';
import { DatabaseModule } from './database/database.module';
import { pipelineConfig } from './common/config/pipeline.config';
import { LoggerMiddleware } from './middleware/logger.middleware';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [pipelineConfig],
    }),
    DatabaseModule,
    QueuesModule,
    TranscriptionModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(LoggerMiddleware).forRoutes('*');
  }
}
