import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ANALYSIS_QUEUE, JOB_EVENTS_QUEUE } from './queue-names';

@Module({
  imports: [
    BullModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: Number(configService.get('REDIS_PORT', 6379)),
          password: configService.get<string>('REDIS_PASSWORD'),
        },
      }),
    }),
    BullModule.registerQueue({
      name: JOB_EVENTS_QUEUE,
    }),
    BullModule.registerQueue({
      name: ANALYSIS_QUEUE,
    }),
  ],
  exports: [BullModule],
})
export class QueuesModule {}
