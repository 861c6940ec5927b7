import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { TranscriptionController } from './transcription.controller';
import { TranscriptionOrchestrator } from './transcription.orchestrator';
import { JobsRepository } from './jobs.repository';
import { MediaService } from './media/media.service';
import { RecognitionClient } from './recognition/recognition.client';
import { QueueJobNotifier } from './notifications/queue-job.notifier';
import {
  TranscriptionJobRecord,
  TranscriptionJobRecordSchema,
} from './schemas/transcription-job.schema';
import { QueuesModule } from '../queues/queues.module';
import { StorageModule } from '../common/providers/storage/storage.module';
import { FfmpegModule } from '../services/ffmpeg/ffmpeg.module';
import { GoogleSpeechModule } from '../external-apis/google-speech/google-speech.module';
import { GoogleSpeechService } from '../external-apis/google-speech/google-speech.service';
import { RECOGNITION_BACKEND } from '../common/interfaces/recognition-backend.interface';
import { JOB_REPOSITORY } from '../common/interfaces/job-repository.interface';
import { JOB_NOTIFIER } from '../common/interfaces/job-notifier.interface';

@Module({
  imports: [
    MongooseModule.forFeature([
      {
        name: TranscriptionJobRecord.name,
        schema: TranscriptionJobRecordSchema,
      },
    ]),
    QueuesModule,
    StorageModule,
    FfmpegModule,
    GoogleSpeechModule,
  ],
  controllers: [TranscriptionController],
  providers: [
    TranscriptionOrchestrator,
    MediaService,
    RecognitionClient,
    JobsRepository,
    QueueJobNotifier,
    { provide: RECOGNITION_BACKEND, useExisting: GoogleSpeechService },
    { provide: JOB_REPOSITORY, useExisting: JobsRepository },
    { provide: JOB_NOTIFIER, useExisting: QueueJobNotifier },
  ],
  exports: [TranscriptionOrchestrator],
})
export class TranscriptionModule {}
