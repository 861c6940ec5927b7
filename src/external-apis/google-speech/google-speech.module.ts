import { Module } from '@nestjs/common';
import { SpeechClient } from '@google-cloud/speech';
import { Storage } from '@google-cloud/storage';
import {
  GoogleSpeechService,
  SPEECH_CLIENT,
  STAGING_STORAGE,
} from './google-speech.service';
import { StorageModule } from '../../common/providers/storage/storage.module';

@Module({
  imports: [StorageModule],
  providers: [
    {
      // Credentials come from GOOGLE_APPLICATION_CREDENTIALS
      provide: SPEECH_CLIENT,
      useFactory: () => new SpeechClient(),
    },
    {
      provide: STAGING_STORAGE,
      useFactory: () => new Storage(),
    },
    GoogleSpeechService,
  ],
  exports: [GoogleSpeechService],
})
export class GoogleSpeechModule {}
