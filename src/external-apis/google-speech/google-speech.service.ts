import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { SpeechClient } from '@google-cloud/speech';
import { Storage } from '@google-cloud/storage';
import { v4 as uuidv4 } from 'uuid';
import { google } from '@google-cloud/speech/build/protos/protos';
import {
  IRecognitionBackend,
  RecognitionPollResult,
} from '../../common/interfaces/recognition-backend.interface';
import {
  PollTransientException,
  SubmissionException,
} from '../../common/exceptions/pipeline.exception';
import {
  PipelineConfig,
  pipelineConfig,
} from '../../common/config/pipeline.config';
import { StorageService } from '../../common/providers/storage/storage.service';
import { getErrorMessage } from '../../common/utils/error.utils';

export const SPEECH_CLIENT = 'SPEECH_CLIENT';
export const STAGING_STORAGE = 'STAGING_STORAGE';

/** Largest request body the API takes with audio sent inline. */
export const INLINE_AUDIO_LIMIT_BYTES = 10 * 1024 * 1024;

/**
 * Google Cloud Speech-to-Text long-running recognition. Audio kept in Cloud
 * Storage is passed by `gs://` URI. Other audio is sent inline when it fits
 * the inline limit and is otherwise copied to the staging bucket for the
 * lifetime of its operation.
 */
@Injectable()
export class GoogleSpeechService implements IRecognitionBackend, OnModuleInit {
  private readonly logger = new Logger(GoogleSpeechService.name);
  // operation name -> staged object name
  private readonly staged = new Map<string, string>();

  constructor(
    @Inject(SPEECH_CLIENT) private readonly speechClient: SpeechClient,
    @Inject(STAGING_STORAGE) private readonly stagingStorage: Storage,
    private readonly storageService: StorageService,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  onModuleInit(): void {
    // 16-bit mono PCM
    const maxSegmentBytes =
      this.config.maxSegmentDurationSeconds * this.config.sampleRateHertz * 2;
    if (
      !this.config.stagingBucket &&
      maxSegmentBytes > INLINE_AUDIO_LIMIT_BYTES
    ) {
      this.logger.warn(
        'SPEECH_STAGING_BUCKET is not set: locally stored segments over 10 MB will be rejected',
      );
    }
  }

  async submit(audioRef: string): Promise<string> {
    const uri = this.storageService.getNativeUri(audioRef);
    let stagedName: string | null = null;

    try {
      let audio: google.cloud.speech.v1.IRecognitionAudio;
      if (uri) {
        audio = { uri };
      } else {
        const content = await this.storageService.read(audioRef);
        if (content.length <= INLINE_AUDIO_LIMIT_BYTES) {
          audio = { content };
        } else {
          stagedName = await this.stage(content);
          audio = { uri: `gs://${this.requireStagingBucket()}/${stagedName}` };
        }
      }

      const [operation] = await this.speechClient.longRunningRecognize({
        audio,
        config: {
          encoding: 'LINEAR16',
          sampleRateHertz: this.config.sampleRateHertz,
          audioChannelCount: 1,
          languageCode: this.config.languageCode,
          enableAutomaticPunctuation: true,
          model: 'default',
        },
      });

      if (!operation.name) {
        throw new Error('Response carries no operation name');
      }

      if (stagedName) {
        this.staged.set(operation.name, stagedName);
      }
      this.logger.log(`Recognition operation started: ${operation.name}`);
      return operation.name;
    } catch (error) {
      if (stagedName) {
        await this.unstage(stagedName);
      }
      throw new SubmissionException(
        `Recognition submit failed: ${getErrorMessage(error)}`,
        error,
      );
    }
  }

  async poll(operationHandle: string): Promise<RecognitionPollResult> {
    let operation: Awaited<
      ReturnType<SpeechClient['checkLongRunningRecognizeProgress']>
    >;
    try {
      operation =
        await this.speechClient.checkLongRunningRecognizeProgress(
          operationHandle,
        );
    } catch (error) {
      throw new PollTransientException(
        `Operation poll failed: ${getErrorMessage(error)}`,
        error,
      );
    }

    if (!operation.done) {
      return { status: 'pending' };
    }

    await this.releaseStaged(operationHandle);

    if (operation.error) {
      return {
        status: 'failed',
        reason: `[${String(operation.error.code)}] ${operation.error.message}`,
      };
    }

    try {
      const [response] = await operation.promise();
      return {
        status: 'complete',
        text: this.extractText(response),
        billedSeconds: this.convertTimeToSeconds(response.totalBilledTime),
      };
    } catch (error) {
      throw new PollTransientException(
        `Operation result could not be read: ${getErrorMessage(error)}`,
        error,
      );
    }
  }

  async cancel(operationHandle: string): Promise<void> {
    try {
      await this.speechClient.operationsClient.cancelOperation(
        google.longrunning.CancelOperationRequest.create({
          name: operationHandle,
        }),
      );
      this.logger.log(`Recognition operation canceled: ${operationHandle}`);
    } finally {
      await this.releaseStaged(operationHandle);
    }
  }

  private requireStagingBucket(): string {
    const bucket = this.config.stagingBucket;
    if (!bucket) {
      throw new Error(
        `Audio exceeds the ${INLINE_AUDIO_LIMIT_BYTES} byte inline limit and no staging bucket is configured`,
      );
    }
    return bucket;
  }

  private async stage(content: Buffer): Promise<string> {
    const bucket = this.requireStagingBucket();
    const fileName = `staging/${uuidv4()}.wav`;
    await this.stagingStorage.bucket(bucket).file(fileName).save(content);
    this.logger.log(
      `Staged ${content.length} bytes as gs://${bucket}/${fileName}`,
    );
    return fileName;
  }

  private async releaseStaged(operationHandle: string): Promise<void> {
    const fileName = this.staged.get(operationHandle);
    if (!fileName) {
      return;
    }
    this.staged.delete(operationHandle);
    await this.unstage(fileName);
  }

  private async unstage(fileName: string): Promise<void> {
    try {
      await this.stagingStorage
        .bucket(this.requireStagingBucket())
        .file(fileName)
        .delete();
    } catch (error) {
      this.logger.warn(
        `Could not delete staged audio ${fileName}: ${getErrorMessage(error)}`,
      );
    }
  }

  private extractText(
    response: google.cloud.speech.v1.ILongRunningRecognizeResponse,
  ): string {
    return (response.results ?? [])
      .map((result) => result.alternatives?.[0]?.transcript?.trim() ?? '')
      .filter((text) => text.length > 0)
      .join(' ');
  }

  private convertTimeToSeconds(
    time: google.protobuf.IDuration | null | undefined,
  ): number | null {
    if (!time) return null;
    const seconds = Number(time.seconds || 0);
    const nanos = Number(time.nanos || 0);
    return seconds + nanos / 1e9;
  }
}
