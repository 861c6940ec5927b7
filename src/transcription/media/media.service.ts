import { Inject, Injectable, Logger } from '@nestjs/common';
import { rm } from 'fs/promises';
import { join } from 'path';
import { FfmpegService } from '../../services/ffmpeg/ffmpeg.service';
import { StorageService } from '../../common/providers/storage/storage.service';
import {
  PipelineConfig,
  pipelineConfig,
} from '../../common/config/pipeline.config';
import {
  PipelineException,
  TranscodeException,
  UnreadableMediaException,
} from '../../common/exceptions/pipeline.exception';
import {
  MediaInfo,
  SegmentRange,
} from '../../common/interfaces/transcription-job.interface';
import { getErrorMessage } from '../../common/utils/error.utils';

export interface TranscodeTarget extends SegmentRange {
  jobId: string;
  index: number;
  hasVideoTrack: boolean;
}

/**
 * Prober and transcoder over stored media. Works on storage refs; ffmpeg
 * reads the source through whatever locator the storage provider hands out.
 */
@Injectable()
export class MediaService {
  private readonly logger = new Logger(MediaService.name);

  constructor(
    private readonly ffmpegService: FfmpegService,
    private readonly storageService: StorageService,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  async probe(sourceRef: string): Promise<MediaInfo> {
    try {
      const input = await this.storageService.fetchUrl(sourceRef);
      const probe = await this.ffmpegService.probe(input);
      const sizeBytes = await this.storageService.getSize(sourceRef);

      this.logger.log(
        `Probed ${sourceRef}: ${probe.durationSeconds}s, ${sizeBytes} bytes, video=${probe.hasVideoTrack}`,
      );

      return {
        durationSeconds: probe.durationSeconds,
        sizeBytes,
        hasVideoTrack: probe.hasVideoTrack,
        formatName: probe.formatName,
      };
    } catch (error) {
      if (error instanceof UnreadableMediaException) {
        throw error;
      }
      throw new UnreadableMediaException(
        `Source could not be read: ${getErrorMessage(error)}`,
        error,
      );
    }
  }

  /** Normalizes one range of the source and stores it; returns the new ref. */
  async transcode(
    sourceRef: string,
    target: TranscodeTarget,
    signal?: AbortSignal,
  ): Promise<string> {
    const fileName = `segment-${String(target.index).padStart(3, '0')}.wav`;
    const localPath = join(this.workDir(target.jobId), fileName);

    try {
      const input = await this.storageService.fetchUrl(sourceRef);
      await this.ffmpegService.extractAudioSegment(input, localPath, {
        startOffset: target.startOffset,
        duration: target.duration,
        sampleRateHertz: this.config.sampleRateHertz,
        dropVideo: target.hasVideoTrack,
        signal,
      });
      return await this.storageService.storeFile(
        localPath,
        `jobs/${target.jobId}/${fileName}`,
      );
    } catch (error) {
      if (error instanceof PipelineException) {
        throw error;
      }
      throw new TranscodeException(
        `Segment ${target.index} could not be transcoded: ${getErrorMessage(error)}`,
        error,
      );
    } finally {
      await rm(localPath, { force: true });
    }
  }

  async removeWorkDir(jobId: string): Promise<void> {
    await rm(this.workDir(jobId), { recursive: true, force: true });
  }

  private workDir(jobId: string): string {
    return join(this.config.tmpDir, jobId);
  }
}
