import { Injectable, Logger } from '@nestjs/common';
import ffmpeg, { FfprobeData } from 'fluent-ffmpeg';
import { mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import {
  PipelineCanceledException,
  TranscodeException,
  UnreadableMediaException,
} from '../../common/exceptions/pipeline.exception';
import { getErrorMessage } from '../../common/utils/error.utils';

export interface ProbeResult {
  durationSeconds: number;
  hasVideoTrack: boolean;
  formatName?: string;
}

export interface AudioExtractionOptions {
  startOffset: number;
  duration: number;
  sampleRateHertz: number;
  dropVideo: boolean;
  /** Kills the running ffmpeg process when aborted. */
  signal?: AbortSignal;
}

@Injectable()
export class FfmpegService {
  private readonly logger = new Logger(FfmpegService.name);

  async ensureDir(dirPath: string): Promise<void> {
    try {
      if (!existsSync(dirPath)) {
        await mkdir(dirPath, { recursive: true });
      }
    } catch (error) {
      this.logger.error(
        `Failed to create directory ${dirPath}: ${getErrorMessage(error)}`,
      );
      throw error;
    }
  }

  async probe(input: string): Promise<ProbeResult> {
    const data = await new Promise<FfprobeData>((resolve, reject) => {
      ffmpeg.ffprobe(input, (err: unknown, metadata: FfprobeData) => {
        if (err) {
          reject(
            new UnreadableMediaException(
              `ffprobe failed: ${getErrorMessage(err)}`,
              err,
            ),
          );
          return;
        }
        resolve(metadata);
      });
    });

    const streams = data.streams ?? [];
    if (!streams.some((stream) => stream.codec_type === 'audio')) {
      throw new UnreadableMediaException('No audio stream found');
    }

    const durationSeconds = Number(data.format?.duration);
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
      throw new UnreadableMediaException(
        `Invalid media duration: ${String(data.format?.duration)}`,
      );
    }

    // Cover art in audio containers is reported as a video stream
    const hasVideoTrack = streams.some(
      (stream) =>
        stream.codec_type === 'video' && stream.disposition?.attached_pic !== 1,
    );

    return {
      durationSeconds,
      hasVideoTrack,
      formatName: data.format?.format_name,
    };
  }

  /**
   * Cuts `[startOffset, startOffset + duration)` out of the input and writes
   * it as 16-bit PCM mono WAV.
   */
  async extractAudioSegment(
    input: string,
    outputPath: string,
    options: AudioExtractionOptions,
  ): Promise<string> {
    const { startOffset, duration, sampleRateHertz, dropVideo, signal } =
      options;
    this.logger.log(
      `Extracting ${duration}s from ${startOffset}s into ${outputPath}`,
    );

    await this.ensureDir(dirname(outputPath));

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new PipelineCanceledException());
        return;
      }

      const command = ffmpeg(input)
        .setStartTime(startOffset)
        .setDuration(duration);

      const onAbort = () => {
        this.logger.warn(`Extraction aborted: ${outputPath}`);
        command.kill('SIGKILL');
        reject(new PipelineCanceledException());
      };

      if (dropVideo) {
        command.noVideo();
      }

      command
        .audioCodec('pcm_s16le')
        .audioFrequency(sampleRateHertz)
        .audioChannels(1)
        .format('wav')
        .on('end', () => {
          signal?.removeEventListener('abort', onAbort);
          this.logger.log(`Extraction finished: ${outputPath}`);
          resolve(outputPath);
        })
        .on('error', (err: Error) => {
          signal?.removeEventListener('abort', onAbort);
          if (signal?.aborted) {
            return;
          }
          this.logger.error(`Extraction failed for ${outputPath}: ${err.message}`);
          reject(new TranscodeException(err.message, err));
        })
        .save(outputPath);

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
