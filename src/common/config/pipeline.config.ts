import { registerAs } from '@nestjs/config';
import { plainToInstance, Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
  validateSync,
} from 'class-validator';

export class PipelineSettings {
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  maxSegmentDurationSeconds = 14400;

  @Type(() => Number)
  @IsInt()
  @IsPositive()
  maxSegmentSizeBytes = 1_073_741_824;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  pollIntervalSeconds = 5;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  pollTimeoutSeconds = 1800;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  workerPoolSize = 3;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  maxPollTransientErrors = 3;

  /** Recognition tariff, currency units per billed second. */
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  costPerSecond = 0.002542;

  @IsString()
  @IsNotEmpty()
  languageCode = 'en-US';

  @Type(() => Number)
  @IsInt()
  @IsPositive()
  sampleRateHertz = 16000;

  @IsString()
  @IsNotEmpty()
  tmpDir = '/tmp/transcribe';

  /** Bucket for audio too large to send inline to the speech API. */
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  stagingBucket?: string;

  // A job is reported as running long after
  // grace + duration in minutes * secondsPerMinute.
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  slowJobGraceSeconds = 300;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  slowJobSecondsPerMinute = 10;
}

export type PipelineConfig = Readonly<
  Pick<PipelineSettings, keyof PipelineSettings>
>;

type RawPipelineConfig = Partial<Record<keyof PipelineSettings, string>>;

export function validatePipelineConfig(raw: RawPipelineConfig): PipelineConfig {
  const provided = Object.fromEntries(
    Object.entries(raw).filter(([, value]) => value !== undefined),
  );

  const settings = plainToInstance(PipelineSettings, provided);
  const errors = validateSync(settings, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) =>
        Object.values(error.constraints ?? {}).join(', '),
      )
      .join('; ');
    throw new Error(`Invalid pipeline configuration: ${details}`);
  }

  return { ...settings };
}

export const pipelineConfig = registerAs('pipeline', () =>
  validatePipelineConfig({
    maxSegmentDurationSeconds: process.env.MAX_SEGMENT_DURATION_SECONDS,
    maxSegmentSizeBytes: process.env.MAX_SEGMENT_SIZE_BYTES,
    pollIntervalSeconds: process.env.POLL_INTERVAL_SECONDS,
    pollTimeoutSeconds: process.env.POLL_TIMEOUT_SECONDS,
    workerPoolSize: process.env.WORKER_POOL_SIZE,
    maxPollTransientErrors: process.env.MAX_POLL_TRANSIENT_ERRORS,
    costPerSecond: process.env.COST_PER_SECOND,
    languageCode: process.env.RECOGNITION_LANGUAGE,
    sampleRateHertz: process.env.RECOGNITION_SAMPLE_RATE,
    tmpDir: process.env.TMP_DIR,
    stagingBucket: process.env.SPEECH_STAGING_BUCKET,
    slowJobGraceSeconds: process.env.SLOW_JOB_GRACE_SECONDS,
    slowJobSecondsPerMinute: process.env.SLOW_JOB_SECONDS_PER_MINUTE,
  }),
);
