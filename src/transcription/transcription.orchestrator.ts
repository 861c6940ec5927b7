import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { MediaService } from './media/media.service';
import { RecognitionClient } from './recognition/recognition.client';
import { planSegments } from './segmentation/segment-planner';
import { aggregateTranscript } from './aggregation/transcript-aggregator';
import { assertTransition } from './job-state';
import { WorkerPool, WorkerSlot } from './worker-pool';
import { StorageService } from '../common/providers/storage/storage.service';
import {
  PipelineConfig,
  pipelineConfig,
} from '../common/config/pipeline.config';
import {
  IJobRepository,
  JOB_REPOSITORY,
} from '../common/interfaces/job-repository.interface';
import {
  IJobNotifier,
  JOB_NOTIFIER,
} from '../common/interfaces/job-notifier.interface';
import {
  JobSegment,
  MediaInfo,
  SubmitJobData,
  TranscriptionJob,
  TranscriptResult,
} from '../common/interfaces/transcription-job.interface';
import { isTerminalJobState, JobState } from '../common/enums/job-state.enum';
import { SegmentStatus } from '../common/enums/segment-status.enum';
import {
  PIPELINE_ERROR_MESSAGES,
  PipelineErrorCode,
} from '../common/enums/pipeline-error-code.enum';
import {
  PipelineCanceledException,
  PipelineException,
  UnreadableMediaException,
} from '../common/exceptions/pipeline.exception';
import {
  JobNotCancelableException,
  JobNotFoundException,
} from '../common/exceptions/job.exception';
import { delay, throwIfCanceled } from '../common/utils/delay.util';
import { getErrorMessage, getErrorStack } from '../common/utils/error.utils';

export interface SubmittedJob {
  job: TranscriptionJob;
  /** 1-based place in the queue; 0 once the job holds a worker slot. */
  position: number;
}

interface ActiveRun {
  slot: WorkerSlot;
  controller: AbortController;
}

/**
 * Owns the job queue and the worker pool. Every job runs probe, segmenting,
 * transcoding, recognition and aggregation inside one worker slot; segments
 * are recognized concurrently within that slot.
 */
@Injectable()
export class TranscriptionOrchestrator
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(TranscriptionOrchestrator.name);
  private readonly pool: WorkerPool;
  private readonly jobs = new Map<string, TranscriptionJob>();
  private readonly queue: string[] = [];
  private readonly active = new Map<string, ActiveRun>();
  private readonly pendingWrites = new Map<string, Promise<void>>();
  private accepting = true;

  constructor(
    private readonly mediaService: MediaService,
    private readonly recognitionClient: RecognitionClient,
    private readonly storageService: StorageService,
    @Inject(JOB_REPOSITORY) private readonly jobRepository: IJobRepository,
    @Inject(JOB_NOTIFIER) private readonly jobNotifier: IJobNotifier,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {
    this.pool = new WorkerPool(config.workerPoolSize);
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.recover();
  }

  onModuleDestroy(): void {
    this.accepting = false;
    for (const [jobId, run] of this.active) {
      this.logger.warn(`Aborting job ${jobId} on shutdown`);
      run.controller.abort();
    }
  }

  async submit(data: SubmitJobData): Promise<SubmittedJob> {
    const job: TranscriptionJob = {
      id: uuidv4(),
      owner: data.owner,
      sourceRef: data.sourceRef,
      originalName: data.originalName ?? null,
      state: JobState.QUEUED,
      segments: [],
      media: null,
      createdAt: new Date(),
      startedAt: null,
      finishedAt: null,
      error: null,
      result: null,
    };

    this.jobs.set(job.id, job);
    await this.record(job);
    await this.publish(job);

    if (job.state === JobState.QUEUED) {
      this.queue.push(job.id);
      this.logger.log(
        `Job ${job.id} queued for ${job.owner} (${this.queue.length} waiting)`,
      );
      this.dispatch();
    }

    return {
      job: structuredClone(job),
      position: this.queue.indexOf(job.id) + 1,
    };
  }

  async getJob(jobId: string): Promise<TranscriptionJob | null> {
    const job = this.jobs.get(jobId);
    if (job) {
      return structuredClone(job);
    }
    await this.pendingWrites.get(jobId);
    return this.jobRepository.findById(jobId);
  }

  /**
   * Cancels a queued or running job. A running job gives up its worker slot
   * right away; its in-flight segment work stops at the next check.
   */
  async cancel(jobId: string): Promise<TranscriptionJob> {
    const job = this.jobs.get(jobId);
    if (!job) {
      const stored = await this.jobRepository.findById(jobId);
      if (!stored) {
        throw new JobNotFoundException(jobId);
      }
      throw new JobNotCancelableException(jobId, stored.state);
    }
    if (isTerminalJobState(job.state)) {
      throw new JobNotCancelableException(jobId, job.state);
    }

    assertTransition(job.state, JobState.CANCELED);
    job.state = JobState.CANCELED;
    job.finishedAt = new Date();
    for (const segment of job.segments) {
      segment.text = null;
    }

    const queuedAt = this.queue.indexOf(jobId);
    if (queuedAt >= 0) {
      this.queue.splice(queuedAt, 1);
    }

    const run = this.active.get(jobId);
    if (run) {
      run.controller.abort();
      run.slot.release();
      this.active.delete(jobId);
    }

    this.logger.log(`Job ${jobId} canceled`);
    this.dispatch();

    await this.record(job);
    await this.publish(job);
    const snapshot = structuredClone(job);

    if (!run) {
      await this.cleanup(job);
      this.evict(job);
    }
    return snapshot;
  }

  getQueueSize(): number {
    return this.queue.length;
  }

  getActiveCount(): number {
    return this.pool.inUse;
  }

  private dispatch(): void {
    while (this.accepting && this.queue.length > 0) {
      const slot = this.pool.tryAcquire();
      if (!slot) {
        return;
      }

      const jobId = this.queue.shift();
      const job = jobId === undefined ? undefined : this.jobs.get(jobId);
      if (!job || job.state !== JobState.QUEUED) {
        slot.release();
        continue;
      }

      const controller = new AbortController();
      this.active.set(job.id, { slot, controller });
      this.runJob(job, slot, controller.signal).catch((error: unknown) => {
        this.logger.error(
          `Job ${job.id} run ended unexpectedly: ${getErrorMessage(error)}`,
          getErrorStack(error),
        );
      });
    }
  }

  private async runJob(
    job: TranscriptionJob,
    slot: WorkerSlot,
    signal: AbortSignal,
  ): Promise<void> {
    const startedAt = new Date();
    const watchdog = new AbortController();
    job.startedAt = startedAt;
    this.logger.log(`Job ${job.id} started on worker ${slot.id}`);

    try {
      await this.advance(job, JobState.PROBING, signal);
      const media = await this.mediaService.probe(job.sourceRef);
      job.media = media;
      this.watchForSlowRun(job, media, startedAt, watchdog.signal).catch(
        (error: unknown) => {
          this.logger.error(
            `Slow-run watch for job ${job.id} failed: ${getErrorMessage(error)}`,
            getErrorStack(error),
          );
        },
      );

      await this.advance(job, JobState.SEGMENTING, signal);
      job.segments = planSegments(media.durationSeconds, media.sizeBytes, {
        maxDurationSeconds: this.config.maxSegmentDurationSeconds,
        maxSizeBytes: this.config.maxSegmentSizeBytes,
      }).map((range, index) => ({
        index,
        startOffset: range.startOffset,
        duration: range.duration,
        status: SegmentStatus.PENDING,
        transcodedRef: null,
        recognitionHandle: null,
        text: null,
        billedSeconds: null,
        error: null,
      }));
      this.logger.log(
        `Job ${job.id} split into ${job.segments.length} segment(s)`,
      );

      await this.advance(job, JobState.TRANSCODING, signal);
      for (const segment of job.segments) {
        throwIfCanceled(signal);
        await this.transcodeSegment(job, segment, media, signal);
      }

      const transcoded = job.segments.filter(
        (segment) => segment.transcodedRef !== null,
      );
      if (transcoded.length > 0) {
        await this.advance(job, JobState.RECOGNIZING, signal);

        const submitted: JobSegment[] = [];
        for (const segment of transcoded) {
          throwIfCanceled(signal);
          if (await this.submitSegment(job, segment)) {
            submitted.push(segment);
          }
        }

        await Promise.allSettled(
          submitted.map((segment) => this.pollSegment(job, segment, signal)),
        );
      }
      throwIfCanceled(signal);

      const done = job.segments.filter(
        (segment) => segment.status === SegmentStatus.DONE,
      );
      if (done.length === 0) {
        await this.fail(job, PipelineErrorCode.ALL_SEGMENTS_FAILED);
        return;
      }

      await this.advance(job, JobState.AGGREGATING, signal);
      const result = aggregateTranscript(
        job.segments,
        this.config.costPerSecond,
      );
      await this.succeed(job, result, signal);
    } catch (error) {
      if (signal.aborted || isTerminalJobState(job.state)) {
        this.logger.log(`Job ${job.id} stopped: ${getErrorMessage(error)}`);
        return;
      }

      const code =
        error instanceof UnreadableMediaException
          ? PipelineErrorCode.UNREADABLE_MEDIA
          : PipelineErrorCode.INTERNAL_ERROR;
      this.logger.error(
        `Job ${job.id} failed while ${job.state}: ${getErrorMessage(error)}`,
        getErrorStack(error),
      );
      await this.fail(job, code);
    } finally {
      watchdog.abort();
      await this.cleanup(job);
      slot.release();
      if (this.active.get(job.id)?.slot === slot) {
        this.active.delete(job.id);
      }
      this.evict(job);
      this.dispatch();
    }
  }

  private async transcodeSegment(
    job: TranscriptionJob,
    segment: JobSegment,
    media: MediaInfo,
    signal: AbortSignal,
  ): Promise<void> {
    try {
      segment.transcodedRef = await this.mediaService.transcode(
        job.sourceRef,
        {
          jobId: job.id,
          index: segment.index,
          startOffset: segment.startOffset,
          duration: segment.duration,
          hasVideoTrack: media.hasVideoTrack,
        },
        signal,
      );
      await this.record(job);
    } catch (error) {
      if (error instanceof PipelineCanceledException) {
        throw error;
      }
      await this.failSegment(
        job,
        segment,
        error instanceof PipelineException
          ? error.code
          : PipelineErrorCode.TRANSCODE_ERROR,
        getErrorMessage(error),
      );
    }
  }

  private async submitSegment(
    job: TranscriptionJob,
    segment: JobSegment,
  ): Promise<boolean> {
    if (segment.transcodedRef === null) {
      return false;
    }

    try {
      segment.recognitionHandle = await this.recognitionClient.submit(
        segment.transcodedRef,
      );
      segment.status = SegmentStatus.SUBMITTED;
      await this.record(job);
      return true;
    } catch (error) {
      await this.failSegment(
        job,
        segment,
        PipelineErrorCode.SUBMISSION_ERROR,
        getErrorMessage(error),
      );
      return false;
    }
  }

  private async pollSegment(
    job: TranscriptionJob,
    segment: JobSegment,
    signal: AbortSignal,
  ): Promise<void> {
    const handle = segment.recognitionHandle;
    if (handle === null) {
      return;
    }

    try {
      segment.status = SegmentStatus.POLLING;
      await this.record(job);

      const outcome = await this.recognitionClient.awaitCompletion(
        handle,
        signal,
      );
      if (outcome.status === 'done') {
        segment.status = SegmentStatus.DONE;
        segment.text = outcome.text;
        segment.billedSeconds = outcome.billedSeconds;
        this.logger.log(`Job ${job.id} segment ${segment.index} done`);
        await this.record(job);
      } else {
        await this.failSegment(job, segment, outcome.code, outcome.reason);
      }
    } catch (error) {
      if (error instanceof PipelineCanceledException) {
        throw error;
      }
      await this.failSegment(
        job,
        segment,
        PipelineErrorCode.INTERNAL_ERROR,
        getErrorMessage(error),
      );
    } finally {
      await this.releaseTranscoded(segment);
    }
  }

  /**
   * Waits for the expected run time of a job (a grace period plus an
   * allowance per minute of audio) and tells the owner if it is still going.
   */
  private async watchForSlowRun(
    job: TranscriptionJob,
    media: MediaInfo,
    startedAt: Date,
    signal: AbortSignal,
  ): Promise<void> {
    const expectedSeconds =
      (media.durationSeconds / 60) * this.config.slowJobSecondsPerMinute +
      this.config.slowJobGraceSeconds;

    try {
      await delay(expectedSeconds * 1000, signal);
    } catch (error) {
      if (error instanceof PipelineCanceledException) {
        return;
      }
      throw error;
    }
    if (isTerminalJobState(job.state)) {
      return;
    }

    const elapsedSeconds = (Date.now() - startedAt.getTime()) / 1000;
    this.logger.warn(
      `Job ${job.id} is taking longer than expected: ${Math.round(elapsedSeconds)}s so far, ${Math.round(expectedSeconds)}s expected`,
    );
    try {
      await this.jobNotifier.notifyRunningLong(structuredClone(job), {
        elapsedSeconds,
        expectedSeconds,
      });
    } catch (error) {
      this.logger.error(
        `Failed to send slow-run notice for job ${job.id}: ${getErrorMessage(error)}`,
        getErrorStack(error),
      );
    }
  }

  private async failSegment(
    job: TranscriptionJob,
    segment: JobSegment,
    code: PipelineErrorCode,
    message: string,
  ): Promise<void> {
    segment.status = SegmentStatus.FAILED;
    segment.text = null;
    segment.error = { code, message };
    this.logger.warn(
      `Job ${job.id} segment ${segment.index} failed (${code}): ${message}`,
    );
    await this.record(job);
    await this.releaseTranscoded(segment);
  }

  private async advance(
    job: TranscriptionJob,
    state: JobState,
    signal: AbortSignal,
  ): Promise<void> {
    throwIfCanceled(signal);
    assertTransition(job.state, state);
    job.state = state;
    this.logger.log(`Job ${job.id} -> ${state}`);
    await this.record(job);
    await this.publish(job);
    throwIfCanceled(signal);
  }

  private async succeed(
    job: TranscriptionJob,
    result: TranscriptResult,
    signal: AbortSignal,
  ): Promise<void> {
    throwIfCanceled(signal);
    assertTransition(job.state, JobState.SUCCEEDED);
    job.state = JobState.SUCCEEDED;
    job.result = result;
    job.finishedAt = new Date();
    this.logger.log(
      `Job ${job.id} succeeded: ${result.segmentCount} segment(s), ${result.billedSeconds}s billed${result.partial ? ', partial' : ''}`,
    );
    await this.record(job);
    await this.publish(job);
  }

  private async fail(
    job: TranscriptionJob,
    code: PipelineErrorCode,
  ): Promise<void> {
    if (isTerminalJobState(job.state)) {
      return;
    }
    assertTransition(job.state, JobState.FAILED);
    job.state = JobState.FAILED;
    job.error = { code, message: PIPELINE_ERROR_MESSAGES[code] };
    job.result = null;
    job.finishedAt = new Date();
    this.logger.error(`Job ${job.id} failed: ${code}`);
    await this.record(job);
    await this.publish(job);
  }

  private async recover(): Promise<void> {
    const unfinished = await this.jobRepository.findUnfinished();
    let requeued = 0;

    for (const job of unfinished) {
      if (this.jobs.has(job.id)) {
        continue;
      }
      this.jobs.set(job.id, job);

      if (job.state === JobState.QUEUED) {
        this.queue.push(job.id);
        requeued += 1;
        continue;
      }

      this.logger.warn(`Job ${job.id} was interrupted while ${job.state}`);
      await this.cancelRemoteWork(job);
      await this.fail(job, PipelineErrorCode.INTERRUPTED);
      await this.cleanup(job);
      this.evict(job);
    }

    if (unfinished.length > 0) {
      this.logger.log(
        `Recovered ${unfinished.length} unfinished job(s), ${requeued} requeued`,
      );
    }
    this.dispatch();
  }

  // Operations submitted before a restart are still running remotely
  private async cancelRemoteWork(job: TranscriptionJob): Promise<void> {
    for (const segment of job.segments) {
      const inFlight =
        segment.status === SegmentStatus.SUBMITTED ||
        segment.status === SegmentStatus.POLLING;
      if (inFlight && segment.recognitionHandle !== null) {
        await this.recognitionClient.cancel(segment.recognitionHandle);
      }
    }
  }

  private async releaseTranscoded(segment: JobSegment): Promise<void> {
    const ref = segment.transcodedRef;
    if (ref === null) {
      return;
    }
    segment.transcodedRef = null;
    try {
      await this.storageService.deleteFile(ref);
    } catch (error) {
      this.logger.warn(`Could not delete ${ref}: ${getErrorMessage(error)}`);
    }
  }

  private async cleanup(job: TranscriptionJob): Promise<void> {
    for (const segment of job.segments) {
      await this.releaseTranscoded(segment);
    }
    if (!isTerminalJobState(job.state)) {
      return;
    }

    try {
      await this.storageService.deleteFile(job.sourceRef);
    } catch (error) {
      this.logger.warn(
        `Could not delete source of job ${job.id}: ${getErrorMessage(error)}`,
      );
    }
    try {
      await this.mediaService.removeWorkDir(job.id);
    } catch (error) {
      this.logger.warn(
        `Could not remove work dir of job ${job.id}: ${getErrorMessage(error)}`,
      );
    }
  }

  /** Finished jobs are served from the repository from here on. */
  private evict(job: TranscriptionJob): void {
    if (isTerminalJobState(job.state) && !this.active.has(job.id)) {
      this.jobs.delete(job.id);
    }
  }

  // Writes for one job are chained so the stored record never goes back to
  // an older snapshot.
  private record(job: TranscriptionJob): Promise<void> {
    const snapshot = structuredClone(job);
    const previous = this.pendingWrites.get(job.id) ?? Promise.resolve();
    const write: Promise<void> = previous
      .then(() => this.jobRepository.save(snapshot))
      .catch((error: unknown) => {
        this.logger.error(
          `Failed to persist job ${job.id}: ${getErrorMessage(error)}`,
          getErrorStack(error),
        );
      })
      .finally(() => {
        if (this.pendingWrites.get(job.id) === write) {
          this.pendingWrites.delete(job.id);
        }
      });
    this.pendingWrites.set(job.id, write);
    return write;
  }

  private async publish(job: TranscriptionJob): Promise<void> {
    try {
      await this.jobNotifier.publish(structuredClone(job));
    } catch (error) {
      this.logger.error(
        `Failed to publish state of job ${job.id}: ${getErrorMessage(error)}`,
        getErrorStack(error),
      );
    }
  }
}
