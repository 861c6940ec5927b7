import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { IJobNotifier } from '../../common/interfaces/job-notifier.interface';
import {
  AnalysisJobData,
  JobEvent,
  JobStateChangedEvent,
  SlowRunNotice,
  TranscriptionJob,
} from '../../common/interfaces/transcription-job.interface';
import { JobState } from '../../common/enums/job-state.enum';
import { SegmentStatus } from '../../common/enums/segment-status.enum';
import {
  ANALYSIS_QUEUE,
  ANALYZE_TRANSCRIPT,
  JOB_EVENTS_QUEUE,
  JOB_RUNNING_LONG,
  JOB_STATE_CHANGED,
} from '../../queues/queue-names';
import { getErrorMessage } from '../../common/utils/error.utils';

export function toStateChangedEvent(
  job: TranscriptionJob,
): JobStateChangedEvent {
  const event: JobStateChangedEvent = {
    jobId: job.id,
    owner: job.owner,
    state: job.state,
    occurredAt: new Date().toISOString(),
    segments: {
      total: job.segments.length,
      done: job.segments.filter((s) => s.status === SegmentStatus.DONE).length,
      failed: job.segments.filter((s) => s.status === SegmentStatus.FAILED)
        .length,
    },
  };
  if (job.error) {
    event.error = job.error;
  }
  if (job.result) {
    event.result = job.result;
  }
  return event;
}

/**
 * Publishes job transitions and slow-run notices on the job-events queue and
 * hands finished transcripts to the analysis queue.
 */
@Injectable()
export class QueueJobNotifier implements IJobNotifier {
  private readonly logger = new Logger(QueueJobNotifier.name);

  constructor(
    @InjectQueue(JOB_EVENTS_QUEUE)
    private readonly jobEventsQueue: Queue<JobEvent>,
    @InjectQueue(ANALYSIS_QUEUE)
    private readonly analysisQueue: Queue<AnalysisJobData>,
  ) {}

  async publish(job: TranscriptionJob): Promise<void> {
    await this.jobEventsQueue.add(JOB_STATE_CHANGED, toStateChangedEvent(job), {
      removeOnComplete: 100,
      removeOnFail: 50,
    });

    if (job.state === JobState.SUCCEEDED && job.result) {
      await this.queueAnalysis(
        job.id,
        job.owner,
        job.result.text,
        job.result.partial,
      );
    }
  }

  async notifyRunningLong(
    job: TranscriptionJob,
    notice: SlowRunNotice,
  ): Promise<void> {
    await this.jobEventsQueue.add(
      JOB_RUNNING_LONG,
      {
        jobId: job.id,
        owner: job.owner,
        state: job.state,
        occurredAt: new Date().toISOString(),
        elapsedSeconds: Math.round(notice.elapsedSeconds),
        expectedSeconds: Math.round(notice.expectedSeconds),
      },
      { removeOnComplete: 100, removeOnFail: 50 },
    );
  }

  private async queueAnalysis(
    jobId: string,
    owner: string,
    transcript: string,
    partial: boolean,
  ): Promise<void> {
    try {
      await this.analysisQueue.add(
        ANALYZE_TRANSCRIPT,
        { jobId, owner, transcript, partial },
        {
          attempts: 3,
          backoff: {
            type: 'exponential',
            delay: 2000,
          },
          removeOnComplete: 10,
          removeOnFail: 5,
        },
      );
      this.logger.log(`Analysis queued for job ${jobId}`);
    } catch (error) {
      this.logger.error(
        `Failed to queue analysis for job ${jobId}: ${getErrorMessage(error)}`,
      );
    }
  }
}
