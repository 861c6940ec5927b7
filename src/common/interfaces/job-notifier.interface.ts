import {
  SlowRunNotice,
  TranscriptionJob,
} from './transcription-job.interface';

export interface IJobNotifier {
  publish(job: TranscriptionJob): Promise<void>;

  /** Tells the owner a job is still running past its expected time. */
  notifyRunningLong(
    job: TranscriptionJob,
    notice: SlowRunNotice,
  ): Promise<void>;
}

export const JOB_NOTIFIER = 'JOB_NOTIFIER';
