import { IJobNotifier } from '../../src/common/interfaces/job-notifier.interface';
import {
  SlowRunNotice,
  TranscriptionJob,
} from '../../src/common/interfaces/transcription-job.interface';

export class RecordingJobNotifier implements IJobNotifier {
  readonly published: TranscriptionJob[] = [];
  readonly runningLong: Array<{ jobId: string; notice: SlowRunNotice }> = [];

  async publish(job: TranscriptionJob): Promise<void> {
    this.published.push(structuredClone(job));
  }

  async notifyRunningLong(
    job: TranscriptionJob,
    notice: SlowRunNotice,
  ): Promise<void> {
    this.runningLong.push({ jobId: job.id, notice });
  }

  statesOf(jobId: string): string[] {
    return this.published
      .filter((job) => job.id === jobId)
      .map((job) => job.state);
  }
}
