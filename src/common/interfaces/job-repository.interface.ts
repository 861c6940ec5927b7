import { TranscriptionJob } from './transcription-job.interface';

export interface IJobRepository {
  save(job: TranscriptionJob): Promise<void>;

  findById(jobId: string): Promise<TranscriptionJob | null>;

  /** Jobs persisted in a non-terminal state, oldest first. */
  findUnfinished(): Promise<TranscriptionJob[]>;
}

export const JOB_REPOSITORY = 'JOB_REPOSITORY';
