import { JobState } from '../enums/job-state.enum';

export class JobNotFoundException extends Error {
  constructor(public readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = 'JobNotFoundException';
  }
}

export class JobNotCancelableException extends Error {
  constructor(
    public readonly jobId: string,
    public readonly state: JobState,
  ) {
    super(`Job ${jobId} is already ${state} and cannot be canceled`);
    this.name = 'JobNotCancelableException';
  }
}

export class IllegalStateTransitionException extends Error {
  constructor(
    public readonly from: JobState,
    public readonly to: JobState,
  ) {
    super(`Illegal job state transition: ${from} -> ${to}`);
    this.name = 'IllegalStateTransitionException';
  }
}
