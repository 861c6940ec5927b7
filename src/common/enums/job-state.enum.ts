export enum JobState {
  QUEUED = 'queued',
  PROBING = 'probing',
  SEGMENTING = 'segmenting',
  TRANSCODING = 'transcoding',
  RECOGNIZING = 'recognizing',
  AGGREGATING = 'aggregating',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  CANCELED = 'canceled',
}

export const TERMINAL_JOB_STATES: readonly JobState[] = [
  JobState.SUCCEEDED,
  JobState.FAILED,
  JobState.CANCELED,
];

export function isTerminalJobState(state: JobState): boolean {
  return TERMINAL_JOB_STATES.includes(state);
}
