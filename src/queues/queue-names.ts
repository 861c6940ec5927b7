export const JOB_EVENTS_QUEUE = 'job-events';
export const ANALYSIS_QUEUE = 'analysis';

export const JOB_STATE_CHANGED = 'job-state-changed';
export const JOB_RUNNING_LONG = 'job-running-long';
export const ANALYZE_TRANSCRIPT = 'analyze-transcript';
