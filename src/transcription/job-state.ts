import {
  isTerminalJobState,
  JobState,
} from '../common/enums/job-state.enum';
import { IllegalStateTransitionException } from '../common/exceptions/job.exception';

const PROGRESSION: readonly JobState[] = [
  JobState.QUEUED,
  JobState.PROBING,
  JobState.SEGMENTING,
  JobState.TRANSCODING,
  JobState.RECOGNIZING,
  JobState.AGGREGATING,
  JobState.SUCCEEDED,
];

/**
 * Progress only moves forward; Failed and Canceled can end any job that has
 * not finished yet. Terminal states are final.
 */
export function canTransition(from: JobState, to: JobState): boolean {
  if (isTerminalJobState(from)) {
    return false;
  }
  if (to === JobState.FAILED || to === JobState.CANCELED) {
    return true;
  }
  return PROGRESSION.indexOf(to) > PROGRESSION.indexOf(from);
}

export function assertTransition(from: JobState, to: JobState): void {
  if (!canTransition(from, to)) {
    throw new IllegalStateTransitionException(from, to);
  }
}
