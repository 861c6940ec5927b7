import {
  PipelineError,
  TranscriptionJob,
  TranscriptResult,
} from '../../common/interfaces/transcription-job.interface';
import { JobState } from '../../common/enums/job-state.enum';
import { SegmentStatus } from '../../common/enums/segment-status.enum';

export interface JobSegmentView {
  index: number;
  startOffset: number;
  duration: number;
  status: SegmentStatus;
}

/**
 * What callers see of a job. Storage refs, operation handles and
 * per-segment error detail stay internal.
 */
export interface JobView {
  id: string;
  owner: string;
  originalName: string | null;
  state: JobState;
  durationSeconds: number | null;
  segments: JobSegmentView[];
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  error: PipelineError | null;
  result: TranscriptResult | null;
}

export function toJobView(job: TranscriptionJob): JobView {
  return {
    id: job.id,
    owner: job.owner,
    originalName: job.originalName,
    state: job.state,
    durationSeconds: job.media?.durationSeconds ?? null,
    segments: job.segments.map((segment) => ({
      index: segment.index,
      startOffset: segment.startOffset,
      duration: segment.duration,
      status: segment.status,
    })),
    createdAt: job.createdAt,
    startedAt: job.startedAt,
    finishedAt: job.finishedAt,
    error: job.error,
    result: job.result,
  };
}
