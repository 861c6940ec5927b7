import { JobState } from '../enums/job-state.enum';
import { PipelineErrorCode } from '../enums/pipeline-error-code.enum';
import { SegmentStatus } from '../enums/segment-status.enum';

export interface PipelineError {
  code: PipelineErrorCode;
  message: string;
}

export interface MediaInfo {
  durationSeconds: number;
  sizeBytes: number;
  hasVideoTrack: boolean;
  formatName?: string;
}

export interface SegmentRange {
  startOffset: number;
  duration: number;
}

export interface JobSegment extends SegmentRange {
  index: number;
  status: SegmentStatus;
  transcodedRef: string | null;
  recognitionHandle: string | null;
  text: string | null;
  billedSeconds: number | null;
  error: PipelineError | null;
}

export interface TranscriptResult {
  text: string;
  billedSeconds: number;
  costEstimate: number;
  segmentCount: number;
  /** True whenever at least one segment is missing from `text`. */
  partial: boolean;
  failedSegments: number[];
}

export interface TranscriptionJob {
  id: string;
  owner: string;
  sourceRef: string;
  originalName: string | null;
  state: JobState;
  segments: JobSegment[];
  media: MediaInfo | null;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  error: PipelineError | null;
  result: TranscriptResult | null;
}

export interface SubmitJobData {
  owner: string;
  sourceRef: string;
  originalName?: string;
}

export interface JobStateChangedEvent {
  jobId: string;
  owner: string;
  state: JobState;
  occurredAt: string;
  segments: {
    total: number;
    done: number;
    failed: number;
  };
  error?: PipelineError;
  result?: TranscriptResult;
}

export interface JobRunningLongEvent {
  jobId: string;
  owner: string;
  state: JobState;
  occurredAt: string;
  elapsedSeconds: number;
  expectedSeconds: number;
}

export type JobEvent = JobStateChangedEvent | JobRunningLongEvent;

export interface SlowRunNotice {
  elapsedSeconds: number;
  expectedSeconds: number;
}

export interface AnalysisJobData {
  jobId: string;
  owner: string;
  transcript: string;
  partial: boolean;
}
