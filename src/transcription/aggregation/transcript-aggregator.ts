import { SegmentStatus } from '../../common/enums/segment-status.enum';
import {
  JobSegment,
  TranscriptResult,
} from '../../common/interfaces/transcription-job.interface';

export const TRANSCRIPT_SEPARATOR = '\n';

/**
 * Joins the recognized text in index order, whatever order the segments
 * finished in. Segments that are not `Done` are left out and listed in
 * `failedSegments`.
 */
export function aggregateTranscript(
  segments: readonly JobSegment[],
  costPerSecond: number,
): TranscriptResult {
  const ordered = [...segments].sort((a, b) => a.index - b.index);
  const done = ordered.filter((s) => s.status === SegmentStatus.DONE);
  const failedSegments = ordered
    .filter((s) => s.status !== SegmentStatus.DONE)
    .map((s) => s.index);

  const billedSeconds = done.reduce(
    (sum, segment) => sum + (segment.billedSeconds ?? segment.duration),
    0,
  );

  return {
    text: done.map((s) => s.text ?? '').join(TRANSCRIPT_SEPARATOR),
    billedSeconds,
    costEstimate: billedSeconds * costPerSecond,
    segmentCount: ordered.length,
    partial: failedSegments.length > 0,
    failedSegments,
  };
}
