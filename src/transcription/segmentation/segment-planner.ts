import { SegmentRange } from '../../common/interfaces/transcription-job.interface';

export interface SegmentPolicy {
  maxDurationSeconds: number;
  maxSizeBytes: number;
}

/**
 * Splits a recording into time ranges that respect the provider limits.
 *
 * Within both limits the whole file is one segment. Otherwise the count is
 * `ceil(max(duration / maxDuration, size / maxSize))` and the duration is cut
 * into equal slices on a millisecond grid, the last slice taking the
 * remainder. Size per slice is only proportional (constant bitrate is
 * assumed), never measured. A slice is never shorter than one millisecond,
 * so very short recordings get fewer slices than their size asks for.
 */
export function planSegments(
  durationSeconds: number,
  sizeBytes: number,
  policy: SegmentPolicy,
): SegmentRange[] {
  const { maxDurationSeconds, maxSizeBytes } = policy;

  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    throw new RangeError(`Invalid duration: ${durationSeconds}`);
  }
  if (!Number.isFinite(sizeBytes) || sizeBytes < 0) {
    throw new RangeError(`Invalid size: ${sizeBytes}`);
  }
  if (!(maxDurationSeconds > 0) || !(maxSizeBytes > 0)) {
    throw new RangeError('Segment limits must be positive');
  }

  if (durationSeconds <= maxDurationSeconds && sizeBytes <= maxSizeBytes) {
    return [{ startOffset: 0, duration: durationSeconds }];
  }

  const totalMs = Math.round(durationSeconds * 1000);
  if (totalMs < 2) {
    throw new RangeError(`Duration too short to split: ${durationSeconds}`);
  }

  const maxMs = Math.floor(maxDurationSeconds * 1000);
  let count = Math.min(
    totalMs,
    Math.ceil(
      Math.max(durationSeconds / maxDurationSeconds, sizeBytes / maxSizeBytes),
    ),
  );

  // The remainder lands on the last slice; one more slice keeps it in bounds
  while (count < totalMs && lastSliceMs(totalMs, count) > maxMs) {
    count += 1;
  }

  const sliceMs = Math.floor(totalMs / count);
  const ranges: SegmentRange[] = [];
  for (let index = 0; index < count; index++) {
    const startMs = index * sliceMs;
    const endMs = index === count - 1 ? totalMs : startMs + sliceMs;
    ranges.push({
      startOffset: startMs / 1000,
      duration: (endMs - startMs) / 1000,
    });
  }

  return ranges;
}

function lastSliceMs(totalMs: number, count: number): number {
  return totalMs - (count - 1) * Math.floor(totalMs / count);
}
