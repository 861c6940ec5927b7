import { aggregateTranscript } from './transcript-aggregator';
import { SegmentStatus } from '../../common/enums/segment-status.enum';
import { JobSegment } from '../../common/interfaces/transcription-job.interface';

function segment(
  index: number,
  overrides: Partial<JobSegment> = {},
): JobSegment {
  return {
    index,
    startOffset: index * 60,
    duration: 60,
    status: SegmentStatus.DONE,
    transcodedRef: null,
    recognitionHandle: `operations/${index}`,
    text: `part ${index}`,
    billedSeconds: 60,
    error: null,
    ...overrides,
  };
}

describe('aggregateTranscript', () => {
  it('should emit text in index order regardless of completion order', () => {
    const completedInOrder = [segment(2), segment(0), segment(1)];

    const result = aggregateTranscript(completedInOrder, 0.01);

    expect(result.text).toBe('part 0\npart 1\npart 2');
    expect(result.partial).toBe(false);
    expect(result.failedSegments).toEqual([]);
    expect(result.segmentCount).toBe(3);
  });

  it('should skip failed segments and list them', () => {
    const result = aggregateTranscript(
      [
        segment(0),
        segment(1, {
          status: SegmentStatus.FAILED,
          text: null,
          billedSeconds: null,
        }),
        segment(2),
      ],
      0.01,
    );

    expect(result.text).toBe('part 0\npart 2');
    expect(result.partial).toBe(true);
    expect(result.failedSegments).toEqual([1]);
  });

  it('should bill reported seconds and fall back to the segment duration', () => {
    const result = aggregateTranscript(
      [segment(0, { billedSeconds: 45 }), segment(1, { billedSeconds: null })],
      0.002,
    );

    expect(result.billedSeconds).toBe(105);
    expect(result.costEstimate).toBeCloseTo(0.21, 10);
  });

  it('should not bill failed segments', () => {
    const result = aggregateTranscript(
      [segment(0, { status: SegmentStatus.FAILED, billedSeconds: 60 })],
      1,
    );

    expect(result.billedSeconds).toBe(0);
    expect(result.costEstimate).toBe(0);
    expect(result.text).toBe('');
  });

  it('should not reorder the input array', () => {
    const input = [segment(1), segment(0)];

    aggregateTranscript(input, 0);

    expect(input.map((s) => s.index)).toEqual([1, 0]);
  });
});
