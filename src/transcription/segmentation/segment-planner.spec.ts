import { planSegments, SegmentPolicy } from './segment-planner';

const FOUR_HOURS = 14400;
const ONE_GB = 1_073_741_824;
const policy: SegmentPolicy = {
  maxDurationSeconds: FOUR_HOURS,
  maxSizeBytes: ONE_GB,
};

describe('planSegments', () => {
  it('should return the whole file when both limits are met', () => {
    expect(planSegments(3599.75, 52_000_000, policy)).toEqual([
      { startOffset: 0, duration: 3599.75 },
    ]);
  });

  it('should treat values equal to the limits as within limits', () => {
    expect(planSegments(FOUR_HOURS, ONE_GB, policy)).toEqual([
      { startOffset: 0, duration: FOUR_HOURS },
    ]);
  });

  it('should split a five hour recording into two halves', () => {
    expect(planSegments(18000, 500 * 1024 * 1024, policy)).toEqual([
      { startOffset: 0, duration: 9000 },
      { startOffset: 9000, duration: 9000 },
    ]);
  });

  it('should split by size when only the size limit is exceeded', () => {
    expect(planSegments(3600, 3 * ONE_GB, policy)).toEqual([
      { startOffset: 0, duration: 1200 },
      { startOffset: 1200, duration: 1200 },
      { startOffset: 2400, duration: 1200 },
    ]);
  });

  it('should use the larger of the two ratios', () => {
    // duration ratio 1.25, size ratio 2.5 -> 3 segments
    const ranges = planSegments(18000, 2.5 * ONE_GB, policy);

    expect(ranges).toHaveLength(3);
    expect(ranges.map((r) => r.duration)).toEqual([6000, 6000, 6000]);
  });

  it('should give the rounding remainder to the last slice', () => {
    const ranges = planSegments(10, 1, {
      maxDurationSeconds: 4,
      maxSizeBytes: 100,
    });

    expect(ranges).toEqual([
      { startOffset: 0, duration: 3.333 },
      { startOffset: 3.333, duration: 3.333 },
      { startOffset: 6.666, duration: 3.334 },
    ]);
  });

  it('should add a slice when the remainder would break the duration limit', () => {
    // 3 slices of 3.999s would leave 4.001s for the last one
    const ranges = planSegments(11.999, 1, {
      maxDurationSeconds: 4,
      maxSizeBytes: 100,
    });

    expect(ranges).toEqual([
      { startOffset: 0, duration: 2.999 },
      { startOffset: 2.999, duration: 2.999 },
      { startOffset: 5.998, duration: 2.999 },
      { startOffset: 8.997, duration: 3.002 },
    ]);
  });

  it.each([
    [18000, 10],
    [86399.9, 3 * ONE_GB],
    [14400.001, 1],
    [601, 17 * ONE_GB],
  ])(
    'should cover %p seconds contiguously within the limit',
    (duration, size) => {
      const ranges = planSegments(duration, size, policy);
      const toMs = (seconds: number) => Math.round(seconds * 1000);

      expect(ranges.length).toBeGreaterThan(1);
      expect(ranges[0].startOffset).toBe(0);
      ranges.forEach((range, index) => {
        expect(range.duration).toBeGreaterThan(0);
        expect(range.duration).toBeLessThanOrEqual(FOUR_HOURS);
        if (index > 0) {
          const previous = ranges[index - 1];
          expect(toMs(range.startOffset)).toBe(
            toMs(previous.startOffset + previous.duration),
          );
        }
      });
      const last = ranges[ranges.length - 1];
      expect(toMs(last.startOffset + last.duration)).toBe(toMs(duration));
    },
  );

  it('should never plan an empty slice for a tiny oversized file', () => {
    const ranges = planSegments(0.004, 10_000, {
      maxDurationSeconds: 100,
      maxSizeBytes: 1000,
    });

    expect(ranges).toEqual([
      { startOffset: 0, duration: 0.001 },
      { startOffset: 0.001, duration: 0.001 },
      { startOffset: 0.002, duration: 0.001 },
      { startOffset: 0.003, duration: 0.001 },
    ]);
  });

  it('should refuse to split a file shorter than two milliseconds', () => {
    expect(() =>
      planSegments(0.0012, 10_000, {
        maxDurationSeconds: 100,
        maxSizeBytes: 1000,
      }),
    ).toThrow('Duration too short to split: 0.0012');
  });

  it('should reject a non-positive duration', () => {
    expect(() => planSegments(0, 10, policy)).toThrow(RangeError);
    expect(() => planSegments(Number.NaN, 10, policy)).toThrow(
      'Invalid duration: NaN',
    );
  });

  it('should reject non-positive limits', () => {
    expect(() =>
      planSegments(10, 10, { maxDurationSeconds: 0, maxSizeBytes: 10 }),
    ).toThrow('Segment limits must be positive');
  });
});
