export enum SegmentStatus {
  PENDING = 'pending',
  SUBMITTED = 'submitted',
  POLLING = 'polling',
  DONE = 'done',
  FAILED = 'failed',
}
