export enum PipelineErrorCode {
  UNREADABLE_MEDIA = 'UnreadableMedia',
  TRANSCODE_ERROR = 'TranscodeError',
  SUBMISSION_ERROR = 'SubmissionError',
  POLL_TRANSIENT_ERROR = 'PollTransientError',
  TIMEOUT = 'Timeout',
  RECOGNITION_FAILED = 'RecognitionFailed',
  ALL_SEGMENTS_FAILED = 'AllSegmentsFailed',
  CANCELED = 'Canceled',
  INTERRUPTED = 'Interrupted',
  INTERNAL_ERROR = 'InternalError',
}

// Job-level messages sent across the submission boundary. Provider output
// stays on the segment records.
export const PIPELINE_ERROR_MESSAGES: Record<PipelineErrorCode, string> = {
  [PipelineErrorCode.UNREADABLE_MEDIA]:
    'The uploaded file could not be read as audio or video.',
  [PipelineErrorCode.TRANSCODE_ERROR]:
    'The audio track could not be converted for recognition.',
  [PipelineErrorCode.SUBMISSION_ERROR]:
    'The recognition service rejected the audio.',
  [PipelineErrorCode.POLL_TRANSIENT_ERROR]:
    'The recognition service was temporarily unreachable.',
  [PipelineErrorCode.TIMEOUT]: 'Speech recognition took too long.',
  [PipelineErrorCode.RECOGNITION_FAILED]:
    'The recognition service could not process the audio.',
  [PipelineErrorCode.ALL_SEGMENTS_FAILED]:
    'No part of the recording could be transcribed.',
  [PipelineErrorCode.CANCELED]: 'The job was canceled.',
  [PipelineErrorCode.INTERRUPTED]:
    'Processing was interrupted by a service restart. Please resubmit the file.',
  [PipelineErrorCode.INTERNAL_ERROR]: 'Processing failed unexpectedly.',
};
