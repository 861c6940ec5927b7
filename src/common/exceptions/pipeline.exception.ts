import { PipelineErrorCode } from '../enums/pipeline-error-code.enum';

/**
 * Base class for failures that the pipeline records with a reason code.
 * `message` is internal detail; callers across the submission boundary only
 * ever see the code and its fixed description.
 */
export abstract class PipelineException extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnreadableMediaException extends PipelineException {
  readonly code = PipelineErrorCode.UNREADABLE_MEDIA;
}

export class TranscodeException extends PipelineException {
  readonly code = PipelineErrorCode.TRANSCODE_ERROR;
}

export class SubmissionException extends PipelineException {
  readonly code = PipelineErrorCode.SUBMISSION_ERROR;
}

export class PollTransientException extends PipelineException {
  readonly code = PipelineErrorCode.POLL_TRANSIENT_ERROR;
}

export class PipelineCanceledException extends PipelineException {
  readonly code = PipelineErrorCode.CANCELED;

  constructor(message = 'Operation canceled') {
    super(message);
  }
}
