import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  IRecognitionBackend,
  RECOGNITION_BACKEND,
  RecognitionPollResult,
} from '../../common/interfaces/recognition-backend.interface';
import {
  PipelineConfig,
  pipelineConfig,
} from '../../common/config/pipeline.config';
import {
  PipelineCanceledException,
  PollTransientException,
  SubmissionException,
} from '../../common/exceptions/pipeline.exception';
import { PipelineErrorCode } from '../../common/enums/pipeline-error-code.enum';
import { delay, throwIfCanceled } from '../../common/utils/delay.util';
import { getErrorMessage } from '../../common/utils/error.utils';

export type RecognitionOutcome =
  | { status: 'done'; text: string; billedSeconds: number | null }
  | {
      status: 'failed';
      code: PipelineErrorCode.TIMEOUT | PipelineErrorCode.RECOGNITION_FAILED;
      reason: string;
    };

/**
 * Drives one remote recognition operation from submission to a final
 * outcome: polls at a fixed interval, retries transient poll errors a
 * bounded number of times and gives up once the wall-clock budget is spent.
 */
@Injectable()
export class RecognitionClient {
  private readonly logger = new Logger(RecognitionClient.name);

  constructor(
    @Inject(RECOGNITION_BACKEND)
    private readonly backend: IRecognitionBackend,
    @Inject(pipelineConfig.KEY) private readonly config: PipelineConfig,
  ) {}

  async submit(audioRef: string): Promise<string> {
    try {
      return await this.backend.submit(audioRef);
    } catch (error) {
      if (error instanceof SubmissionException) {
        throw error;
      }
      throw new SubmissionException(getErrorMessage(error), error);
    }
  }

  async poll(operationHandle: string): Promise<RecognitionPollResult> {
    try {
      return await this.backend.poll(operationHandle);
    } catch (error) {
      if (error instanceof PollTransientException) {
        throw error;
      }
      throw new PollTransientException(getErrorMessage(error), error);
    }
  }

  async awaitCompletion(
    operationHandle: string,
    signal: AbortSignal,
  ): Promise<RecognitionOutcome> {
    const intervalMs = this.config.pollIntervalSeconds * 1000;
    const timeoutMs = this.config.pollTimeoutSeconds * 1000;
    const startedAt = Date.now();
    let transientErrors = 0;

    try {
      for (;;) {
        throwIfCanceled(signal);

        let result: RecognitionPollResult | null = null;
        try {
          result = await this.poll(operationHandle);
          transientErrors = 0;
        } catch (error) {
          if (!(error instanceof PollTransientException)) {
            throw error;
          }
          transientErrors += 1;
          this.logger.warn(
            `Transient poll error ${transientErrors}/${this.config.maxPollTransientErrors} for ${operationHandle}: ${error.message}`,
          );
          if (transientErrors > this.config.maxPollTransientErrors) {
            return {
              status: 'failed',
              code: PipelineErrorCode.TIMEOUT,
              reason: `Polling abandoned after ${transientErrors} consecutive transient errors`,
            };
          }
        }

        throwIfCanceled(signal);

        if (result?.status === 'complete') {
          return {
            status: 'done',
            text: result.text,
            billedSeconds: result.billedSeconds,
          };
        }
        if (result?.status === 'failed') {
          return {
            status: 'failed',
            code: PipelineErrorCode.RECOGNITION_FAILED,
            reason: result.reason,
          };
        }

        if (Date.now() - startedAt >= timeoutMs) {
          return {
            status: 'failed',
            code: PipelineErrorCode.TIMEOUT,
            reason: `Recognition timed out after ${this.config.pollTimeoutSeconds} seconds`,
          };
        }

        this.logger.debug(`Operation ${operationHandle} still running`);
        await delay(intervalMs, signal);
      }
    } catch (error) {
      if (error instanceof PipelineCanceledException) {
        await this.cancel(operationHandle);
      }
      throw error;
    }
  }

  /** Best effort: the remote side may already have finished or may ignore it. */
  async cancel(operationHandle: string): Promise<void> {
    try {
      await this.backend.cancel(operationHandle);
    } catch (error) {
      this.logger.warn(
        `Remote cancel failed for ${operationHandle}: ${getErrorMessage(error)}`,
      );
    }
  }
}
