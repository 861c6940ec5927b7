export type RecognitionPollResult =
  | { status: 'pending' }
  | { status: 'complete'; text: string; billedSeconds: number | null }
  | { status: 'failed'; reason: string };

/**
 * Remote long-running speech recognition. `submit` must throw a
 * SubmissionException when the request is rejected; `poll` must throw a
 * PollTransientException when the operation state could not be read.
 */
export interface IRecognitionBackend {
  submit(audioRef: string): Promise<string>;

  poll(operationHandle: string): Promise<RecognitionPollResult>;

  cancel(operationHandle: string): Promise<void>;
}

export const RECOGNITION_BACKEND = 'RECOGNITION_BACKEND';
