import { Test, TestingModule } from '@nestjs/testing';
import { RecognitionClient } from './recognition.client';
import { RECOGNITION_BACKEND } from '../../common/interfaces/recognition-backend.interface';
import { pipelineConfig } from '../../common/config/pipeline.config';
import {
  PipelineCanceledException,
  PollTransientException,
  SubmissionException,
} from '../../common/exceptions/pipeline.exception';
import { PipelineErrorCode } from '../../common/enums/pipeline-error-code.enum';
import { FakeRecognitionBackend } from '../../../test/fakes/fake-recognition.backend';
import { waitFor } from '../../../test/fakes/wait-for';

describe('RecognitionClient', () => {
  let client: RecognitionClient;
  let backend: FakeRecognitionBackend;

  const createClient = async (pollTimeoutSeconds = 1) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RecognitionClient,
        { provide: RECOGNITION_BACKEND, useValue: backend },
        {
          provide: pipelineConfig.KEY,
          useValue: {
            pollIntervalSeconds: 0.005,
            pollTimeoutSeconds,
            maxPollTransientErrors: 2,
          },
        },
      ],
    }).compile();

    return module.get<RecognitionClient>(RecognitionClient);
  };

  beforeEach(async () => {
    backend = new FakeRecognitionBackend();
    client = await createClient();
  });

  describe('submit', () => {
    it('should return the operation handle', async () => {
      await expect(client.submit('jobs/a/segment-000.wav')).resolves.toBe(
        'operations/jobs/a/segment-000.wav',
      );
    });

    it('should wrap unexpected backend errors as submission errors', async () => {
      jest
        .spyOn(backend, 'submit')
        .mockRejectedValue(new Error('quota exceeded'));

      await expect(client.submit('a.wav')).rejects.toThrow(
        new SubmissionException('quota exceeded'),
      );
    });
  });

  describe('poll', () => {
    it('should treat unexpected backend errors as transient', async () => {
      jest.spyOn(backend, 'poll').mockRejectedValue(new Error('socket hang up'));

      await expect(client.poll('operations/a.wav')).rejects.toBeInstanceOf(
        PollTransientException,
      );
    });
  });

  describe('awaitCompletion', () => {
    const signal = () => new AbortController().signal;

    it('should keep polling until the operation completes', async () => {
      backend.script('a.wav', [
        'pending',
        'pending',
        { text: 'hello there', billedSeconds: 15 },
      ]);

      await expect(
        client.awaitCompletion('operations/a.wav', signal()),
      ).resolves.toEqual({
        status: 'done',
        text: 'hello there',
        billedSeconds: 15,
      });
      expect(backend.pollCount('a.wav')).toBe(3);
    });

    it('should report a provider failure as RecognitionFailed', async () => {
      backend.script('a.wav', ['pending', { failed: '[3] bad encoding' }]);

      await expect(
        client.awaitCompletion('operations/a.wav', signal()),
      ).resolves.toEqual({
        status: 'failed',
        code: PipelineErrorCode.RECOGNITION_FAILED,
        reason: '[3] bad encoding',
      });
    });

    it('should time out when the operation never finishes', async () => {
      client = await createClient(0.03);
      backend.script('a.wav', ['pending']);

      await expect(
        client.awaitCompletion('operations/a.wav', signal()),
      ).resolves.toEqual({
        status: 'failed',
        code: PipelineErrorCode.TIMEOUT,
        reason: 'Recognition timed out after 0.03 seconds',
      });
      expect(backend.pollCount('a.wav')).toBeGreaterThan(1);
    });

    it('should retry transient errors up to the limit', async () => {
      backend.script('a.wav', ['transient', 'transient', { text: 'ok' }]);

      await expect(
        client.awaitCompletion('operations/a.wav', signal()),
      ).resolves.toEqual({ status: 'done', text: 'ok', billedSeconds: null });
    });

    it('should reset the transient error count after a good poll', async () => {
      backend.script('a.wav', [
        'transient',
        'transient',
        'pending',
        'transient',
        'transient',
        { text: 'ok' },
      ]);

      await expect(
        client.awaitCompletion('operations/a.wav', signal()),
      ).resolves.toEqual({ status: 'done', text: 'ok', billedSeconds: null });
    });

    it('should give up after too many consecutive transient errors', async () => {
      backend.script('a.wav', ['transient']);

      await expect(
        client.awaitCompletion('operations/a.wav', signal()),
      ).resolves.toEqual({
        status: 'failed',
        code: PipelineErrorCode.TIMEOUT,
        reason: 'Polling abandoned after 3 consecutive transient errors',
      });
      expect(backend.pollCount('a.wav')).toBe(3);
    });

    it('should cancel the remote operation when aborted', async () => {
      const controller = new AbortController();
      backend.script('a.wav', ['pending']);

      const outcome = client.awaitCompletion(
        'operations/a.wav',
        controller.signal,
      );
      await waitFor(() => backend.pollCount('a.wav') >= 2);
      controller.abort();

      await expect(outcome).rejects.toBeInstanceOf(PipelineCanceledException);
      expect(backend.canceled).toEqual(['operations/a.wav']);
    });

    it('should not poll at all when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        client.awaitCompletion('operations/a.wav', controller.signal),
      ).rejects.toBeInstanceOf(PipelineCanceledException);
      expect(backend.polled).toEqual([]);
    });
  });

  describe('cancel', () => {
    it('should ignore remote cancel failures', async () => {
      jest.spyOn(backend, 'cancel').mockRejectedValue(new Error('not found'));

      await expect(client.cancel('operations/a.wav')).resolves.toBeUndefined();
    });
  });
});
