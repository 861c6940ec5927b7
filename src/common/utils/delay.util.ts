import { PipelineCanceledException } from '../exceptions/pipeline.exception';

/**
 * Resolves after `ms` milliseconds. Rejects with a
 * {@link PipelineCanceledException} as soon as `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new PipelineCanceledException());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new PipelineCanceledException());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfCanceled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new PipelineCanceledException();
  }
}
