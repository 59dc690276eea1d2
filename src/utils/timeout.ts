// src/utils/timeout.ts
import { PipelineAbortedError, TimeoutError } from '../core/errors';

/**
 * Runs a task under a timeout. The task receives a signal that is aborted
 * when the timeout fires or when the parent signal aborts, so the underlying
 * request is abandoned rather than left running.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new PipelineAbortedError(`Aborted before ${label}`));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const cleanup = () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    };

    const onAbort = () => {
      cleanup();
      controller.abort();
      reject(new PipelineAbortedError(`Aborted during ${label}`));
    };

    timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    parent?.addEventListener('abort', onAbort, { once: true });

    task(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

/**
 * Signal that aborts when any of the given signals aborts or after `timeoutMs`.
 * Call `dispose` once the work is done to release the timer and listeners.
 */
export function linkedSignal(
  timeoutMs: number,
  ...parents: Array<AbortSignal | undefined>
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort();

  const timer = setTimeout(abort, timeoutMs);
  timer.unref();

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort();
      break;
    }
    parent.addEventListener('abort', abort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      for (const parent of parents) {
        parent?.removeEventListener('abort', abort);
      }
    },
  };
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof PipelineAbortedError ||
    (error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError'))
  );
}
