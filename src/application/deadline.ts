import { StageTimeoutError } from '../domain/index.js';

/**
 * Runs `work` with a deadline.
 *
 * On expiry the signal handed to `work` is aborted and the returned
 * promise rejects with StageTimeoutError. Work that ignores the signal
 * keeps running, but its result is discarded.
 */
export async function withDeadline<T>(
  stage: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new StageTimeoutError(stage, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
