import type { Logger } from '../logging/logger.js';
import { ExecutionTimeoutError, describeCause } from '../exception/errors.js';

/**
 * Races `work` against a deadline. On expiry the signal handed to `work` is
 * aborted with an ExecutionTimeoutError and the same error is thrown; the
 * abandoned work is left to settle once the caller tears down the session.
 */
export async function runWithDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  logger: Logger,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new ExecutionTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  const task = work(controller.signal);

  try {
    return await Promise.race([task, expired]);
  } finally {
    clearTimeout(timer);
    if (controller.signal.aborted) {
      task.catch((error: unknown) => {
        logger.debug({ error: describeCause(error) }, 'Abandoned work settled after deadline');
      });
    }
  }
}
