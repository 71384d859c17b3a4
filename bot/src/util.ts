import { logger } from '@vibingway/logger';
import { TimeoutError } from './errors.js';

/**
 * Race `p` against a deadline. Rejects with a TimeoutError when the deadline
 * passes first; the timer is always cleared.
 */
export async function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      logger.error({ label, timeoutMs: ms }, 'op timed out');
      reject(new TimeoutError(label, ms));
    }, ms);
  });

  try {
    return await Promise.race([p, timeoutPromise]);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  }
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
