import type { Clock } from '../types';

export const systemClock: Clock = {
  now: () => new Date(),
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * ⏱️ Races `operation` against a timer. On timeout the signal handed to
 * `operation` is aborted and the error produced by `onTimeout` rejects the
 * returned promise. The timer is always cleared.
 */
export const withTimeout = async <T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

/** Formats a duration the way every response reports it, e.g. `1.23s`. */
export const formatExecutionTime = (ms: number): string => `${(Math.max(0, ms) / 1000).toFixed(2)}s`;
