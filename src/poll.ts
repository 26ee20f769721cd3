import { setTimeout as sleep } from 'timers/promises';

export type PollOutcome<T> =
  | { state: 'succeeded'; value: T; attempts: number }
  | { state: 'failed'; value: T; attempts: number }
  | { state: 'timed-out'; value: T | undefined; attempts: number };

export interface PollSettings {
  intervalMs: number;
  /** Omit for no ceiling. */
  maxAttempts?: number;
  signal?: AbortSignal;
}

export interface PollOptions<T> extends PollSettings {
  check: () => Promise<T>;
  isSucceeded: (value: T) => boolean;
  isFailed: (value: T) => boolean;
  onPending?: (value: T, attempt: number) => void;
}

/**
 * Calls `check` until its value is terminal, sleeping `intervalMs` between
 * checks. Never sleeps after the last allowed attempt.
 */
export async function pollUntil<T>(
  options: PollOptions<T>,
): Promise<PollOutcome<T>> {
  const { check, isSucceeded, isFailed, intervalMs, maxAttempts, signal } =
    options;
  let last: T | undefined;
  let attempt = 0;

  while (maxAttempts === undefined || attempt < maxAttempts) {
    if (signal?.aborted) {
      throw new Error('PollAborted');
    }

    attempt += 1;
    const value = await check();
    last = value;

    if (isSucceeded(value)) {
      return { state: 'succeeded', value, attempts: attempt };
    }

    if (isFailed(value)) {
      return { state: 'failed', value, attempts: attempt };
    }

    if (options.onPending) {
      options.onPending(value, attempt);
    }

    if (maxAttempts === undefined || attempt < maxAttempts) {
      await sleep(intervalMs, undefined, { signal }).catch(error => {
        if (signal?.aborted) {
          throw new Error('PollAborted');
        }

        throw error;
      });
    }
  }

  return { state: 'timed-out', value: last, attempts: attempt };
}
