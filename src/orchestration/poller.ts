import { isFatal } from './errors';

export type Predicate = () => boolean | Promise<boolean>;

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  signal?: AbortSignal;
  /** Called after every unsatisfied attempt. */
  onAttempt?: (attempt: number, error?: unknown) => void;
}

export interface PollResult {
  satisfied: boolean;
  attempts: number;
  cancelled: boolean;
  elapsedMs: number;
  lastError?: unknown;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Evaluates `predicate` up to `maxAttempts` times with a fixed pause of
 * `intervalMs` between attempts. A thrown predicate counts as "not yet",
 * except for FatalError which is rethrown.
 */
export async function waitUntil(predicate: Predicate, options: PollOptions): Promise<PollResult> {
  const { intervalMs, maxAttempts, signal, onAttempt } = options;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  if (!Number.isFinite(intervalMs) || intervalMs < 0) {
    throw new RangeError(`intervalMs must be a non-negative number, got ${intervalMs}`);
  }

  const startedAt = Date.now();
  let attempts = 0;
  let lastError: unknown;

  const finish = (satisfied: boolean, cancelled: boolean): PollResult => ({
    satisfied,
    attempts,
    cancelled,
    elapsedMs: Date.now() - startedAt,
    ...(lastError === undefined ? {} : { lastError })
  });

  while (attempts < maxAttempts) {
    if (signal?.aborted) {
      return finish(false, true);
    }

    attempts++;
    try {
      if (await predicate()) {
        lastError = undefined;
        return finish(true, false);
      }
      lastError = undefined;
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      lastError = error;
    }

    onAttempt?.(attempts, lastError);

    if (attempts < maxAttempts) {
      await sleep(intervalMs, signal);
    }
  }

  return finish(false, signal?.aborted ?? false);
}
