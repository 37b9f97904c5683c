import { AutomationError, OperationCancelledError } from '../core/errors';
import { pause } from './rateLimiter';

export interface WaitOptions {
  timeoutMs: number;
  intervalMs?: number;
  signal?: AbortSignal;
}

export class WaitTimeoutError extends AutomationError {
  readonly timeoutMs: number;

  constructor(description: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${description}`);
    this.name = 'WaitTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) throw new OperationCancelledError('Operation cancelled', { cause: signal.reason });
};

/**
 * Polls `probe` until it yields a truthy value or the deadline passes.
 * The probe always runs at least once, even with a zero timeout.
 */
export const pollUntil = async <T>(
  probe: () => Promise<T | false | null | undefined>,
  { timeoutMs, intervalMs = 250, signal }: WaitOptions,
): Promise<T | undefined> => {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    throwIfAborted(signal);
    const result = await probe();
    if (result) return result;

    const remaining = deadline - Date.now();
    if (remaining <= 0) return undefined;
    try {
      await pause(Math.min(intervalMs, remaining), signal);
    } catch (error) {
      throw new OperationCancelledError('Wait aborted', { cause: error });
    }
  }
};

export const waitUntil = async (condition: () => Promise<boolean>, description: string, options: WaitOptions): Promise<void> => {
  const satisfied = await pollUntil(condition, options);
  if (!satisfied) throw new WaitTimeoutError(description, options.timeoutMs);
};

/** Heuristic wait: resolves false instead of throwing when the deadline passes. */
export const settle = async (condition: () => Promise<boolean>, options: WaitOptions): Promise<boolean> =>
  (await pollUntil(condition, options)) === true;
