export class RateLimiter {
  private last = 0;

  constructor(private readonly minIntervalMs = 150) {}

  async wait(signal?: AbortSignal): Promise<void> {
    const elapsed = Date.now() - this.last;
    if (elapsed < this.minIntervalMs) {
      await pause(this.minIntervalMs - elapsed, signal);
    }
    this.last = Date.now();
  }
}

export const pause = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
