export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export class AbortedError extends Error {
  constructor(readonly reason: unknown) {
    super('Operation aborted');
    this.name = 'AbortedError';
  }
}

/**
 * Resolve after `ms`, or reject with `AbortedError` as soon as `signal` fires.
 */
export const sleep: Sleeper = (ms, signal) => {
  if (signal?.aborted) return Promise.reject(new AbortedError(signal.reason));
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new AbortedError(signal.reason);
}
