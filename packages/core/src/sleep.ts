import { SearchCancelledError } from './errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** setTimeout-based sleep that rejects with SearchCancelledError when the signal aborts. */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SearchCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SearchCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new SearchCancelledError();
}
