import { CancelledError } from "../../core/bulk/errors";

export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new CancelledError({ message: "Operation cancelled", cause: signal.reason });
  }
};

/**
 * setTimeout as a promise that rejects with CancelledError when `signal` aborts.
 * The timer and the abort listener are always cleaned up.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError({ message: "Operation cancelled", cause: signal.reason }));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError({ message: "Operation cancelled", cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
