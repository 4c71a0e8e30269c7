import { DeadlineExceededError, OperationAbortedError } from "../errors";

export interface CallOptions {
  /**
   * Upper bound for the call. Omitted or non-positive means no deadline.
   */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Settles with `operation`, or rejects with DeadlineExceededError once `timeoutMs`
 * elapses, or with OperationAbortedError when `signal` aborts first.
 */
export function withDeadline<T>(
  label: string,
  operation: () => Promise<T>,
  { timeoutMs, signal }: CallOptions = {}
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new OperationAbortedError(label, signal.reason));
  }
  const limit = timeoutMs !== undefined && timeoutMs > 0 ? timeoutMs : undefined;
  if (limit === undefined && !signal) {
    return operation();
  }

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      cleanup();
      reject(new OperationAbortedError(label, signal?.reason));
    };
    const cleanup = () => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };

    if (limit !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        reject(new DeadlineExceededError(label, limit));
      }, limit);
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    operation().then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}
