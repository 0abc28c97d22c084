/**
 * Deadline handling for repository calls
 */

import { TimeoutError } from './errors';

export interface CallOptions {
  deadlineMs?: number; // relative budget for this call
  signal?: AbortSignal;
}

/**
 * Race the work against a deadline. The work itself is not cancelled: other
 * callers sharing it still get its result. Only this caller is released.
 */
export function withDeadline<T>(
  work: Promise<T>,
  deadlineMs: number | undefined,
  operation: string,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new TimeoutError(`${operation} aborted before start`, { operation }));
  }
  if (deadlineMs === undefined && !signal) {
    return work;
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (): void => {
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    const onAbort = (): void => {
      if (settled) return;
      finish();
      reject(new TimeoutError(`${operation} aborted`, { operation }));
    };

    if (deadlineMs !== undefined) {
      timer = setTimeout(() => {
        if (settled) return;
        finish();
        reject(new TimeoutError(`${operation} exceeded deadline of ${deadlineMs}ms`, { operation, deadlineMs }));
      }, deadlineMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    work.then(
      value => {
        if (settled) return;
        finish();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        finish();
        reject(error);
      }
    );
  });
}
