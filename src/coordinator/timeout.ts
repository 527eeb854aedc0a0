/**
 * Deadlines and cancellable waits for stage execution.
 */

import { CancelledError, StageTimeoutError } from "../errors/index.js";

/**
 * Run `task` with its own AbortSignal and a deadline.
 *
 * The task's promise is raced against a timer. When the timer wins, the
 * task's signal is aborted and the returned promise rejects with
 * StageTimeoutError. When `parent` aborts first (coordinator shutdown),
 * the task's signal is aborted and the promise rejects with
 * CancelledError. The timer is always cleared once the race settles.
 */
export function withTimeout<T>(
  stage: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new CancelledError(`Stage "${stage}" cancelled before it started`));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const onParentAbort = () => {
      const error = new CancelledError(`Stage "${stage}" cancelled`);
      clear();
      controller.abort(error);
      reject(error);
    };

    const timer = setTimeout(() => {
      const error = new StageTimeoutError(stage, timeoutMs);
      clear();
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    function clear(): void {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }

    parent?.addEventListener("abort", onParentAbort, { once: true });

    // A late settlement after the race is lost is a no-op on this promise.
    task(controller.signal).then(
      (value) => {
        clear();
        resolve(value);
      },
      (err: unknown) => {
        clear();
        reject(err);
      }
    );
  });
}

/**
 * Wait `ms` milliseconds; rejects with CancelledError if `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError("Wait cancelled"));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError("Wait cancelled"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
