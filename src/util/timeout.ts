import {
  InvalidArgumentError,
  UpstreamError,
  describeError,
  statusOf,
} from "../errors/error.js";

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

function abortedByCaller(operation: string) {
  return new UpstreamError(
    "aborted",
    operation,
    `${operation}: aborted by caller`,
  );
}

export function assertTimeoutMs(name: string, ms: number): void {
  if (!Number.isInteger(ms) || ms <= 0 || ms > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(
      `${name} must be an integer between 1 and ${MAX_TIMEOUT_MS}, got ${ms}`,
    );
  }
}

/**
 * Runs an external call with a deadline. The task receives a signal that
 * aborts on timeout or when `parent` aborts; either way the returned promise
 * rejects with an {@link UpstreamError} and the timer is always cleared.
 */
export function withTimeout<T>(
  operation: string,
  ms: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(abortedByCaller(operation));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      fn();
    };

    const timer = setTimeout(() => {
      controller.abort();
      settle(() =>
        reject(
          new UpstreamError(
            "timeout",
            operation,
            `${operation}: timeout after ${ms}ms`,
          ),
        ),
      );
    }, ms);

    const onParentAbort = () => {
      controller.abort();
      settle(() => reject(abortedByCaller(operation)));
    };
    parent?.addEventListener("abort", onParentAbort, { once: true });

    Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        (v) => settle(() => resolve(v)),
        (e: unknown) =>
          settle(() =>
            reject(
              e instanceof UpstreamError
                ? e
                : new UpstreamError(
                    "failure",
                    operation,
                    `${operation}: ${describeError(e)}`,
                    { cause: e, status: statusOf(e) },
                  ),
            ),
          ),
      );
  });
}

/**
 * Waits on a shared promise without tying its lifetime to the caller:
 * aborting `signal` rejects this wait only.
 */
export function abandonable<T>(
  operation: string,
  shared: Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  if (!signal) return shared;
  if (signal.aborted) {
    return Promise.reject(abortedByCaller(operation));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortedByCaller(operation));
    signal.addEventListener("abort", onAbort, { once: true });
    shared.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      },
    );
  });
}
