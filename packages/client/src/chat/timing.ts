export type Timer = {
  promise: Promise<void>;
  cancel: () => void;
};

/**
 * Resolves after `ms`, or as soon as `signal` aborts. `cancel` clears the
 * pending timeout and the abort listener without resolving.
 */
export const startTimer = (ms: number, signal?: AbortSignal): Timer => {
  let release = () => {};
  const promise = new Promise<void>((resolve) => {
    const finish = () => {
      release();
      resolve();
    };
    const handle = setTimeout(finish, Math.max(0, ms));
    release = () => {
      clearTimeout(handle);
      signal?.removeEventListener("abort", finish);
    };
    if (signal?.aborted) {
      finish();
      return;
    }
    signal?.addEventListener("abort", finish, { once: true });
  });
  return { promise, cancel: () => release() };
};

export const sleep = (ms: number, signal?: AbortSignal) => startTimer(ms, signal).promise;

export const reconnectDelay = (attempt: number, baseMs: number, maxMs: number) =>
  Math.min(maxMs, baseMs * 2 ** attempt);

/**
 * Settle with `work`, or reject with `onAbort()` as soon as `signal` aborts.
 * `work` keeps running after an abort; its outcome is then ignored.
 */
export const untilAborted = <T>(work: Promise<T>, signal: AbortSignal, onAbort: () => Error): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const abort = () => reject(onAbort());
    if (signal.aborted) {
      abort();
    } else {
      signal.addEventListener("abort", abort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener("abort", abort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", abort);
        reject(error);
      }
    );
  });
