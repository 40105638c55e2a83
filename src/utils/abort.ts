/**
 * Build the error an aborted operation rejects with.
 *
 * Uses the signal's reason when it is already an Error (the default
 * `AbortController.abort()` reason is an "AbortError" DOMException).
 */
export function toAbortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error("The operation was aborted", {
    cause: signal.reason,
  });
  error.name = "AbortError";
  return error;
}

/**
 * Check whether an error came from an aborted operation.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 *
 * The abandoned promise keeps running; its late result or rejection is
 * consumed here so it never surfaces as an unhandled rejection.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(toAbortError(signal));
    signal.addEventListener("abort", onAbort, { once: true });

    void promise.then(resolve, reject).finally(() => {
      signal.removeEventListener("abort", onAbort);
    });

    if (signal.aborted) {
      onAbort();
    }
  });
}
