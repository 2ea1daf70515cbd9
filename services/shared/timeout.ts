export class TimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export class AbortedError extends Error {
  constructor(operation: string) {
    super(`${operation} was aborted`);
    this.name = "AbortedError";
    Object.setPrototypeOf(this, AbortedError.prototype);
  }
}

/** Signal that aborts after `timeoutMs` or when `parent` aborts, whichever comes first. */
export function deadlineSignal(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  const timer = AbortSignal.timeout(timeoutMs);
  return parent ? AbortSignal.any([parent, timer]) : timer;
}

/**
 * Race a promise against a timer and an optional abort signal.
 *
 * `onTimeout` runs before the rejection, e.g. to abort the underlying call.
 * The timer is always cleared once the race settles. An already-aborted
 * signal still goes through the race, so a late rejection of `promise` is
 * observed.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  options: { signal?: AbortSignal; onTimeout?: () => void } = {}
): Promise<T> {
  const { signal, onTimeout } = options;
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError(operation));
      return;
    }
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
    if (signal) {
      onAbort = () => reject(new AbortedError(operation));
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  return Promise.race([promise, guard]).finally(() => {
    clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener("abort", onAbort);
  });
}
