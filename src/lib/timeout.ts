/**
 * Deadlines and cancellation for external calls.
 */

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class AbortedError extends Error {
  constructor() {
    super("Cancelled by caller");
    this.name = "AbortedError";
  }
}

/**
 * Race an abortable operation against a timeout and an optional parent
 * signal. The operation receives a signal that fires in either case, so
 * the underlying request is abandoned rather than left running.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new AbortedError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const settle = (finish: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      finish();
    };

    const onParentAbort = (): void => {
      controller.abort();
      settle(() => reject(new AbortedError()));
    };

    timer = setTimeout(() => {
      controller.abort();
      settle(() => reject(new TimeoutError(ms)));
    }, ms);
    parent?.addEventListener("abort", onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (err) {
      settle(() => reject(err));
      return;
    }
    pending.then(
      (value) => settle(() => resolve(value)),
      (err: unknown) => settle(() => reject(err))
    );
  });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
