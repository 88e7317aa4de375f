export class AttemptTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

export class OperationAbortedError extends Error {
  constructor(reason: unknown) {
    super("Operation aborted by caller", { cause: reason });
    this.name = "OperationAbortedError";
  }
}

/**
 * Runs `operation` with its own abort signal that fires after `timeoutMs` or
 * when `parent` aborts, whichever comes first. The returned promise settles
 * at that point even if the operation ignores its signal.
 */
export function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new OperationAbortedError(parent.reason));
  }

  const controller = new AbortController();
  const onParentAbort = () =>
    controller.abort(new OperationAbortedError(parent?.reason));
  parent?.addEventListener("abort", onParentAbort, { once: true });
  const timer = setTimeout(
    () => controller.abort(new AttemptTimeoutError(timeoutMs)),
    timeoutMs
  );

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(controller.signal.reason),
      { once: true }
    );
  });

  return Promise.race([operation(controller.signal), aborted]).finally(() => {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  });
}

export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = "DeadlineExceededError";
  }
}

export interface Deadline {
  signal: AbortSignal;
  dispose(): void;
}

/** A signal that aborts after `timeoutMs` or with `parent`, whichever is first. */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }
  const timer = setTimeout(
    () => controller.abort(new DeadlineExceededError(timeoutMs)),
    timeoutMs
  );
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
