export class OperationTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
  }
}

export class OperationAbortedError extends Error {
  constructor(public readonly operation: string, reason?: unknown) {
    super(`${operation} aborted${reason instanceof Error ? `: ${reason.message}` : ""}`);
    this.name = "OperationAbortedError";
  }
}

export function throwIfAborted(operation: string, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationAbortedError(operation, signal.reason);
  }
}

/**
 * Runs `task` with a signal that fires after `timeoutMs` or when the caller's
 * signal aborts, whichever comes first. The returned promise settles at that
 * point even if `task` ignores its signal.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  throwIfAborted(operation, parent);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new OperationTimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        const error = new OperationAbortedError(operation, parent.reason);
        controller.abort(error);
        reject(error);
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener("abort", onParentAbort);
    }
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
