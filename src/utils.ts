// Stream Courier - Shared utilities
// Timeout/abort plumbing for long-running collaborator calls, and size formatting.

const BYTES_PER_MEGABYTE = 1024 * 1024;

// ─── Size formatting ────────────────────────────────────────────────────────────

/**
 * Formats a byte count as megabytes (1024²) with two decimals, e.g. "60.00".
 */
export function formatMegabytes(bytes: number): string {
  return (bytes / BYTES_PER_MEGABYTE).toFixed(2);
}

// ─── Timeouts ───────────────────────────────────────────────────────────────────

export class OperationTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = "OperationTimeoutError";
  }
}

export class OperationAbortedError extends Error {
  constructor() {
    super("operation was cancelled");
    this.name = "OperationAbortedError";
  }
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs` or when
 * `parent` aborts, whichever comes first. The returned promise rejects as
 * soon as the signal fires, even if the task ignores it.
 *
 * Rejects with OperationTimeoutError on timeout and OperationAbortedError on
 * parent abort; otherwise settles with the task.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    throw new OperationAbortedError();
  }

  const controller = new AbortController();
  let rejectOnAbort: (reason: Error) => void = () => {};
  const aborted = new Promise<never>((_resolve, reject) => {
    rejectOnAbort = reject;
  });

  const timer = setTimeout(() => {
    const reason = new OperationTimeoutError(timeoutMs);
    controller.abort(reason);
    rejectOnAbort(reason);
  }, timeoutMs);

  const onParentAbort = () => {
    const reason = new OperationAbortedError();
    controller.abort(reason);
    rejectOnAbort(reason);
  };
  parent?.addEventListener("abort", onParentAbort, { once: true });

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
