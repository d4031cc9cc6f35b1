import { CallTimeoutError, RequestCancelledError } from "../domain/errors.js";

export interface TimeoutOptions {
  timeoutMs: number;
  operationName?: string;
  /** Parent signal; aborting it cancels the operation. */
  signal?: AbortSignal;
}

/**
 * Runs `operation` with a deadline. The operation receives a signal that is
 * aborted on timeout or when the parent signal aborts, so an in-flight fetch
 * is torn down rather than left running.
 *
 * @throws CallTimeoutError when the deadline passes first
 * @throws RequestCancelledError when the parent signal aborts first
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const operationName = options.operationName ?? "Operation";
  const parent = options.signal;
  if (parent?.aborted) {
    throw new RequestCancelledError(operationName);
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    if (Number.isFinite(options.timeoutMs) && options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        reject(new CallTimeoutError(operationName, options.timeoutMs));
        controller.abort();
      }, options.timeoutMs);
    }

    if (parent) {
      onParentAbort = () => {
        reject(new RequestCancelledError(operationName));
        controller.abort();
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
    if (parent && onParentAbort) {
      parent.removeEventListener("abort", onParentAbort);
    }
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined, operationName?: string): void {
  if (signal?.aborted) {
    throw new RequestCancelledError(operationName);
  }
}
