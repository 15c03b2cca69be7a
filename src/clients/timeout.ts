import { CallAbortedError, CallTimeoutError } from "../errors.js";

/**
 * Runs `operation` with its own AbortSignal that fires when `timeoutMs`
 * elapses or when `parentSignal` aborts, whichever comes first. The returned
 * promise settles at that moment even if the operation ignores its signal.
 */
export async function withTimeout<T>(
  operationName: string,
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new CallAbortedError(operationName);
  }

  const controller = new AbortController();
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const interruption = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new CallTimeoutError(operationName, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    if (parentSignal) {
      onParentAbort = () => {
        const error = new CallAbortedError(operationName);
        controller.abort(error);
        reject(error);
      };
      parentSignal.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), interruption]);
  } finally {
    clearTimeout(timeoutHandle);
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener("abort", onParentAbort);
    }
  }
}
