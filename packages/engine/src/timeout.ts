import { TransientError } from "@converge/proto";

/**
 * Race a stepper call against a timer.
 *
 * The call itself is not cancelled (stepper operations run to completion or
 * failure); only the caller stops waiting and sees a TransientError. The
 * abandoned call is handed to `onLate` first, so the caller can keep its
 * resources held until it settles.
 *
 * @param fn - Call to bound
 * @param timeoutMs - Limit in milliseconds; undefined or <= 0 disables the timer
 * @param source - Label used in the error message and as error source
 * @param onLate - Receives the still-running call when the timer fires
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number | undefined,
  source: string,
  onLate?: (call: Promise<T>) => void
): Promise<T> {
  if (!timeoutMs || timeoutMs <= 0) {
    return fn();
  }

  const call = fn();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onLate?.(call);
      reject(new TransientError(`${source} timed out after ${timeoutMs}ms`, { source }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
