/**
 * @spanwise/tracing - Timeout
 * Timeout wrapper for async operations
 */

import { TimeoutExceededError } from "./errors.js";

/**
 * Run `fn`, rejecting with TimeoutExceededError once `timeoutMs` passes.
 * The operation is not cancelled; its late result is ignored.
 */
export async function executeWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutExceededError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}
