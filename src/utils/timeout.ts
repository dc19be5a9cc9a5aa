/**
 * Deadlines for venue calls.
 */

import { OperationTimeoutError } from "../errors";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Race a promise against a timer. The timer is always cleared.
 *
 * @throws OperationTimeoutError when the deadline passes first
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new OperationTimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    }, Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== null) clearTimeout(timeoutId);
  }
}
