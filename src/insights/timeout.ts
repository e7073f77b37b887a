// ---------------------------------------------------------------------------
// Timeout helper for external calls
// ---------------------------------------------------------------------------

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(`${message} (timeout: ${timeoutMs}ms)`);
    this.name = "TimeoutError";
  }
}

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`. Rejects with
 * TimeoutError at the deadline even if the task ignores the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  message = "Operation timed out"
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(message, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
