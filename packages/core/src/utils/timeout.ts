export class TimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Runs `fn` (sync or async) as a promise that rejects with TimeoutError once
 * `timeoutMs` elapses. The signal handed to `fn` is aborted at the deadline.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => T | Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<Settled<T>>((resolve) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs);
      controller.abort(error);
      resolve({ ok: false, error });
    }, timeoutMs);
  });

  // Settling into a value keeps a late rejection after the deadline from going unhandled.
  const work = Promise.resolve()
    .then(() => fn(controller.signal))
    .then(
      (value): Settled<T> => ({ ok: true, value }),
      (error: unknown): Settled<T> => ({ ok: false, error }),
    );

  try {
    const result = await Promise.race([work, deadline]);
    if (!result.ok) throw result.error;
    return result.value;
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
