/** Timer helpers shared by the orchestrator, the watchdog and shutdown. */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const TIMED_OUT: unique symbol = Symbol("timed out");

/**
 * Race `promise` against `timeoutMs`. Resolves its value, or `TIMED_OUT` when
 * it has not settled in time; a rejection in time is passed on. The timer is
 * always cleared so nothing is left pending.
 */
export async function within<T>(promise: Promise<T>, timeoutMs: number): Promise<T | typeof TIMED_OUT> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wait for `promise` for at most `timeoutMs`. Resolves `true` when it settled
 * in time and `false` otherwise; a rejection counts as settled.
 */
export async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  const settled = promise.then(
    () => true,
    () => true,
  );
  return (await within(settled, timeoutMs)) !== TIMED_OUT;
}
