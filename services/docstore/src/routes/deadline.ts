import { StoreError } from '../errors';

/**
 * Races `run` against a timer. On expiry the signal handed to `run` is
 * aborted and the caller gets a `store_timeout` error right away; the
 * underlying call settles on its own.
 */
export async function withDeadline<T>(ms: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // reject before abort(): the timeout error must win the race
      reject(new StoreError(`store call exceeded ${ms}ms`, { timeout: true }));
      controller.abort();
    }, ms);
  });

  try {
    return await Promise.race([run(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
