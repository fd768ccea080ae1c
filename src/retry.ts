import { CancelledError, ConnectionError } from "./errors"

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

// Resolves after `ms`, or rejects with CancelledError as soon as `signal` aborts.
export const sleep: Sleep = (ms, signal) => {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError())
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      reject(new CancelledError())
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}

export type RetryOptions = {
  /** Extra attempts after the first one. */
  retries: number;
  delayMs: number;
  operationName: string;
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (attempt: number, err: ConnectionError) => void;
};

/**
 * Runs `operation`, retrying only on ConnectionError. Any other error, or the
 * last ConnectionError once retries run out, is rethrown unchanged.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation()
    } catch (err) {
      if (!(err instanceof ConnectionError) || attempt >= options.retries) {
        throw err
      }
      options.onRetry?.(attempt + 1, err)
      // linear backoff
      await wait(options.delayMs * (attempt + 1), options.signal)
    }
  }
}
