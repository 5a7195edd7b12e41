type FixedBackoffOptions = {
  /** Total attempts, first one included. */
  maxAttempts?: number;
  delayMs?: number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const retryWithFixedBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: FixedBackoffOptions = {},
): Promise<T> => {
  const {
    maxAttempts = 2,
    delayMs = 2000,
    onRetry,
    shouldRetry,
    sleep = wait,
  } = options;

  const ceiling = Math.max(1, Math.trunc(maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= ceiling) {
        throw error;
      }

      if (typeof shouldRetry === 'function' && !shouldRetry(error, attempt)) {
        throw error;
      }

      if (typeof onRetry === 'function') {
        try {
          onRetry(error, attempt, delayMs);
        } catch (hookError) {
          console.warn('Retry hook threw an error.', hookError);
        }
      }

      await sleep(delayMs);
    }
  }
};

export type { FixedBackoffOptions };
