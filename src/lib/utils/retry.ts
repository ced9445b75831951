export type RetryOptions = {
  maxRetries?: number;
  baseDelayMs?: number;
  factor?: number;
  onRetry?: (attempt: number, error: unknown) => void;
};

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxRetries = Math.max(options.maxRetries ?? 2, 0);
  const baseDelayMs = options.baseDelayMs ?? 100;
  const factor = options.factor ?? 2;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxRetries) {
        throw error instanceof Error ? error : new Error("Retry operation failed");
      }

      options.onRetry?.(attempt + 1, error);
      await sleep(baseDelayMs * factor ** attempt);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
