import { isRetryableError } from '../errors';

/**
 * Configuration options for the retry mechanism.
 */
export interface RetryOptions {
    /** Total number of attempts, including the first one. */
    maxAttempts: number;
    /** Delay in milliseconds before the first retry. */
    initialDelayMs: number;
    /** Upper bound for the delay between attempts. */
    maxDelayMs: number;
    /** Multiplier for exponential backoff. */
    factor: number;
    /** Decides whether a failure is worth another attempt. */
    shouldRetry: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxAttempts: 3,
    initialDelayMs: 200,
    maxDelayMs: 5000,
    factor: 2,
    shouldRetry: isRetryableError,
    onRetry: (error, attempt) => {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Retry attempt ${attempt} after error: ${message}`);
    },
};

/**
 * Retries an asynchronous operation with exponential backoff and jitter.
 * Errors rejected by `shouldRetry` are rethrown immediately.
 *
 * @throws the last error once all attempts are used
 */
export async function retry<T>(
    operation: () => Promise<T>,
    options: Partial<RetryOptions> = {}
): Promise<T> {
    const config: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
    let delay = config.initialDelayMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (attempt >= config.maxAttempts || !config.shouldRetry(error)) {
                throw error;
            }

            config.onRetry?.(error, attempt);

            const jitter = delay * 0.2 * (Math.random() - 0.5);
            const waitTime = Math.max(0, delay + jitter);
            await new Promise((resolve) => setTimeout(resolve, waitTime));

            delay = Math.min(delay * config.factor, config.maxDelayMs);
        }
    }
}
