export interface RetryPolicy {
    /** Attempts per model, including the first one. */
    readonly maxAttempts: number;
    /** Delay before the attempt that follows `attempt` (0-based). */
    delayMs(attempt: number): number;
}

export const fixedRetryPolicy = (maxAttempts: number, delayMs: number): RetryPolicy => ({
    maxAttempts: Math.max(1, maxAttempts),
    delayMs: () => delayMs
});

export const exponentialBackoffPolicy = (
    maxAttempts: number,
    baseDelayMs: number,
    maxDelayMs: number = 60_000
): RetryPolicy => ({
    maxAttempts: Math.max(1, maxAttempts),
    delayMs: (attempt: number) => Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs)
});
