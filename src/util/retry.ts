export interface RetryPolicy {
    /** Total number of attempts, including the first one. */
    attempts: number;
    initialDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
    sleep?: Sleep;
    onFailedAttempt?: (error: unknown, attempt: number) => void;
}

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the attempt that follows `failedAttempts` failures.
 */
export const backoffDelay = (policy: RetryPolicy, failedAttempts: number): number => {
    const exponent = Math.max(0, failedAttempts - 1);
    return Math.min(policy.initialDelayMs * Math.pow(policy.multiplier, exponent), policy.maxDelayMs);
};

/**
 * Run `task` up to `policy.attempts` times with exponential backoff between
 * attempts. No delay follows the final attempt; its error is rethrown.
 */
export const retry = async <T>(
    task: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    options: RetryOptions = {},
): Promise<T> => {
    const wait = options.sleep ?? sleep;
    let lastError: unknown = new Error('Retry policy allows no attempts');

    for (let attempt = 1; attempt <= policy.attempts; attempt++) {
        try {
            return await task(attempt);
        } catch (error) {
            lastError = error;
            options.onFailedAttempt?.(error, attempt);
            if (attempt < policy.attempts) {
                await wait(backoffDelay(policy, attempt));
            }
        }
    }

    throw lastError;
};
