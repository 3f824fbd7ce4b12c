import { logger } from './logger';

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
    attempts: number;
    minDelayMs: number;
    maxDelayMs: number;
    // Used in log lines
    description: string;
    sleep?: SleepFn;
    random?: () => number;
}

export interface RetryOutcome<T> {
    value: T | null;
    attempts: number;
    lastError?: unknown;
}

/**
 * Run `task` up to `attempts` times with a jittered wait between tries.
 * A task that resolves to null/undefined or throws counts as a miss; after the
 * last miss the outcome carries `value: null` instead of throwing.
 */
export async function retryWithJitter<T>(
    task: (attempt: number) => Promise<T | null | undefined>,
    options: RetryOptions,
): Promise<RetryOutcome<T>> {
    const wait = options.sleep ?? sleep;
    const random = options.random ?? Math.random;
    let lastError: unknown;

    for (let attempt = 1; attempt <= options.attempts; attempt++) {
        try {
            const value = await task(attempt);
            if (value !== null && value !== undefined) {
                return { value, attempts: attempt };
            }
            logger.debug(`${options.description}: no result on attempt ${attempt}/${options.attempts}`);
        } catch (error) {
            lastError = error;
            logger.debug(`${options.description}: attempt ${attempt}/${options.attempts} failed`, error);
        }

        if (attempt < options.attempts) {
            const delay = options.minDelayMs + random() * (options.maxDelayMs - options.minDelayMs);
            await wait(delay);
        }
    }

    return { value: null, attempts: options.attempts, lastError };
}
