import { SleepFn, sleep } from './retry';
import { logger } from './logger';

export interface RateLimiter {
    acquire(): Promise<void>;
}

export interface IntervalLimiterOptions {
    intervalMs: number;
    // Fraction of the interval used as +/- jitter
    jitter?: number;
    sleep?: SleepFn;
    now?: () => number;
    random?: () => number;
}

/**
 * Single-flight limiter: consecutive acquisitions are spaced by the interval
 * plus or minus jitter. The first acquisition never waits.
 */
export class JitteredIntervalLimiter implements RateLimiter {
    private lastAcquiredAt: number | null = null;
    private readonly jitter: number;
    private readonly sleep: SleepFn;
    private readonly now: () => number;
    private readonly random: () => number;

    constructor(private readonly options: IntervalLimiterOptions) {
        this.jitter = options.jitter ?? 0.1;
        this.sleep = options.sleep ?? sleep;
        this.now = options.now ?? Date.now;
        this.random = options.random ?? Math.random;
    }

    nextIntervalMs(): number {
        const { intervalMs } = this.options;
        const low = intervalMs * (1 - this.jitter);
        const high = intervalMs * (1 + this.jitter);
        return low + this.random() * (high - low);
    }

    async acquire(): Promise<void> {
        if (this.lastAcquiredAt !== null) {
            const target = this.nextIntervalMs();
            const elapsed = this.now() - this.lastAcquiredAt;
            const wait = Math.max(0, target - elapsed);
            if (wait > 0) {
                logger.info(`Waiting ${Math.round(wait)}ms before next email (base: ${this.options.intervalMs}ms)...`);
                await this.sleep(wait);
            }
        }
        this.lastAcquiredAt = this.now();
    }
}
