import { logger } from './logger';

export interface RequestThrottleConfig {
    minIntervalMs: number;        // Minimum gap between two requests
    maxIntervalMs: number;        // Ceiling for the gap after repeated backoff
    maxRequests: number | null;   // Hard cap per run; null means unlimited
    successStreakThreshold: number; // Successes before the gap shrinks again
    name: string;
}

const DEFAULT_CONFIG: RequestThrottleConfig = {
    minIntervalMs: 1000,
    maxIntervalMs: 30000,
    maxRequests: 100,
    successStreakThreshold: 20,
    name: 'api',
};

export interface ThrottleState {
    requestCount: number;
    remaining: number | null;
    currentIntervalMs: number;
    isPaused: boolean;
}

// Serializes outbound requests: one at a time, spaced by the current interval,
// and never more than maxRequests per instance.
export class RequestThrottle {
    private lastRequestAt: number;
    private requestCount: number;
    private currentIntervalMs: number;
    private successStreak: number;
    private pauseUntil: number;
    private pending: Promise<void>;
    private config: RequestThrottleConfig;

    constructor(config: Partial<RequestThrottleConfig> = {}) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.lastRequestAt = 0;
        this.requestCount = 0;
        this.currentIntervalMs = this.config.minIntervalMs;
        this.successStreak = 0;
        this.pauseUntil = 0;
        this.pending = Promise.resolve();
    }

    get capReached(): boolean {
        return this.config.maxRequests !== null && this.requestCount >= this.config.maxRequests;
    }

    // Resolves true once the caller may send a request, false when the cap is spent
    acquire(): Promise<boolean> {
        const turn = this.pending.then(() => this.waitForTurn());
        this.pending = turn.then(() => undefined);
        return turn;
    }

    private async waitForTurn(): Promise<boolean> {
        if (this.capReached) {
            logger.warn(
                { throttle: this.config.name, maxRequests: this.config.maxRequests },
                'Request cap reached, refusing further requests'
            );
            return false;
        }

        const now = Date.now();
        if (now < this.pauseUntil) {
            const waitTime = this.pauseUntil - now;
            logger.info({ throttle: this.config.name, waitTime }, 'Throttle paused, waiting...');
            await this.sleep(waitTime);
        }

        const elapsed = Date.now() - this.lastRequestAt;
        if (elapsed < this.currentIntervalMs) {
            const waitTime = this.currentIntervalMs - elapsed;
            logger.debug({ throttle: this.config.name, waitTime }, 'Throttle spacing request');
            await this.sleep(waitTime);
        }

        this.lastRequestAt = Date.now();
        this.requestCount++;
        return true;
    }

    recordSuccess(): void {
        this.successStreak++;

        if (this.successStreak >= this.config.successStreakThreshold) {
            const newInterval = Math.max(this.config.minIntervalMs, this.currentIntervalMs / 2);
            if (newInterval < this.currentIntervalMs) {
                logger.info(
                    { throttle: this.config.name, oldIntervalMs: this.currentIntervalMs, newIntervalMs: newInterval },
                    'Throttle shortening interval after success streak'
                );
                this.currentIntervalMs = newInterval;
            }
            this.successStreak = 0;
        }
    }

    handleRateLimit(retryAfterSeconds: number): void {
        this.successStreak = 0;
        this.pauseUntil = Date.now() + (retryAfterSeconds * 1000);

        const newInterval = Math.min(
            this.config.maxIntervalMs,
            Math.max(this.currentIntervalMs * 2, 1)
        );

        logger.warn(
            {
                throttle: this.config.name,
                retryAfterSeconds,
                oldIntervalMs: this.currentIntervalMs,
                newIntervalMs: newInterval,
                pauseUntil: new Date(this.pauseUntil).toISOString(),
            },
            'Throttle backing off after 429'
        );

        this.currentIntervalMs = newInterval;
    }

    getState(): ThrottleState {
        return {
            requestCount: this.requestCount,
            remaining: this.config.maxRequests === null
                ? null
                : Math.max(0, this.config.maxRequests - this.requestCount),
            currentIntervalMs: this.currentIntervalMs,
            isPaused: Date.now() < this.pauseUntil,
        };
    }

    reset(): void {
        this.lastRequestAt = 0;
        this.requestCount = 0;
        this.currentIntervalMs = this.config.minIntervalMs;
        this.successStreak = 0;
        this.pauseUntil = 0;
        this.pending = Promise.resolve();
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
