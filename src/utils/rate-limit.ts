/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
export class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    /**
     * Bucket that spaces acquisitions at least `delayMs` apart (no burst).
     * A non-positive delay never waits.
     */
    static spacing(delayMs: number): TokenBucket {
        if (delayMs <= 0) return new TokenBucket(Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY);
        return new TokenBucket(1000 / delayMs, 1);
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Reserve the token now so concurrent callers queue behind each other
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        await sleep(waitMs);
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        if (Number.isFinite(this.tokensPerSecond)) {
            this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        }
        this.lastRefill = now;
    }
}

/**
 * Exponential backoff with jitter, capped at `max`.
 */
export function calculateBackoff(attempt: number, initial: number, max: number): number {
    const exponential = initial * Math.pow(2, attempt);
    const jitter = Math.random() * exponential * 0.5;
    return Math.min(max, exponential + jitter);
}

/**
 * Delay before the next attempt: the server's Retry-After when given, else backoff.
 */
export function retryDelay(attempt: number, initial: number, max: number, retryAfterMs?: number): number {
    return retryAfterMs ?? calculateBackoff(attempt, initial, max);
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
