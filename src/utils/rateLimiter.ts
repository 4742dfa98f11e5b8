import Bottleneck from "bottleneck";

const ONE_MINUTE_MS = 60_000;

/**
 * Limiter allowing `concurrency` jobs at once and, when a per-minute budget is
 * given, at most that many units (requests or token weight) per minute.
 */
export function createRateLimiter(concurrency: number, perMinute?: number): Bottleneck {
    const maxConcurrent = Math.max(1, concurrency);

    if (!perMinute || !Number.isFinite(perMinute)) {
        return new Bottleneck({ maxConcurrent });
    }

    const amount = Math.max(1, Math.floor(perMinute));
    return new Bottleneck({
        maxConcurrent,
        reservoir: amount,
        reservoirRefreshAmount: amount,
        reservoirRefreshInterval: ONE_MINUTE_MS,
    });
}
