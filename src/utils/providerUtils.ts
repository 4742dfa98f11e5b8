import type { ProviderLimitsConfig } from "../config/types";

export type ProviderRateLimits = Required<Pick<ProviderLimitsConfig, "concurrency" | "retries">> & ProviderLimitsConfig;

const LIMIT_KEYS: readonly (keyof ProviderLimitsConfig)[] = [
    "batchSize",
    "concurrency",
    "maxRequestsPerMinute",
    "maxTokensPerMinute",
    "retries",
];

export function resolveBaseUrl(url: string | undefined, defaultUrl: string): string {
    if (!url) {
        return defaultUrl;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Overlays configured limits on a provider's defaults. Unset (undefined)
 * entries keep the default.
 */
export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    const merged: ProviderRateLimits = { ...defaults };
    for (const key of LIMIT_KEYS) {
        const value = override[key];
        if (typeof value === "number") {
            merged[key] = value;
        }
    }
    return merged;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
