import Bottleneck from "bottleneck";
import type { ProviderLimitsConfig } from "../config/types";

const ONE_MINUTE_MS = 60_000;

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    retries?: number;
}

export function resolveBaseUrl(url: string | undefined, defaultUrl: string): string {
    if (!url) {
        return defaultUrl;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    const merged: ProviderRateLimits = { ...defaults };
    for (const key of ["batchSize", "concurrency", "maxRequestsPerMinute", "retries"] as const) {
        const value = override[key];
        if (value !== undefined) {
            merged[key] = value;
        }
    }
    return merged;
}

/**
 * Request limiter for one provider: `concurrency` requests in flight and, when
 * `maxRequestsPerMinute` is set, a reservoir refilled every minute.
 */
export function createRequestLimiter(concurrency: number, maxRequestsPerMinute?: number): Bottleneck {
    const maxConcurrent = Math.max(1, concurrency);
    if (!maxRequestsPerMinute || !Number.isFinite(maxRequestsPerMinute)) {
        return new Bottleneck({ maxConcurrent });
    }

    const perMinute = Math.max(1, Math.floor(maxRequestsPerMinute));
    return new Bottleneck({
        maxConcurrent,
        reservoir: perMinute,
        reservoirRefreshAmount: perMinute,
        reservoirRefreshInterval: ONE_MINUTE_MS,
    });
}

/** Texts grouped into request-sized batches, each tagged with its position for reassembly. */
export function toRequestBatches(texts: readonly string[], batchSize: number): { idx: number; batch: string[] }[] {
    const size = Math.max(1, Math.floor(batchSize));
    const batches: { idx: number; batch: string[] }[] = [];
    for (let start = 0; start < texts.length; start += size) {
        batches.push({ idx: batches.length, batch: texts.slice(start, start + size) });
    }
    return batches;
}
