import type { Quota, QuotaResult } from "./IQuotaStore";

/** Outcome of a single hit on a fixed window, as seen right after it. */
export interface FixedWindowHit {
	/** Whether the hit was counted */
	allowed: boolean;
	/** Amount of hits counted in the window */
	hits: number;
	/** Time left until the window expires, negative if it has no expiration */
	ttlMs: number;
}

/** Converts a fixed window hit into a store result.
 *
 * Shared by every store, so they only differ in how the hit is registered.
 */
export function toQuotaResult(hit: FixedWindowHit, quota: Quota): QuotaResult {
	return {
		allowed: hit.allowed,
		remaining: Math.max(quota.rate - hit.hits, 0),
		retryAfterMs: hit.allowed ? -1 : hit.ttlMs,
		resetAfterMs: Math.max(hit.ttlMs, 0),
	};
}
