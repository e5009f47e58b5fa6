import z from "zod";
import type { IQuotaStore, Quota, QuotaResult } from "./IQuotaStore";
import { toQuotaResult } from "./fixedWindow";

const inMemoryQuotaStoreOptsSchema = z.object({
	/** Minimum time between automatic removals of expired windows, in ms */
	sweepIntervalMs: z.number().int().positive(),
});
type InMemoryQuotaStoreOpts = z.infer<typeof inMemoryQuotaStoreOptsSchema>;

interface FixedWindow {
	hits: number;
	expiresAt: number;
}

/** Fixed window quota store -- In-Memory version.
 *
 * Keeps a hit counter per key. The window starts with the first hit and lasts
 * `periodMs`; hits above `rate` are denied until the window expires, and denied
 * hits aren't counted. Mirrors the lua script of `ValkeyQuotaStore`.
 *
 * Expired windows are removed on `consume`, at most once per `sweepIntervalMs`.
 *
 * Notice that in-memory version can't be shared between processes, so it only
 * limits callers living in the same process.
 */
export class InMemoryQuotaStore implements IQuotaStore {
	static readonly defaultOpts: InMemoryQuotaStoreOpts = {
		sweepIntervalMs: 1000,
	};

	readonly opts: InMemoryQuotaStoreOpts;

	private windows = new Map<string, FixedWindow>();
	private nextSweepTs: number;

	constructor(opts?: Partial<InMemoryQuotaStoreOpts>) {
		if (opts != null) {
			inMemoryQuotaStoreOptsSchema.partial().parse(opts);
		}
		this.opts = { ...InMemoryQuotaStore.defaultOpts, ...opts };
		this.nextSweepTs = Date.now() + this.opts.sweepIntervalMs;
	}

	async consume(key: string, quota: Quota): Promise<QuotaResult> {
		const nowTs = Date.now();
		if (nowTs >= this.nextSweepTs) {
			this.removeExpiredWindows(nowTs);
		}

		let window = this.windows.get(key);
		if (window == null || window.expiresAt <= nowTs) {
			window = { hits: 0, expiresAt: nowTs + quota.periodMs };
		}

		const allowed = window.hits < quota.rate;
		if (allowed) {
			window.hits++;
			this.windows.set(key, window);
		}

		return toQuotaResult({ allowed, hits: window.hits, ttlMs: window.expiresAt - nowTs }, quota);
	}

	/** Amount of keys currently tracked */
	get size(): number {
		return this.windows.size;
	}

	/** Remove expired windows.
	 *
	 * This action is performed automatically on calls to `consume`. You can
	 * call it manually, if you want to trigger this mechanism manually.
	 */
	checkExpiration(): void {
		this.removeExpiredWindows(Date.now());
	}

	/** Remove all stored state */
	clear(): void {
		this.windows.clear();
	}

	private removeExpiredWindows(nowTs: number): void {
		for (const [key, window] of this.windows) {
			if (window.expiresAt <= nowTs) {
				this.windows.delete(key);
			}
		}
		this.nextSweepTs = nowTs + this.opts.sweepIntervalMs;
	}
}
