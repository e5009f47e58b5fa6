import type { ICompositeLimiter, ILimiter } from "./ILimiter";

/** Limiter which allows a request only when all of its limiters allow it.
 *
 * `take` calls the limiters one after another, in the order they were added,
 * and resolves with the grant time of the last one. The first rejection is
 * rethrown and the remaining limiters are not called. Without limiters, every
 * request is allowed right away.
 *
 * Limiters are checked sequentially, not at a single instant: while `take`
 * waits for one of them, other callers may consume the quotas that were
 * already checked. So each quota was satisfied at the moment it was checked,
 * not necessarily all of them at once. It's fine for independent tiers over
 * the same resource (e.g. per second and per minute), but it's not an atomic
 * check of all quotas.
 *
 * Composite limiters can be nested.
 *
 * @example
 * const perSecond = new SingleLimiter(store, "api_per_second", 10, { periodMs: Period.Second });
 * const perMinute = new SingleLimiter(store, "api_per_minute", 100, { periodMs: Period.Minute });
 * const limiter = new CompositeLimiter(perSecond, perMinute);
 * await limiter.take();
 */
export class CompositeLimiter implements ICompositeLimiter {
	private limiters: ILimiter[];

	constructor(...limiters: ILimiter[]) {
		this.limiters = [...limiters];
	}

	/** Amount of limiters currently held */
	get size(): number {
		return this.limiters.length;
	}

	addLimiter(limiter: ILimiter): void {
		this.limiters.push(limiter);
	}

	async take(): Promise<Date> {
		// Snapshot must be taken before the first await
		const limiters = [...this.limiters];

		let grantedAt = new Date();
		for (const limiter of limiters) {
			grantedAt = await limiter.take();
		}
		return grantedAt;
	}
}
