import z from "zod";
import type { ILimiter } from "./ILimiter";
import { quotaSchema, type IQuotaStore, type Quota } from "../QuotaStores/IQuotaStore";
import type { Logger } from "../Logger";
import { RateLimitIntervalServerError } from "./errors";
import { Period } from "./consts";
import { sleep } from "./sleep";

const singleLimiterOptsSchema = z.object({
	/** Quota period in ms */
	periodMs: z.number().int().positive(),
	/** Cancels waiting for the quota. Never aborts if omitted */
	signal: z.instanceof(AbortSignal).optional(),
	/** Receives waits and fail-open notices */
	logger: z.custom<Logger>((value) => typeof value === "object" && value != null).optional(),
});
type SingleLimiterOpts = z.infer<typeof singleLimiterOptsSchema>;

/** Blocking limiter over a single quota in a shared quota store.
 *
 * Allows at most `rate` requests per `periodMs` for the `key`. Limiters created
 * with the same key over the same store share the quota, which is how the limit
 * is distributed between processes.
 *
 * `take` consumes a unit from the store, and if the store denies it, waits for
 * the store provided retry time and tries again, until a unit is consumed.
 *
 * Aborting `signal` stops the wait and **resolves** `take` as if the request was
 * allowed, it never rejects because of the abort. Store errors reject `take`
 * right away, without retries. A denial without a retry time is treated as
 * allowed.
 *
 * The store client stays owned by the caller, limiter never closes it.
 */
export class SingleLimiter implements ILimiter {
	static readonly defaultOpts: SingleLimiterOpts = {
		periodMs: Period.Second,
	};

	public readonly opts: SingleLimiterOpts;
	public readonly quota: Quota;

	constructor(
		protected readonly store: IQuotaStore,
		public readonly key: string,
		rate: number,
		opts?: Partial<SingleLimiterOpts>
	) {
		if (opts != null) {
			singleLimiterOptsSchema.partial().parse(opts);
		}
		this.opts = { ...SingleLimiter.defaultOpts, ...opts };
		// Burst is always the same as rate, there's no separate setting for it
		this.quota = Object.freeze(quotaSchema.parse({ rate, burst: rate, periodMs: this.opts.periodMs }));
	}

	async take(): Promise<Date> {
		while (true) {
			const now = new Date();

			const result = await this.store.consume(this.key, this.quota);
			if (result == null) {
				throw new RateLimitIntervalServerError();
			}
			if (result.allowed) {
				return now;
			}

			if (result.retryAfterMs <= 0) {
				this.opts.logger?.warn(`Quota store denied "${this.key}" without retry time, allowing`);
				return now;
			}

			this.opts.logger?.debug(`Quota "${this.key}" exhausted, waiting ${result.retryAfterMs}ms`);
			const outcome = await sleep(result.retryAfterMs, this.opts.signal);
			if (outcome === "aborted") {
				this.opts.logger?.warn(`Waiting for quota "${this.key}" aborted, allowing`);
				return new Date();
			}
		}
	}
}
