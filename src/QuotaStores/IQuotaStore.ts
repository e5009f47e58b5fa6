import z from "zod";

export const quotaSchema = z.object({
	/** Amount of grants allowed per period */
	rate: z.number().int().positive(),
	/** Amount of grants that can be taken at once, stores with fixed windows take `rate` for it */
	burst: z.number().int().positive(),
	/** Period length in ms */
	periodMs: z.number().int().positive(),
});

export type Quota = Readonly<z.infer<typeof quotaSchema>>;

export interface QuotaResult {
	/** Whether a unit was consumed */
	allowed: boolean;
	/** Amount of units that can still be consumed right away */
	remaining: number;
	/** Time in ms to wait before the next unit can be consumed, -1 if allowed */
	retryAfterMs: number;
	/** Time in ms until the current window ends and the full rate is available again */
	resetAfterMs: number;
}

export interface IQuotaStore {
	/** Attempts to consume a single unit of `key` under `quota`.
	 *
	 * Must be atomic per key: concurrent calls for the same key never consume
	 * more than the quota allows. Nothing is consumed when the result is not allowed.
	 *
	 * Resolves to `null` if the store replied with nothing, rejects on store errors.
	 */
	consume(key: string, quota: Quota): Promise<QuotaResult | null>;
}
