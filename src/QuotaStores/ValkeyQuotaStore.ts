import z from "zod";
import { dedent as d } from "ts-dedent";
import { Script } from "@valkey/valkey-glide";
import type { IQuotaStore, Quota, QuotaResult } from "./IQuotaStore";
import { toQuotaResult } from "./fixedWindow";

const valkeyQuotaStoreOptsSchema = z.object({
	/** Valkey keys prefix */
	keyPrefix: z.string(),
});
type ValkeyQuotaStoreOpts = z.infer<typeof valkeyQuotaStoreOptsSchema>;

/** The part of `GlideClient`/`GlideClusterClient` the store relies on. */
export interface QuotaScriptRunner {
	invokeScript(script: Script, options: { keys: string[]; args: string[] }): Promise<unknown>;
}

/** Fixed window quota store -- lua on valkey version.
 *
 * Stores the amount of hits in a single key per limiter key. The first hit of
 * a window creates the key with `periodMs` expiration, so the window lasts
 * until the key expires. Hits above `rate` are denied, with the remaining
 * key TTL as retry time, and aren't counted.
 *
 * The whole consume operation runs as a lua script, so concurrent consumers
 * of the same key are serialized by valkey.
 */
export class ValkeyQuotaStore implements IQuotaStore {
	static readonly defaultOpts: ValkeyQuotaStoreOpts = {
		keyPrefix: "quota",
	};

	/** Replies with `{allowed, hits, ttl_ms}`, where allowed is 1 or 0 */
	private static readonly luaScript = new Script(d`
		local key = KEYS[1]
		local limit = tonumber(ARGV[1])
		local period_ms = tonumber(ARGV[2])

		local hits = tonumber(redis.call('GET', key) or '0')
		if hits >= limit then
			${"" /* Denied hits aren't counted */}
			return {0, hits, redis.call('PTTL', key)}
		end

		hits = redis.call('INCR', key)
		if hits == 1 then
			${"" /* This is the first hit in the window, set expiration */}
			redis.call('PEXPIRE', key, period_ms)
		end

		return {1, hits, redis.call('PTTL', key)}`);

	public readonly opts: ValkeyQuotaStoreOpts;

	constructor(protected readonly valkey: QuotaScriptRunner, opts?: Partial<ValkeyQuotaStoreOpts>) {
		if (opts != null) {
			valkeyQuotaStoreOptsSchema.partial().parse(opts);
		}
		this.opts = { ...ValkeyQuotaStore.defaultOpts, ...opts };
	}

	async consume(key: string, quota: Quota): Promise<QuotaResult | null> {
		const result = await this.valkey.invokeScript(ValkeyQuotaStore.luaScript, {
			keys: [this.getKey(key)],
			args: [quota.rate, quota.periodMs].map(String),
		});
		if (result == null) {
			return null;
		}
		if (!Array.isArray(result) || result.length !== 3) {
			throw TypeError(`Unexpected script execution result: ${JSON.stringify(result)}`);
		}

		const [allowed, hits, ttlMs] = result.map((value: unknown) => Number(value));
		if ([allowed, hits, ttlMs].some(Number.isNaN)) {
			throw TypeError(`Unexpected script execution result: ${JSON.stringify(result)}`);
		}
		return toQuotaResult({ allowed: allowed === 1, hits, ttlMs }, quota);
	}

	protected getKey(key: string): string {
		return `${this.opts.keyPrefix}:${key}`;
	}
}
