import z from "zod";
import { createMiddleware } from "hono/factory";
import { HTTPException } from "hono/http-exception";
import type { ILimiter } from "./Limiters/ILimiter";
import type { Logger } from "./Logger";

const throttleOptsSchema = z.object({
	/** Let requests through when the limiter fails, answer 503 otherwise */
	failOpen: z.boolean(),
	/** Receives limiter failures */
	logger: z.custom<Logger>((value) => typeof value === "object" && value != null).optional(),
});
type ThrottleOpts = z.infer<typeof throttleOptsSchema>;

const defaultThrottleOpts: ThrottleOpts = {
	failOpen: true,
};

/** Hono middleware holding every request until `limiter` allows it. */
export const throttle = (limiter: ILimiter, opts?: Partial<ThrottleOpts>) => {
	if (opts != null) {
		throttleOptsSchema.partial().parse(opts);
	}
	const { failOpen, logger } = { ...defaultThrottleOpts, ...opts };

	return createMiddleware(async (_c, next) => {
		try {
			await limiter.take();
		} catch (err) {
			if (!failOpen) {
				throw new HTTPException(503, { message: "Rate limiter unavailable", cause: err });
			}
			logger?.error("Rate limiter failed, letting the request through:", err);
		}
		await next();
	});
};
