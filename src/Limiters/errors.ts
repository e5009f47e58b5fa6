/** Thrown when the quota store replied with an empty result instead of a decision. */
export class RateLimitIntervalServerError extends Error {
	constructor() {
		super("rate limit interval server error");
		this.name = "RateLimitIntervalServerError";
	}
}
