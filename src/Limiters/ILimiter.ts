export interface ILimiter {
	/** Blocks until the request is allowed.
	 *
	 * @returns time at which the request was allowed.
	 * Rejects if the underlying quota store failed.
	 */
	take(): Promise<Date>;
}

export interface ICompositeLimiter extends ILimiter {
	/** Adds another limiter which must also allow the request.
	 *
	 * Only affects `take` calls started after this call.
	 */
	addLimiter(limiter: ILimiter): void;
}
