export type SleepOutcome = "elapsed" | "aborted";

/** Waits for `ms`, or until `signal` aborts, whichever comes first.
 *
 * Never rejects: an abort resolves with "aborted". A signal which is already
 * aborted resolves right away.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<SleepOutcome> {
	if (signal?.aborted) {
		return Promise.resolve("aborted");
	}

	return new Promise((resolve) => {
		const onAbort = () => {
			clearTimeout(timeoutId);
			resolve("aborted");
		};

		const timeoutId = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve("elapsed");
		}, ms);

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
