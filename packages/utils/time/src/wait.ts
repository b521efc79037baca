export class AbortError extends Error {}

export const delay = async (ms: number, options?: { signal?: AbortSignal }) => {
	return new Promise<void>((resolve, reject) => {
		const signal = options?.signal;
		if (signal?.aborted) {
			reject(new AbortError());
			return;
		}
		function handleAbort() {
			clearTimeout(timer);
			reject(new AbortError());
		}
		signal?.addEventListener("abort", handleAbort, { once: true });
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", handleAbort);
			resolve();
		}, ms);
	});
};

type WaitOptions = {
	timeout?: number;
	signal?: AbortSignal;
	delayInterval?: number;
};

/**
 * Calls `fn` until it stops throwing, rethrowing the last error on timeout
 */
export const waitForResolved = async <T>(
	fn: () => T | Promise<T>,
	options: WaitOptions = { timeout: 10 * 1000, delayInterval: 50 },
): Promise<T> => {
	const delayInterval = options.delayInterval || 50;
	const timeout = options.timeout || 10 * 1000;

	const startTime = Date.now();
	let lastError: unknown;

	while (!options.signal?.aborted && Date.now() - startTime < timeout) {
		try {
			return await fn();
		} catch (error) {
			if (error instanceof AbortError) {
				throw error;
			}
			lastError = error;
		}
		await delay(delayInterval, options);
	}

	throw lastError || new AbortError();
};
