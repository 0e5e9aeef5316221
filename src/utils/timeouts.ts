/**
 * Timer utilities: abortable sleeps, and p-timeout for bounded waits
 */

import pTimeout, { TimeoutError } from "p-timeout";

/**
 * Resolve after `ms`, or resolve early with `false` once `signal` aborts.
 * Resolves `true` when the full delay elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) return Promise.resolve(false);

	return new Promise<boolean>((resolve) => {
		const onAbort = () => {
			clearTimeout(timeoutId);
			resolve(false);
		};
		const timeoutId = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve(true);
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Add timeout to any promise using p-timeout
 */
export function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	timeoutMessage?: string,
): Promise<T> {
	return pTimeout(promise, {
		milliseconds: timeoutMs,
		message: timeoutMessage || `Operation timed out after ${timeoutMs}ms`,
	});
}

// Re-export TimeoutError for convenience
export { TimeoutError };
