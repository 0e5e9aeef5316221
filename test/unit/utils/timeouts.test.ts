import { describe, expect, it, beforeEach, vi } from "vitest";
import { TimeoutError } from "p-timeout";
import { sleep, withTimeout } from "../../../src/utils/timeouts.js";

describe("Timeout Utilities", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	describe("sleep", () => {
		it("should resolve true once the delay has elapsed", async () => {
			let result: boolean | undefined;
			const sleeping = sleep(100).then((value) => {
				result = value;
			});

			await vi.advanceTimersByTimeAsync(99);
			expect(result).toBeUndefined();

			await vi.advanceTimersByTimeAsync(1);
			await sleeping;
			expect(result).toBe(true);
		});

		it("should resolve false as soon as the signal aborts", async () => {
			const controller = new AbortController();
			const sleeping = sleep(10_000, controller.signal);

			controller.abort();

			await expect(sleeping).resolves.toBe(false);
			expect(vi.getTimerCount()).toBe(0);
		});

		it("should resolve false immediately for an aborted signal", async () => {
			const controller = new AbortController();
			controller.abort();

			await expect(sleep(100, controller.signal)).resolves.toBe(false);
			expect(vi.getTimerCount()).toBe(0);
		});
	});

	describe("withTimeout", () => {
		it("should resolve promise within timeout", async () => {
			const fastPromise = Promise.resolve("success");

			const result = await withTimeout(fastPromise, 1000);
			expect(result).toBe("success");
		});

		it("should timeout slow promises", async () => {
			const slowPromise = new Promise((resolve) => {
				setTimeout(() => resolve("too late"), 2000);
			});

			const timeoutPromise = withTimeout(slowPromise, 1000);
			const failed = expect(timeoutPromise).rejects.toThrow(TimeoutError);

			await vi.advanceTimersByTimeAsync(1000);

			await failed;
		});

		it("should use custom timeout message", async () => {
			const slowPromise = new Promise(() => {});

			const timeoutPromise = withTimeout(slowPromise, 500, "Agent did not exit");
			const failed = expect(timeoutPromise).rejects.toThrow("Agent did not exit");

			await vi.advanceTimersByTimeAsync(500);

			await failed;
		});
	});
});
