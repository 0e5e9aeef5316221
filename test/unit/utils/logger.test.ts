import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { Logger } from "../../../src/utils/logger.js";

describe("Logger", () => {
	it("should stay disabled without LOG_LEVEL", () => {
		vi.stubEnv("LOG_LEVEL", "");

		const logger = new Logger("unused.log");

		expect(logger.getFilePath()).toBeNull();
		expect(() => logger.logFlush("s1", "timer", 3)).not.toThrow();
		return logger.close();
	});

	it("should write JSONL entries at or above the configured level", async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "acp-debounce-logger-"));
		const logFile = path.join(dir, "proxy.log");
		vi.stubEnv("LOG_LEVEL", "info");
		vi.stubEnv("LOG_FILE", logFile);

		try {
			const logger = new Logger();
			expect(logger.getFilePath()).toBe(logFile);

			logger.logFlush("s1", "response", 11);
			logger.logStateChange("FLUSHER_STATE", { state: "idle" });
			logger.logEvent("PROXY_STOPPED", { sessions: 1 });

			await logger.close();

			const entries = fs
				.readFileSync(logFile, "utf-8")
				.trim()
				.split("\n")
				.map((line) => JSON.parse(line));

			expect(entries.map((entry) => entry.type)).toEqual([
				"SESSION_START",
				"FLUSH",
				"EVENT",
			]);
			expect(entries[1]).toMatchObject({
				sessionId: "s1",
				trigger: "response",
				length: 11,
			});
		} finally {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});
});
