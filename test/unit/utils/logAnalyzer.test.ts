import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { LogAnalyzer } from "../../../src/utils/logAnalyzer.js";

const LOG_LINES = [
	JSON.stringify({ type: "SESSION_START", timestamp: "2026-01-05T10:00:00.000Z", level: "DEBUG" }),
	JSON.stringify({
		type: "EVENT_BUNDLE",
		timestamp: "2026-01-05T10:00:01.000Z",
		event: "CHUNK_BUFFERED:s1",
		count: 19,
		duration: 40,
		firstTimestamp: "2026-01-05T10:00:00.960Z",
	}),
	JSON.stringify({
		type: "EVENT",
		timestamp: "2026-01-05T10:00:02.000Z",
		event: "CHUNK_BUFFERED:s1",
		data: { sessionId: "s1", length: 5 },
	}),
	JSON.stringify({
		type: "FLUSH",
		timestamp: "2026-01-05T10:00:03.000Z",
		sessionId: "s1",
		trigger: "response",
		length: 95,
	}),
	JSON.stringify({
		type: "FLUSH",
		timestamp: "2026-01-05T10:00:04.000Z",
		sessionId: "s2",
		trigger: "timer",
		length: 5,
	}),
	JSON.stringify({ type: "EVENT", timestamp: "2026-01-05T10:00:05.000Z", event: "PROXY_STOPPED", data: {} }),
	JSON.stringify({ type: "ERROR", timestamp: "2026-01-05T10:00:06.000Z", event: "TRANSPORT_PARSE_ERROR", error: "bad" }),
	'{"type":"FLUSH","timestamp":',
	"",
];

describe("LogAnalyzer", () => {
	it("should summarise chunks and flushes", () => {
		const analyzer = new LogAnalyzer("/unused.log");

		const report = analyzer.analyze(LogAnalyzer.parseLines(LOG_LINES));

		expect(report).toEqual({
			chunksBuffered: 20,
			flushes: { timer: 1, response: 1, event: 0 },
			charactersFlushed: 100,
			coalescingRatio: 10,
			errors: 1,
			sessions: {
				s1: { chunks: 20, flushes: 1, characters: 95 },
				s2: { chunks: 0, flushes: 1, characters: 5 },
			},
			firstTimestamp: "2026-01-05T10:00:01.000Z",
			lastTimestamp: "2026-01-05T10:00:06.000Z",
		});
	});

	it("should report no ratio before the first flush", () => {
		const report = new LogAnalyzer("/unused.log").analyze([]);

		expect(report.coalescingRatio).toBeNull();
		expect(LogAnalyzer.formatReport(report)).toBe(
			[
				"Chunks buffered:    0",
				"Flushes:            0 timer, 0 response, 0 event",
				"Characters flushed: 0",
				"Coalescing ratio:   n/a",
				"Errors:             0",
			].join("\n"),
		);
	});

	it("should format per-session lines", () => {
		const analyzer = new LogAnalyzer("/unused.log");
		const report = analyzer.analyze(LogAnalyzer.parseLines(LOG_LINES));

		const lines = LogAnalyzer.formatReport(report).split("\n");

		expect(lines[3]).toBe("Coalescing ratio:   10");
		expect(lines.slice(5)).toEqual([
			"",
			"Sessions:",
			"  s1: 20 chunks -> 1 flushes (95 chars)",
			"  s2: 0 chunks -> 1 flushes (5 chars)",
		]);
	});

	it("should read a log file from disk", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "acp-debounce-logs-"));
		const logFile = path.join(dir, "run.log");
		fs.writeFileSync(logFile, LOG_LINES.join("\n"), "utf-8");

		try {
			const report = new LogAnalyzer(logFile).analyze();
			expect(report.chunksBuffered).toBe(20);
			expect(report.errors).toBe(1);
		} finally {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});

	it("should fail clearly for a missing file", () => {
		const analyzer = new LogAnalyzer("/nonexistent/acp-debounce.log");

		expect(() => analyzer.parseLog()).toThrow(
			"Log file not found: /nonexistent/acp-debounce.log",
		);
	});
});
