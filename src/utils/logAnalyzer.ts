import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { defaultLogDir, type FlushTrigger } from "./logger.js";

const CHUNK_EVENT_PREFIX = "CHUNK_BUFFERED:";

const flushEntrySchema = z.object({
	type: z.literal("FLUSH"),
	timestamp: z.string(),
	sessionId: z.string(),
	trigger: z.enum(["timer", "response", "event"]),
	length: z.number(),
});

const eventEntrySchema = z.object({
	type: z.literal("EVENT"),
	timestamp: z.string(),
	event: z.string(),
});

const bundleEntrySchema = z.object({
	type: z.literal("EVENT_BUNDLE"),
	timestamp: z.string(),
	event: z.string(),
	count: z.number(),
});

const errorEntrySchema = z.object({
	type: z.literal("ERROR"),
	timestamp: z.string(),
	event: z.string(),
});

const logEntrySchema = z.discriminatedUnion("type", [
	flushEntrySchema,
	eventEntrySchema,
	bundleEntrySchema,
	errorEntrySchema,
]);

type LogEntry = z.infer<typeof logEntrySchema>;

export interface SessionStats {
	chunks: number;
	flushes: number;
	characters: number;
}

export interface FlushReport {
	chunksBuffered: number;
	flushes: Record<FlushTrigger, number>;
	charactersFlushed: number;
	/** Chunks received per chunk forwarded; null before the first flush */
	coalescingRatio: number | null;
	errors: number;
	sessions: Record<string, SessionStats>;
	firstTimestamp?: string;
	lastTimestamp?: string;
}

export class LogAnalyzer {
	private logFile: string;

	constructor(logFile?: string) {
		this.logFile = logFile ?? path.join(defaultLogDir(), "acp-debounce.log");
	}

	getLogFile(): string {
		return this.logFile;
	}

	/**
	 * Parse the JSONL log, keeping only the entry types the report uses
	 */
	parseLog(): LogEntry[] {
		if (!fs.existsSync(this.logFile)) {
			throw new Error(`Log file not found: ${this.logFile}`);
		}

		const content = fs.readFileSync(this.logFile, "utf-8");
		return LogAnalyzer.parseLines(content.split("\n"));
	}

	static parseLines(lines: string[]): LogEntry[] {
		const entries: LogEntry[] = [];
		for (const line of lines) {
			if (line.trim() === "") continue;
			let json: unknown;
			try {
				json = JSON.parse(line);
			} catch {
				// Partially written last line of a live log
				continue;
			}
			const parsed = logEntrySchema.safeParse(json);
			if (parsed.success) entries.push(parsed.data);
		}
		return entries;
	}

	analyze(entries: LogEntry[] = this.parseLog()): FlushReport {
		const report: FlushReport = {
			chunksBuffered: 0,
			flushes: { timer: 0, response: 0, event: 0 },
			charactersFlushed: 0,
			coalescingRatio: null,
			errors: 0,
			sessions: {},
		};
		const session = (sessionId: string): SessionStats => {
			report.sessions[sessionId] ??= { chunks: 0, flushes: 0, characters: 0 };
			return report.sessions[sessionId];
		};

		for (const entry of entries) {
			report.firstTimestamp ??= entry.timestamp;
			report.lastTimestamp = entry.timestamp;

			switch (entry.type) {
				case "FLUSH": {
					report.flushes[entry.trigger]++;
					report.charactersFlushed += entry.length;
					const stats = session(entry.sessionId);
					stats.flushes++;
					stats.characters += entry.length;
					break;
				}

				case "EVENT":
				case "EVENT_BUNDLE": {
					if (!entry.event.startsWith(CHUNK_EVENT_PREFIX)) break;
					const count = entry.type === "EVENT_BUNDLE" ? entry.count : 1;
					report.chunksBuffered += count;
					session(entry.event.slice(CHUNK_EVENT_PREFIX.length)).chunks += count;
					break;
				}

				case "ERROR":
					report.errors++;
					break;
			}
		}

		const totalFlushes =
			report.flushes.timer + report.flushes.response + report.flushes.event;
		if (totalFlushes > 0) {
			report.coalescingRatio =
				Math.round((report.chunksBuffered / totalFlushes) * 100) / 100;
		}

		return report;
	}

	/**
	 * Render a report as plain text
	 */
	static formatReport(report: FlushReport): string {
		const lines = [
			`Chunks buffered:    ${report.chunksBuffered}`,
			`Flushes:            ${report.flushes.timer} timer, ${report.flushes.response} response, ${report.flushes.event} event`,
			`Characters flushed: ${report.charactersFlushed}`,
			`Coalescing ratio:   ${report.coalescingRatio ?? "n/a"}`,
			`Errors:             ${report.errors}`,
		];

		const sessionIds = Object.keys(report.sessions).sort();
		if (sessionIds.length > 0) {
			lines.push("", "Sessions:");
			for (const sessionId of sessionIds) {
				const stats = report.sessions[sessionId];
				lines.push(
					`  ${sessionId}: ${stats.chunks} chunks -> ${stats.flushes} flushes (${stats.characters} chars)`,
				);
			}
		}

		return lines.join("\n");
	}
}
