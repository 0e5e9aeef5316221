import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { Side, WireMessage } from "../protocol/types.js";

type LogLevel = "error" | "warn" | "info" | "debug" | "verbose";

const LEVELS: LogLevel[] = ["error", "warn", "info", "debug", "verbose"];

export type FlushTrigger = "timer" | "response" | "event";

export type LogData = Record<string, unknown>;

function isLogLevel(value: string | undefined): value is LogLevel {
	return LEVELS.some((level) => level === value);
}

export function defaultLogDir(): string {
	return path.join(os.homedir(), ".acp-debounce", "logs");
}

/**
 * JSONL file logger for debugging proxy sessions
 * Controlled by LOG_LEVEL environment variable (error|warn|info|debug|verbose)
 * Disabled by default. stdout carries the protocol, so nothing is ever
 * written there.
 * Set LOG_LEVEL=verbose or use --verbose flag to log every relayed message
 */
export class Logger {
	private logFile: string;
	private logStream: fs.WriteStream | null = null;
	private logLevel: LogLevel | null;
	private verbose = false;

	constructor(filename = "acp-debounce.log", verbose = false) {
		this.verbose = verbose;
		const envLevel = process.env.LOG_LEVEL?.toLowerCase();
		if (verbose) {
			this.logLevel = "verbose";
		} else if (isLogLevel(envLevel)) {
			this.logLevel = envLevel;
			if (envLevel === "verbose") {
				this.verbose = true;
			}
		} else {
			this.logLevel = null;
		}

		// Only initialize file logging if a level is set
		if (this.logLevel) {
			const defaultDir = defaultLogDir();
			const configuredPath = process.env.LOG_FILE;
			this.logFile = configuredPath
				? path.isAbsolute(configuredPath)
					? configuredPath
					: path.join(defaultDir, configuredPath)
				: path.join(defaultDir, filename);
			const parentDir = path.dirname(this.logFile);
			if (!fs.existsSync(parentDir))
				fs.mkdirSync(parentDir, { recursive: true });

			this.logStream = fs.createWriteStream(this.logFile, { flags: "w" });
			this.writeJsonl({
				type: "SESSION_START",
				timestamp: new Date().toISOString(),
				level: this.logLevel.toUpperCase(),
				pid: process.pid,
				cwd: process.cwd(),
			});
		} else {
			this.logFile = "";
		}
	}

	private writeJsonl(data: LogData): void {
		if (!this.logStream) return;
		this.logStream.write(`${JSON.stringify(data)}\n`);
	}

	private shouldLog(level: LogLevel): boolean {
		if (!this.logLevel || !this.logStream) return false;
		return LEVELS.indexOf(level) <= LEVELS.indexOf(this.logLevel);
	}

	logEvent(event: string, data: LogData = {}) {
		if (!this.shouldLog("info")) return;

		this.writeJsonl({
			timestamp: new Date().toISOString(),
			type: "EVENT",
			event,
			data,
		});
	}

	logError(event: string, error: unknown, data: LogData = {}) {
		if (!this.shouldLog("error")) return;

		this.writeJsonl({
			timestamp: new Date().toISOString(),
			type: "ERROR",
			event,
			error:
				error instanceof Error
					? { name: error.name, message: error.message }
					: String(error),
			data,
		});
	}

	logFlush(sessionId: string, trigger: FlushTrigger, length: number) {
		if (!this.shouldLog("info")) return;

		this.writeJsonl({
			timestamp: new Date().toISOString(),
			type: "FLUSH",
			sessionId,
			trigger,
			length,
		});
	}

	// Track repeating events with bundling
	private eventBundles = new Map<
		string,
		{
			count: number;
			firstTimestamp: string;
			lastTimestamp: string;
			lastData?: LogData;
		}
	>();

	logBundledEvent(eventKey: string, data?: LogData, bundleWindowMs = 5000) {
		if (!this.shouldLog("debug")) return;

		const now = new Date();
		const timestamp = now.toISOString();

		const existing = this.eventBundles.get(eventKey);
		if (existing) {
			const timeDiff =
				now.getTime() - new Date(existing.firstTimestamp).getTime();
			if (timeDiff < bundleWindowMs) {
				existing.count++;
				existing.lastTimestamp = timestamp;
				existing.lastData = data;
				return;
			}
			this.flushEventBundle(eventKey);
		}

		this.eventBundles.set(eventKey, {
			count: 1,
			firstTimestamp: timestamp,
			lastTimestamp: timestamp,
			lastData: data,
		});

		setTimeout(() => this.flushEventBundle(eventKey), bundleWindowMs).unref();
	}

	private flushEventBundle(eventKey: string) {
		const bundle = this.eventBundles.get(eventKey);
		if (!bundle || !this.logStream) return;

		this.eventBundles.delete(eventKey);

		if (bundle.count === 1) {
			this.writeJsonl({
				timestamp: bundle.lastTimestamp,
				type: "EVENT",
				event: eventKey,
				data: bundle.lastData,
			});
		} else {
			const duration =
				new Date(bundle.lastTimestamp).getTime() -
				new Date(bundle.firstTimestamp).getTime();
			this.writeJsonl({
				timestamp: bundle.lastTimestamp,
				type: "EVENT_BUNDLE",
				event: eventKey,
				count: bundle.count,
				duration,
				firstTimestamp: bundle.firstTimestamp,
				lastData: bundle.lastData,
			});
		}
	}

	logStateChange(description: string, state: LogData) {
		if (!this.shouldLog("debug")) return;

		this.writeJsonl({
			timestamp: new Date().toISOString(),
			type: "STATE_CHANGE",
			description,
			state,
		});
	}

	// Helper to truncate long messages when not in verbose mode
	private truncateMessage(message: WireMessage, maxLength = 500): WireMessage {
		const str = typeof message === "string" ? message : JSON.stringify(message);
		if (str.length <= maxLength) return message;
		return `${str.substring(0, maxLength)}... (truncated)`;
	}

	/**
	 * Log a relayed message; `to` names the side it was forwarded to
	 */
	logMessage(to: Side, message: WireMessage, context?: string) {
		const level = this.verbose ? "verbose" : "debug";
		if (!this.shouldLog(level)) return;

		this.writeJsonl({
			timestamp: new Date().toISOString(),
			type: "MESSAGE",
			to,
			context,
			message: this.verbose ? message : this.truncateMessage(message),
		});
	}

	getFilePath(): string | null {
		return this.logStream ? this.logFile : null;
	}

	/**
	 * Write out pending bundles and close the file; resolves once flushed
	 */
	close(): Promise<void> {
		for (const eventKey of [...this.eventBundles.keys()]) {
			this.flushEventBundle(eventKey);
		}
		const stream = this.logStream;
		if (!stream) return Promise.resolve();
		this.logStream = null;
		return new Promise<void>((resolve) => stream.end(() => resolve()));
	}
}
