/**
 * Main application: spawn the agent and relay between it and our own stdio
 */

import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { NdjsonTransport } from "./protocol/ndjsonTransport.js";
import { DebounceProxy } from "./proxy/debounceProxy.js";
import { runProxy } from "./proxy/runner.js";
import type { AppConfig } from "./utils/config.js";
import { Logger } from "./utils/logger.js";
import { TimeoutError, withTimeout } from "./utils/timeouts.js";

export interface ClientStdio {
	input: Readable;
	output: Writable;
}

export class DebounceApp {
	private logger: Logger;

	constructor(
		private readonly command: string,
		private readonly args: string[],
		private readonly config: AppConfig,
		private readonly stdio: ClientStdio = {
			input: process.stdin,
			output: process.stdout,
		},
	) {
		this.logger = new Logger("acp-debounce.log", config.verboseLogging);
		this.logger.logEvent("APP_LOGGING_CONFIG", {
			logFile: this.logger.getFilePath(),
			config: { ...config },
		});
	}

	/**
	 * Run until either side hangs up or the process is signalled.
	 * Resolves with the exit code to report.
	 */
	async start(): Promise<number> {
		const stopping = new AbortController();
		const onSignal = (signal: NodeJS.Signals) => {
			this.logger.logEvent("APP_SIGNAL", { signal });
			stopping.abort();
		};
		process.once("SIGINT", onSignal);
		process.once("SIGTERM", onSignal);

		const child = spawn(this.command, this.args, {
			stdio: ["pipe", "pipe", "inherit"],
		});
		this.logger.logEvent("APP_AGENT_SPAWNED", {
			command: this.command,
			args: this.args,
			pid: child.pid,
		});

		const spawnFailure: { error?: Error } = {};
		child.once("error", (error) => {
			spawnFailure.error = error;
			this.logger.logError("APP_AGENT_SPAWN_FAILED", error);
			stopping.abort();
		});
		const exited = new Promise<number>((resolve) => {
			child.once("exit", (code, signal) => {
				this.logger.logEvent("APP_AGENT_EXITED", { code, signal });
				resolve(code ?? 1);
			});
		});

		// Broken pipes surface through the failed write; keep them off the
		// process-level error path
		child.stdin.on("error", (error) =>
			this.logger.logError("APP_AGENT_STDIN_ERROR", error),
		);
		this.stdio.output.on("error", (error) =>
			this.logger.logError("APP_CLIENT_OUTPUT_ERROR", error),
		);

		const client = new NdjsonTransport(
			"client",
			this.stdio.input,
			this.stdio.output,
			this.logger,
		);
		const agent = new NdjsonTransport(
			"agent",
			child.stdout,
			child.stdin,
			this.logger,
		);

		let failed = false;
		try {
			const outcome = await runProxy(
				(links) =>
					new DebounceProxy({
						...links,
						intervalMs: this.config.flushIntervalMs,
						logger: this.logger,
					}),
				client,
				agent,
				{ logger: this.logger, signal: stopping.signal },
			);
			this.logger.logEvent("APP_PROXY_FINISHED", { outcome });
		} catch (error) {
			failed = true;
			this.logger.logError("APP_PROXY_FAILED", error);
			console.error("❌ Proxy failed:", error);
		} finally {
			process.off("SIGINT", onSignal);
			process.off("SIGTERM", onSignal);
		}

		if (spawnFailure.error) {
			await this.logger.close();
			throw spawnFailure.error;
		}

		const code = await this.waitForAgent(child.kill.bind(child), exited);
		await this.logger.close();
		return failed ? 1 : code;
	}

	private async waitForAgent(
		kill: (signal: NodeJS.Signals) => boolean,
		exited: Promise<number>,
	): Promise<number> {
		try {
			return await withTimeout(
				exited,
				this.config.shutdownGraceMs,
				`Agent did not exit within ${this.config.shutdownGraceMs}ms`,
			);
		} catch (error) {
			if (!(error instanceof TimeoutError)) throw error;
			this.logger.logEvent("APP_AGENT_TERMINATING", {
				graceMs: this.config.shutdownGraceMs,
			});
			kill("SIGTERM");
			return exited;
		}
	}
}
