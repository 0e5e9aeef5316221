/**
 * Background loop releasing buffered text on a fixed period
 */

import type { Logger } from "../utils/logger.js";
import { sleep } from "../utils/timeouts.js";
import { queueFlushes } from "./flush.js";
import type { OutboundChannel } from "./outboundChannel.js";
import type { SessionBufferStore } from "./sessionBufferStore.js";

export type FlusherState = "stopped" | "idle" | "flushing";

export class TimerFlusher {
	private controller: AbortController | null = null;
	private task: Promise<void> | null = null;
	private currentState: FlusherState = "stopped";

	constructor(
		private readonly intervalMs: number,
		private readonly store: SessionBufferStore,
		private readonly client: OutboundChannel,
		private readonly logger?: Logger,
	) {}

	get state(): FlusherState {
		return this.currentState;
	}

	/**
	 * Settles when the loop ends: resolves after `stop()`, rejects with the
	 * write error if a flush failed. Text drained by a failed flush is gone.
	 */
	get done(): Promise<void> {
		return this.task ?? Promise.resolve();
	}

	/**
	 * Begin ticking. No-op while the loop is running; once it has ended,
	 * whether stopped or failed, a fresh loop is started.
	 */
	start(): void {
		if (this.currentState !== "stopped") return;
		const controller = new AbortController();
		this.controller = controller;
		const task = this.loop(controller.signal);
		// Failure is reported through `done`, read or not
		task.catch((error: unknown) => {
			this.logger?.logError("FLUSHER_FAILED", error);
		});
		this.task = task;
	}

	/**
	 * Cancel between ticks. A flush already being written is allowed to
	 * finish; buffered text is not flushed on the way out.
	 */
	async stop(): Promise<void> {
		this.controller?.abort();
		if (this.task) {
			await Promise.allSettled([this.task]);
		}
	}

	/**
	 * Drain every buffer and write the coalesced chunks to the client
	 */
	async flushNow(): Promise<void> {
		await Promise.all(
			queueFlushes(this.client, this.store.drainAll(), "timer", this.logger),
		);
	}

	private async loop(signal: AbortSignal): Promise<void> {
		this.setState("idle");
		try {
			while (await sleep(this.intervalMs, signal)) {
				this.setState("flushing");
				await this.flushNow();
				if (signal.aborted) break;
				this.setState("idle");
			}
		} finally {
			this.setState("stopped");
		}
	}

	private setState(state: FlusherState): void {
		this.currentState = state;
		this.logger?.logStateChange("FLUSHER_STATE", { state });
	}
}
