/**
 * Debouncing proxy stage for ACP sessions
 *
 * Agents often send `agent_message_chunk` updates word by word. This stage
 * holds the text back per session and releases it as one chunk, either every
 * `intervalMs` or just before any other agent message, so the client never
 * sees a message ahead of text the agent produced before it.
 *
 * ```ts
 * const proxy = new DebounceProxy({ intervalMs: 100, client, agent });
 * proxy.start();
 * await proxy.fromAgent(message);
 * ```
 */

import type { WireMessage } from "../protocol/types.js";
import type { Logger } from "../utils/logger.js";
import { EventRouter } from "./eventRouter.js";
import { TimerFlusher } from "./flusher.js";
import { OutboundChannel } from "./outboundChannel.js";
import { SessionBufferStore } from "./sessionBufferStore.js";
import type { DebounceOptions, ProxyStage } from "./types.js";

export class DebounceProxy implements ProxyStage {
	readonly store = new SessionBufferStore();
	private readonly router: EventRouter;
	private readonly flusher: TimerFlusher;
	private readonly agent: OutboundChannel;
	private readonly logger?: Logger;

	constructor(options: DebounceOptions) {
		if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
			throw new RangeError(
				`Flush interval must be a positive number of milliseconds, got ${options.intervalMs}`,
			);
		}
		this.logger = options.logger;
		const client = new OutboundChannel("client", options.client, this.logger);
		this.agent = new OutboundChannel("agent", options.agent, this.logger);
		this.router = new EventRouter(this.store, client, this.logger);
		this.flusher = new TimerFlusher(
			options.intervalMs,
			this.store,
			client,
			this.logger,
		);
	}

	get done(): Promise<void> {
		return this.flusher.done;
	}

	get flusherState() {
		return this.flusher.state;
	}

	start(): void {
		this.flusher.start();
		this.logger?.logEvent("PROXY_STARTED", {});
	}

	async stop(): Promise<void> {
		await this.flusher.stop();
		this.logger?.logEvent("PROXY_STOPPED", {
			sessions: this.store.size,
			pendingPrompts: this.router.pendingPromptCount,
		});
	}

	async fromClient(message: WireMessage): Promise<void> {
		this.router.trackRequest(message);
		await this.agent.send(message, "client");
	}

	fromAgent(message: WireMessage): Promise<void> {
		return this.router.route(message);
	}

	/** Release all buffered text now, as a timer tick would */
	flush(): Promise<void> {
		return this.flusher.flushNow();
	}
}
