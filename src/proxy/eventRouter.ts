/**
 * Buffering and flush policy for messages travelling from the agent to the client
 */

import {
	parsePromptRequest,
	parseResponseId,
	parseTextChunk,
	type TextChunk,
} from "../protocol/acp.js";
import type { JsonRpcId, WireMessage } from "../protocol/types.js";
import type { Logger } from "../utils/logger.js";
import { queueFlushes } from "./flush.js";
import type { OutboundChannel } from "./outboundChannel.js";
import type { SessionBufferStore } from "./sessionBufferStore.js";

export type AgentEvent =
	| ({ kind: "text" } & TextChunk)
	| { kind: "terminal"; sessionId: string; message: WireMessage }
	| { kind: "other"; message: WireMessage };

export class EventRouter {
	/** Request id of each in-flight `session/prompt`, mapped to its session */
	private readonly pendingPrompts = new Map<JsonRpcId, string>();

	constructor(
		private readonly store: SessionBufferStore,
		private readonly client: OutboundChannel,
		private readonly logger?: Logger,
	) {}

	/**
	 * Remember prompt requests travelling from the client so the agent's
	 * response can be tied back to its session
	 */
	trackRequest(message: WireMessage): void {
		const prompt = parsePromptRequest(message);
		if (!prompt) return;
		this.pendingPrompts.set(prompt.id, prompt.sessionId);
		this.logger?.logStateChange("PROMPT_TRACKED", {
			id: prompt.id,
			sessionId: prompt.sessionId,
		});
	}

	get pendingPromptCount(): number {
		return this.pendingPrompts.size;
	}

	/**
	 * Decide which policy applies. Resolving a terminal response consumes its
	 * tracker entry.
	 */
	classify(message: WireMessage): AgentEvent {
		const chunk = parseTextChunk(message);
		if (chunk) return { kind: "text", ...chunk };

		const id = parseResponseId(message);
		if (id !== null) {
			const sessionId = this.pendingPrompts.get(id);
			if (sessionId !== undefined) {
				this.pendingPrompts.delete(id);
				return { kind: "terminal", sessionId, message };
			}
		}

		return { kind: "other", message };
	}

	/**
	 * Apply the policy for one agent message. Resolves once everything it
	 * released has been written to the client; a write failure rejects.
	 */
	async route(message: WireMessage): Promise<void> {
		const event = this.classify(message);

		switch (event.kind) {
			case "text":
				this.store.append(event.sessionId, event.text, event.template);
				this.logger?.logBundledEvent(`CHUNK_BUFFERED:${event.sessionId}`, {
					sessionId: event.sessionId,
					length: event.text.length,
				});
				return;

			case "terminal": {
				const drained = this.store.drainOne(event.sessionId);
				const sends = queueFlushes(
					this.client,
					drained ? [drained] : [],
					"response",
					this.logger,
				);
				sends.push(this.client.send(event.message, "response"));
				await Promise.all(sends);
				return;
			}

			case "other": {
				const sends = queueFlushes(
					this.client,
					this.store.drainAll(),
					"event",
					this.logger,
				);
				sends.push(this.client.send(event.message, "event"));
				await Promise.all(sends);
				return;
			}
		}
	}
}
