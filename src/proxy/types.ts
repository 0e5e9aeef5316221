/**
 * Composition contract for proxy stages
 *
 * A stage sits between a client-facing sink and an agent-facing sink and is
 * fed messages from both directions. It may relay, hold back or add messages;
 * it never depends on what carries them.
 */

import type { MessageSink, WireMessage } from "../protocol/types.js";
import type { Logger } from "../utils/logger.js";

export interface ProxyStage {
	/** Handle a message travelling from the client towards the agent */
	fromClient(message: WireMessage): Promise<void>;

	/** Handle a message travelling from the agent towards the client */
	fromAgent(message: WireMessage): Promise<void>;

	/** Start background work (timers) */
	start(): void;

	/** Stop background work; resolves once it has wound down */
	stop(): Promise<void>;

	/** Rejects if background work fails */
	readonly done: Promise<void>;
}

export interface ProxyLinks {
	/** Where messages for the client go */
	client: MessageSink;
	/** Where messages for the agent go */
	agent: MessageSink;
}

export interface DebounceOptions extends ProxyLinks {
	/** Flush period in milliseconds */
	intervalMs: number;
	logger?: Logger;
}

/**
 * View a stage as a sink, so it can be the next hop of another stage.
 * `direction` is the side the messages are travelling towards.
 */
export function stageAsSink(
	stage: ProxyStage,
	direction: "toAgent" | "toClient",
): MessageSink {
	return {
		send: (message) =>
			direction === "toAgent"
				? stage.fromClient(message)
				: stage.fromAgent(message),
	};
}
