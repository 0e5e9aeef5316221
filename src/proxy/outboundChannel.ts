/**
 * Ordered path to one side of the proxy
 *
 * The router and the flusher both write to the client. Sends are chained so
 * they reach the sink in exactly the order `send` was called, whichever of
 * them is still awaiting a previous write.
 */

import type { MessageSink, Side, WireMessage } from "../protocol/types.js";
import type { Logger } from "../utils/logger.js";

export class OutboundChannel implements MessageSink {
	private tail: Promise<void> = Promise.resolve();

	constructor(
		private readonly side: Side,
		private readonly sink: MessageSink,
		private readonly logger?: Logger,
	) {}

	/**
	 * Queue a message behind every earlier send. Once a write fails the chain
	 * stays rejected: later sends fail with the same error.
	 */
	send(message: WireMessage, context?: string): Promise<void> {
		const next = this.tail.then(async () => {
			await this.sink.send(message);
			this.logger?.logMessage(this.side, message, context);
		});
		this.tail = next;
		return next;
	}
}
