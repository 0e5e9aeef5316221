/**
 * Error types raised while relaying messages
 */

import type { Side } from "../protocol/types.js";

export class ForwardingError extends Error {
	constructor(
		public readonly target: Side,
		message = `Failed to forward message to ${target}`,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ForwardingError";
	}
}

export class TransportClosedError extends Error {
	constructor(message = "Transport is closed") {
		super(message);
		this.name = "TransportClosedError";
	}
}
