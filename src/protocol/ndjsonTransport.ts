/**
 * Newline-delimited JSON framing over a pair of Node streams
 */

import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { ForwardingError, TransportClosedError } from "../types/errors.js";
import type { Logger } from "../utils/logger.js";
import type { MessageSink, Side, WireMessage } from "./types.js";

/**
 * Line each parsed message was read from. Writing it back verbatim keeps
 * values JSON.parse cannot represent exactly, such as integers above 2^53.
 * Messages built by the proxy have no entry and are serialized.
 */
const sourceLines = new WeakMap<object, string>();

function serialize(message: WireMessage): string {
	if (typeof message === "object" && message !== null) {
		const line = sourceLines.get(message);
		if (line !== undefined) return line;
	}
	return JSON.stringify(message);
}

export class NdjsonTransport implements MessageSink, AsyncIterable<WireMessage> {
	private closed = false;
	private readonly reading = new AbortController();

	/**
	 * @param peer - the side at the other end of these streams
	 */
	constructor(
		readonly peer: Side,
		private readonly input: Readable,
		private readonly output: Writable,
		private readonly logger?: Logger,
	) {}

	/**
	 * Inbound messages in arrival order. Ends when the input ends or the
	 * transport is closed; lines that are not JSON are logged and skipped.
	 */
	async *[Symbol.asyncIterator](): AsyncIterator<WireMessage> {
		if (this.closed) return;
		const lines = readline.createInterface({
			input: this.input,
			crlfDelay: Number.POSITIVE_INFINITY,
			signal: this.reading.signal,
		});
		try {
			for await (const line of lines) {
				const trimmed = line.trim();
				if (!trimmed) continue;
				let message: WireMessage;
				try {
					message = JSON.parse(trimmed);
				} catch (error) {
					this.logger?.logError("TRANSPORT_PARSE_ERROR", error, {
						peer: this.peer,
						line: trimmed.slice(0, 200),
					});
					continue;
				}
				if (typeof message === "object" && message !== null) {
					sourceLines.set(message, trimmed);
				}
				yield message;
			}
		} finally {
			lines.close();
		}
	}

	send(message: WireMessage): Promise<void> {
		if (this.closed || this.output.writableEnded || this.output.destroyed) {
			return Promise.reject(
				new ForwardingError(this.peer, undefined, {
					cause: new TransportClosedError(),
				}),
			);
		}

		return new Promise<void>((resolve, reject) => {
			this.output.write(`${serialize(message)}\n`, (error) => {
				if (error) {
					reject(
						new ForwardingError(
							this.peer,
							`Failed to forward message to ${this.peer}: ${error.message}`,
							{ cause: error },
						),
					);
				} else {
					resolve();
				}
			});
		});
	}

	/**
	 * Stop reading and end the output stream
	 */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		this.reading.abort();
		if (!this.output.writableEnded) {
			this.output.end();
		}
	}
}
