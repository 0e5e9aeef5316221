/**
 * Per-session text accumulators shared by the event router and the flusher
 *
 * Every operation is synchronous, so each one runs to completion on the event
 * loop without interleaving with another: an append can never land between a
 * drain's read and its reset.
 */

import type { JsonObject } from "../protocol/types.js";

interface BufferedSession {
	text: string;
	/** Latest chunk notification for the session, reused when flushing */
	template: JsonObject;
}

export interface DrainedText {
	sessionId: string;
	text: string;
	template: JsonObject;
}

export class SessionBufferStore {
	private readonly sessions = new Map<string, BufferedSession>();

	append(sessionId: string, text: string, template: JsonObject): void {
		const buffered = this.sessions.get(sessionId);
		if (buffered) {
			buffered.text += text;
			buffered.template = template;
		} else {
			this.sessions.set(sessionId, { text, template });
		}
	}

	/**
	 * Take the pending text of every session that has some, leaving each
	 * buffer empty
	 */
	drainAll(): DrainedText[] {
		const drained: DrainedText[] = [];
		for (const [sessionId, buffered] of this.sessions) {
			if (!buffered.text) continue;
			drained.push({ sessionId, text: buffered.text, template: buffered.template });
			buffered.text = "";
		}
		return drained;
	}

	drainOne(sessionId: string): DrainedText | undefined {
		const buffered = this.sessions.get(sessionId);
		if (!buffered?.text) return undefined;
		const text = buffered.text;
		buffered.text = "";
		return { sessionId, text, template: buffered.template };
	}

	pendingText(sessionId: string): string {
		return this.sessions.get(sessionId)?.text ?? "";
	}

	/** Number of sessions ever seen, idle ones included */
	get size(): number {
		return this.sessions.size;
	}
}
