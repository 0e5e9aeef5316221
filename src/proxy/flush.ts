import { synthesizeTextChunk } from "../protocol/acp.js";
import type { FlushTrigger, Logger } from "../utils/logger.js";
import type { OutboundChannel } from "./outboundChannel.js";
import type { DrainedText } from "./sessionBufferStore.js";

/**
 * Queue one coalesced chunk per drained session, in drain order. The sends
 * are queued synchronously so nothing can slip in between them.
 */
export function queueFlushes(
	channel: OutboundChannel,
	drained: readonly DrainedText[],
	trigger: FlushTrigger,
	logger?: Logger,
): Promise<void>[] {
	return drained.map(({ sessionId, text, template }) => {
		logger?.logFlush(sessionId, trigger, text.length);
		return channel.send(synthesizeTextChunk(template, text), `flush:${trigger}`);
	});
}
