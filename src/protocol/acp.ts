/**
 * Zod schemas for the few Agent Client Protocol messages the proxy inspects
 *
 * Every schema passes unknown keys through: recognising a message must never
 * change what is relayed.
 */

import { z } from "zod";
import type { JsonObject, JsonRpcId, JsonValue, WireMessage } from "./types.js";

export const SESSION_UPDATE_METHOD = "session/update";
export const SESSION_PROMPT_METHOD = "session/prompt";
export const AGENT_MESSAGE_CHUNK = "agent_message_chunk";

const jsonRpcIdSchema = z.union([z.string(), z.number()]);

/**
 * `session/update` notification carrying an `agent_message_chunk` with text content
 */
const textChunkSchema = z
	.object({
		method: z.literal(SESSION_UPDATE_METHOD),
		params: z
			.object({
				sessionId: z.string(),
				update: z
					.object({
						sessionUpdate: z.literal(AGENT_MESSAGE_CHUNK),
						content: z
							.object({
								type: z.literal("text"),
								text: z.string(),
							})
							.passthrough(),
					})
					.passthrough(),
			})
			.passthrough(),
	})
	.passthrough()
	.refine((message) => !("id" in message), "Notifications carry no id");

/**
 * `session/prompt` request sent by the client
 */
const promptRequestSchema = z
	.object({
		id: jsonRpcIdSchema,
		method: z.literal(SESSION_PROMPT_METHOD),
		params: z.object({ sessionId: z.string() }).passthrough(),
	})
	.passthrough();

/**
 * Any JSON-RPC response, successful or not
 */
const responseSchema = z
	.object({
		id: jsonRpcIdSchema,
		method: z.undefined(),
	})
	.passthrough()
	.refine(
		(message) => "result" in message || "error" in message,
		"Responses carry a result or an error",
	);

export interface TextChunk {
	sessionId: string;
	text: string;
	template: JsonObject;
}

function isJsonObject(
	value: JsonValue | undefined,
): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract session and text from an agent text chunk, or null for anything else
 */
export function parseTextChunk(message: WireMessage): TextChunk | null {
	if (!isJsonObject(message)) return null;
	const parsed = textChunkSchema.safeParse(message);
	if (!parsed.success) return null;
	return {
		sessionId: parsed.data.params.sessionId,
		text: parsed.data.params.update.content.text,
		template: message,
	};
}

export function parsePromptRequest(
	message: WireMessage,
): { id: JsonRpcId; sessionId: string } | null {
	const parsed = promptRequestSchema.safeParse(message);
	if (!parsed.success) return null;
	return { id: parsed.data.id, sessionId: parsed.data.params.sessionId };
}

export function parseResponseId(message: WireMessage): JsonRpcId | null {
	const parsed = responseSchema.safeParse(message);
	return parsed.success ? parsed.data.id : null;
}

function withValueAt(
	target: JsonObject,
	path: readonly string[],
	value: JsonValue,
): JsonObject {
	const [head, ...rest] = path;
	if (head === undefined) return target;
	if (rest.length === 0) return { ...target, [head]: value };
	const child = target[head];
	return {
		...target,
		[head]: withValueAt(isJsonObject(child) ? child : {}, rest, value),
	};
}

/**
 * Build the coalesced chunk sent downstream: a copy of the latest chunk the
 * agent sent for the session, with its text replaced
 */
export function synthesizeTextChunk(
	template: JsonObject,
	text: string,
): JsonObject {
	return withValueAt(template, ["params", "update", "content", "text"], text);
}
