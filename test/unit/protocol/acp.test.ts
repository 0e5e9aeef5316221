import { describe, expect, it } from "vitest";
import {
	parsePromptRequest,
	parseResponseId,
	parseTextChunk,
	synthesizeTextChunk,
} from "../../../src/protocol/acp.js";
import {
	promptRequest,
	promptResponse,
	textChunk,
	toolCallUpdate,
} from "../../mocks/acpMessages.js";

describe("ACP message recognition", () => {
	describe("parseTextChunk", () => {
		it("should extract session and text from an agent text chunk", () => {
			const message = textChunk("s1", "Hello");

			expect(parseTextChunk(message)).toEqual({
				sessionId: "s1",
				text: "Hello",
				template: message,
			});
		});

		it("should reject other session updates", () => {
			expect(parseTextChunk(toolCallUpdate("s1", "call-1"))).toBeNull();
			expect(
				parseTextChunk({
					jsonrpc: "2.0",
					method: "session/update",
					params: {
						sessionId: "s1",
						update: {
							sessionUpdate: "agent_thought_chunk",
							content: { type: "text", text: "hmm" },
						},
					},
				}),
			).toBeNull();
		});

		it("should reject chunks that do not carry text", () => {
			expect(
				parseTextChunk({
					jsonrpc: "2.0",
					method: "session/update",
					params: {
						sessionId: "s1",
						update: {
							sessionUpdate: "agent_message_chunk",
							content: { type: "image", data: "AAAA", mimeType: "image/png" },
						},
					},
				}),
			).toBeNull();
		});

		it("should reject a session/update that carries an id", () => {
			expect(parseTextChunk({ ...textChunk("s1", "x"), id: 4 })).toBeNull();
		});

		it("should reject values that are not objects", () => {
			expect(parseTextChunk([textChunk("s1", "x")])).toBeNull();
			expect(parseTextChunk("session/update")).toBeNull();
			expect(parseTextChunk(null)).toBeNull();
		});
	});

	describe("parsePromptRequest", () => {
		it("should read the id and session of a prompt request", () => {
			expect(parsePromptRequest(promptRequest(3, "s1"))).toEqual({
				id: 3,
				sessionId: "s1",
			});
			expect(parsePromptRequest(promptRequest("req-a", "s2"))).toEqual({
				id: "req-a",
				sessionId: "s2",
			});
		});

		it("should ignore other requests", () => {
			expect(
				parsePromptRequest({
					jsonrpc: "2.0",
					id: 1,
					method: "session/new",
					params: { cwd: "/tmp" },
				}),
			).toBeNull();
		});
	});

	describe("parseResponseId", () => {
		it("should return the id of results and errors", () => {
			expect(parseResponseId(promptResponse(9))).toBe(9);
			expect(
				parseResponseId({
					jsonrpc: "2.0",
					id: "x",
					error: { code: -32603, message: "Internal error" },
				}),
			).toBe("x");
		});

		it("should not mistake requests or bare ids for responses", () => {
			expect(parseResponseId(promptRequest(9, "s1"))).toBeNull();
			expect(parseResponseId({ jsonrpc: "2.0", id: 9 })).toBeNull();
		});
	});

	describe("synthesizeTextChunk", () => {
		it("should replace only the text of the template", () => {
			const template = textChunk("s1", "last", { annotated: true });

			expect(synthesizeTextChunk(template, "all of it")).toEqual(
				textChunk("s1", "all of it", { annotated: true }),
			);
			// The template itself is left untouched
			expect(parseTextChunk(template)?.text).toBe("last");
		});
	});
});
