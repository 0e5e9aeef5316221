import { describe, expect, it } from "vitest";
import { OutboundChannel } from "../../../src/proxy/outboundChannel.js";
import type { MessageSink, WireMessage } from "../../../src/protocol/types.js";
import { RecordingSink } from "../../mocks/acpMessages.js";

describe("OutboundChannel", () => {
	it("should deliver messages in the order they were sent", async () => {
		const delivered: WireMessage[] = [];
		const delays = [30, 0, 10];
		let call = 0;
		// Later writes finish faster than earlier ones
		const sink: MessageSink = {
			send: async (message) => {
				const delay = delays[call++] ?? 0;
				await new Promise((resolve) => setTimeout(resolve, delay));
				delivered.push(message);
			},
		};
		const channel = new OutboundChannel("client", sink);

		await Promise.all([channel.send(1), channel.send(2), channel.send(3)]);

		expect(delivered).toEqual([1, 2, 3]);
	});

	it("should wait for an earlier held write before delivering later ones", async () => {
		const sink = new RecordingSink();
		const channel = new OutboundChannel("client", sink);
		sink.hold();

		const first = channel.send("first");
		const second = channel.send("second");
		await Promise.resolve();
		expect(sink.messages).toEqual([]);

		sink.release();
		await Promise.all([first, second]);

		expect(sink.messages).toEqual(["first", "second"]);
	});

	it("should fail every send after a write has failed", async () => {
		const sink = new RecordingSink();
		const channel = new OutboundChannel("client", sink);
		sink.failWith = new Error("pipe closed");

		await expect(channel.send("lost")).rejects.toThrow("pipe closed");

		sink.failWith = null;
		await expect(channel.send("after")).rejects.toThrow("pipe closed");
		expect(sink.messages).toEqual([]);
	});
});
