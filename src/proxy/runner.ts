/**
 * Run a proxy stage standalone between two transports
 */

import type { MessageSink, WireMessage } from "../protocol/types.js";
import type { Logger } from "../utils/logger.js";
import type { ProxyLinks, ProxyStage } from "./types.js";

export interface ProxyTransport extends MessageSink, AsyncIterable<WireMessage> {
	close(): void;
}

export type RunOutcome = "client-closed" | "agent-closed" | "stopped";

export interface RunOptions {
	logger?: Logger;
	/** Abort to tear the proxy down from outside */
	signal?: AbortSignal;
}

async function pump(
	source: AsyncIterable<WireMessage>,
	handle: (message: WireMessage) => Promise<void>,
): Promise<void> {
	// One message is fully handled before the next one is read
	for await (const message of source) {
		await handle(message);
	}
}

function whenAborted(signal: AbortSignal | undefined): {
	stopped: Promise<"stopped">;
	dispose: () => void;
} {
	let dispose = () => {};
	const stopped = new Promise<"stopped">((resolve) => {
		if (!signal) return;
		if (signal.aborted) {
			resolve("stopped");
			return;
		}
		const onAbort = () => resolve("stopped");
		signal.addEventListener("abort", onAbort, { once: true });
		dispose = () => signal.removeEventListener("abort", onAbort);
	});
	return { stopped, dispose };
}

/**
 * Relay between `client` and `agent` through the stage built by `createStage`
 *
 * Resolves when either side's input ends or `signal` aborts; rejects when a
 * relay or the stage's background work fails. Either way the stage is stopped
 * and both transports are closed first. Text still buffered is dropped.
 */
export async function runProxy(
	createStage: (links: ProxyLinks) => ProxyStage,
	client: ProxyTransport,
	agent: ProxyTransport,
	options: RunOptions = {},
): Promise<RunOutcome> {
	const { logger, signal } = options;
	const stage = createStage({ client, agent });
	stage.start();

	const fromClient = pump(client, (message) => stage.fromClient(message)).then(
		(): RunOutcome => "client-closed",
	);
	const fromAgent = pump(agent, (message) => stage.fromAgent(message)).then(
		(): RunOutcome => "agent-closed",
	);
	const background = stage.done.then((): RunOutcome => "stopped");
	const aborted = whenAborted(signal);

	try {
		const outcome = await Promise.race([
			fromClient,
			fromAgent,
			background,
			aborted.stopped,
		]);
		logger?.logEvent("PROXY_RUN_ENDED", { outcome });
		return outcome;
	} catch (error) {
		logger?.logError("PROXY_RUN_FAILED", error);
		throw error;
	} finally {
		aborted.dispose();
		await stage.stop();
		client.close();
		agent.close();
		// Closing ends both inputs; wait for the pumps so none outlives the run
		await Promise.allSettled([fromClient, fromAgent, background]);
	}
}
