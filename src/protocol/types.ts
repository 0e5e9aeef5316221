/**
 * Wire-level types for JSON-RPC messages exchanged between client and agent
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
	| JsonPrimitive
	| JsonValue[]
	| { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Any JSON value read from one line of the transport. The proxy only looks
 * inside the shapes it recognises; everything else is relayed untouched.
 */
export type WireMessage = JsonValue;

export type JsonRpcId = string | number;

/**
 * Destination for relayed messages (a transport, or the next proxy stage)
 */
export interface MessageSink {
	send(message: WireMessage): Promise<void>;
}

export type Side = "client" | "agent";
