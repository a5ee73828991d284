/**
 * Handshake/status exchange for one ping attempt.
 *
 * Two strictly sequential connections: the first carries handshake, status request and a
 * ping whose echo is discarded; the second carries a lone ping whose round trip becomes the
 * reported latency.
 */

import { once } from "node:events";
import net, { type Socket } from "node:net";
import { performance } from "node:perf_hooks";
import { TextEncoder } from "node:util";
import type { Logger } from "@mcping/logger";
import type { ServerAddress } from "./address";
import { ConnectionError, PingError, ProtocolParseError } from "./errors";
import { createFramer, type Framer } from "./framing";
import { createByteReader } from "./reader";
import { parseStatusResponse } from "./status";
import type { SessionState, StatusResult } from "./types";
import { encodeVarInt } from "./varint";

export const HANDSHAKE_ID = 0x00;
export const STATUS_REQUEST_ID = 0x00;
export const STATUS_RESPONSE_ID = 0x00;
export const PING_ID = 0x01;

/** Servers accept -1 as "unknown client version" in the status state. */
export const UNKNOWN_PROTOCOL_VERSION = -1;
const NEXT_STATE_STATUS = 1;

export interface SessionOptions {
	timeout: number;
	debug: boolean;
	log: Logger;
}

/**
 * Encode a string as length-prefixed UTF-8
 */
function encodeString(str: string): Uint8Array {
	const utf8 = new TextEncoder().encode(str);
	const lengthBytes = encodeVarInt(utf8.length);
	const result = new Uint8Array(lengthBytes.length + utf8.length);
	result.set(lengthBytes, 0);
	result.set(utf8, lengthBytes.length);
	return result;
}

/**
 * Handshake payload (packet 0x00): protocol version, host, port, next state.
 */
export function buildHandshake(address: ServerAddress): Uint8Array {
	const portBytes = new Uint8Array(2);
	new DataView(portBytes.buffer).setUint16(0, address.port, false); // big-endian

	return Buffer.concat([
		encodeVarInt(UNKNOWN_PROTOCOL_VERSION),
		encodeString(address.host),
		portBytes,
		encodeVarInt(NEXT_STATE_STATUS),
	]);
}

/**
 * Ping payload (packet 0x01): an opaque int64 the server echoes back.
 */
export function buildPingPayload(timestamp: bigint = process.hrtime.bigint()): Uint8Array {
	const timestampBytes = new Uint8Array(8);
	new DataView(timestampBytes.buffer).setBigInt64(0, timestamp, false);
	return timestampBytes;
}

/**
 * Open a TCP connection. The timeout covers the connect and every later idle period.
 */
export function connect(address: ServerAddress, timeout: number): Promise<Socket> {
	return new Promise((resolve, reject) => {
		const socket = net.connect({ host: address.host, port: address.port });
		socket.setNoDelay(true);
		socket.setTimeout(timeout);

		socket.on("timeout", () => {
			socket.destroy(new ConnectionError(`TimeoutError: No response within ${timeout}ms`));
		});
		socket.on("error", (error) => {
			socket.destroy();
			reject(ConnectionError.from(error));
		});
		socket.once("connect", () => resolve(socket));
	});
}

async function closeSocket(socket: Socket): Promise<void> {
	if (socket.closed) {
		return;
	}
	const closed = once(socket, "close");
	socket.destroy();
	await closed;
}

export class PingSession {
	private currentState: SessionState = "disconnected";
	private statusResult: StatusResult | null = null;
	private measuredLatency: number | null = null;
	private readonly framer: Framer;

	constructor(
		readonly address: ServerAddress,
		private readonly options: SessionOptions
	) {
		this.framer = createFramer({ debug: options.debug, log: options.log });
	}

	get state(): SessionState {
		return this.currentState;
	}

	get status(): StatusResult | null {
		return this.statusResult;
	}

	/** Milliseconds, or null when the refinement round could not be completed. */
	get latency(): number | null {
		return this.measuredLatency;
	}

	async run(): Promise<{ status: StatusResult; latency: number | null }> {
		if (this.currentState !== "disconnected") {
			throw new Error(`PingSession already ran (state: ${this.currentState})`);
		}

		try {
			const status = await this.queryStatus();
			this.statusResult = status;
			this.measuredLatency = await this.measureLatency();
			this.transition("closed");
			return { status, latency: this.measuredLatency };
		} catch (error) {
			this.transition("failed");
			throw error;
		}
	}

	private transition(next: SessionState): void {
		this.options.log.debug({ from: this.currentState, to: next }, "Session state changed");
		this.currentState = next;
	}

	private async queryStatus(): Promise<StatusResult> {
		const socket = await connect(this.address, this.options.timeout);
		this.transition("connected");

		try {
			const reader = createByteReader(socket);

			await this.framer.writePacket(socket, HANDSHAKE_ID, buildHandshake(this.address));
			this.transition("handshake-sent");
			await this.framer.writePacket(socket, STATUS_REQUEST_ID);
			this.transition("status-requested");
			// The echo of this ping is read below but its timing is not used
			await this.framer.writePacket(socket, PING_ID, buildPingPayload());

			let status: StatusResult | null = null;
			for (let i = 0; i < 2; i++) {
				const packet = await this.framer.readPacket(reader);
				if (packet.id === STATUS_RESPONSE_ID) {
					status = parseStatusResponse(packet.payload);
				} else {
					this.options.log.debug({ packetId: packet.id }, "Ignoring packet");
				}
			}
			if (!status) {
				throw new ProtocolParseError("Server sent no status response");
			}

			this.transition("status-received");
			return status;
		} finally {
			await closeSocket(socket);
		}
	}

	/**
	 * Best-effort ping over a fresh connection. Any protocol or connection failure here
	 * only leaves the latency unknown.
	 */
	private async measureLatency(): Promise<number | null> {
		let socket: Socket;
		try {
			socket = await connect(this.address, this.options.timeout);
		} catch (error) {
			if (error instanceof ConnectionError) {
				this.options.log.debug({ err: error }, "Latency refinement connection failed");
				return null;
			}
			throw error;
		}

		try {
			const reader = createByteReader(socket);
			this.options.log.debug("Sending another Ping packet for a more accurate measurement");

			const start = performance.now();
			await this.framer.writePacket(socket, PING_ID, buildPingPayload());
			this.transition("ping-sent");
			await this.framer.readPacket(reader);
			const elapsed = performance.now() - start;
			this.transition("ping-acked");
			return elapsed;
		} catch (error) {
			if (error instanceof PingError) {
				this.options.log.debug({ err: error }, "Latency refinement failed");
				return null;
			}
			throw error;
		} finally {
			await closeSocket(socket);
		}
	}
}
