/**
 * Packet framing.
 * Wire format: [VarInt length][VarInt packet id][payload...], where length covers id + payload.
 */

import type { Writable } from "node:stream";
import type { Logger } from "@mcping/logger";
import { ConnectionError, FramingError } from "./errors";
import type { ByteReader } from "./reader";
import { encodeVarInt, readVarInt, varIntLength } from "./varint";

export interface Packet {
	id: number;
	payload: Uint8Array;
}

export interface FramerOptions {
	/** Hex-dump every frame to the logger at debug level. */
	debug?: boolean;
	log?: Logger;
}

export interface Framer {
	writePacket(sink: Writable, packetId: number, payload?: Uint8Array): Promise<void>;
	readPacket(reader: ByteReader): Promise<Packet>;
}

/**
 * Build a packet with length prefix
 */
export function buildPacket(packetId: number, ...data: Uint8Array[]): Uint8Array {
	const packetIdBytes = encodeVarInt(packetId);
	const dataLength = data.reduce((sum, d) => sum + d.length, 0);
	const totalLength = packetIdBytes.length + dataLength;
	const lengthBytes = encodeVarInt(totalLength);

	const packet = new Uint8Array(lengthBytes.length + totalLength);
	let offset = 0;

	packet.set(lengthBytes, offset);
	offset += lengthBytes.length;

	packet.set(packetIdBytes, offset);
	offset += packetIdBytes.length;

	for (const d of data) {
		packet.set(d, offset);
		offset += d.length;
	}

	return packet;
}

export function hexDump(bytes: Uint8Array): string {
	return Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join(" ");
}

export function createFramer(options: FramerOptions = {}): Framer {
	const debug = options.debug ?? false;
	const log = options.log;

	return {
		writePacket(sink, packetId, payload = new Uint8Array(0)) {
			const frame = buildPacket(packetId, payload);
			if (debug) {
				log?.debug({ packetId, bytes: hexDump(frame) }, "Sent packet");
			}

			return new Promise<void>((resolve, reject) => {
				sink.write(frame, (error) => {
					if (error) {
						reject(ConnectionError.from(error));
					} else {
						resolve();
					}
				});
			});
		},

		async readPacket(reader) {
			const packetLength = await readVarInt(reader);
			const id = await readVarInt(reader);
			const payloadLength = packetLength - varIntLength(id);
			if (payloadLength < 0) {
				throw new FramingError(
					`Packet length ${packetLength} is shorter than its id ${id}`
				);
			}

			const payload = await reader.readExact(payloadLength);
			if (debug) {
				log?.debug({ packetId: id, bytes: hexDump(payload) }, "Received packet");
			}
			return { id, payload };
		},
	};
}
