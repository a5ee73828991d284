/**
 * In-process status server used by the tests, built on the library's own framer.
 */

import net, { type Server, type Socket } from "node:net";
import { TextEncoder } from "node:util";
import { createFramer } from "./framing";
import { createByteReader } from "./reader";
import { encodeVarInt } from "./varint";

export interface FakeServerOptions {
	status: string | Uint8Array;
	/** Drop every connection after the first one without answering. */
	refuseRefinement?: boolean;
	/** Answer the status request with a packet of this id instead of 0x00. */
	statusPacketId?: number;
	/** Accept connections but never answer. */
	silent?: boolean;
	/** Echo the ping before sending the status response. */
	pongFirst?: boolean;
	/** Raw bytes written to every connection after the first, instead of a pong. */
	refinementReply?: Uint8Array;
}

export interface FakeServer {
	port: number;
	connections: number;
	handshakes: Uint8Array[];
	close(): Promise<void>;
}

export function encodeStatus(json: string): Uint8Array {
	const body = new TextEncoder().encode(json);
	return Buffer.concat([encodeVarInt(body.length), body]);
}

async function serve(socket: Socket, options: FakeServerOptions, server: FakeServer): Promise<void> {
	const framer = createFramer();
	const reader = createByteReader(socket);
	const payload = typeof options.status === "string" ? encodeStatus(options.status) : options.status;
	const sendStatus = () => framer.writePacket(socket, options.statusPacketId ?? 0x00, payload);
	let handshaken = false;
	let statusPending = false;

	while (!socket.destroyed) {
		const packet = await framer.readPacket(reader);
		if (packet.id === 0x00 && !handshaken) {
			handshaken = true;
			server.handshakes.push(packet.payload);
		} else if (packet.id === 0x00) {
			if (options.pongFirst) {
				statusPending = true;
			} else {
				await sendStatus();
			}
		} else if (packet.id === 0x01) {
			await framer.writePacket(socket, 0x01, packet.payload);
			if (statusPending) {
				statusPending = false;
				await sendStatus();
			}
		}
	}
}

function listeningPort(server: Server): number {
	const address = server.address();
	if (address === null || typeof address === "string") {
		throw new Error("Server is not listening on a TCP port");
	}
	return address.port;
}

export async function startFakeServer(options: FakeServerOptions): Promise<FakeServer> {
	const sockets = new Set<Socket>();

	const server: Server = net.createServer((socket) => {
		sockets.add(socket);
		socket.on("close", () => sockets.delete(socket));
		socket.on("error", () => socket.destroy());
		instance.connections++;
		if (options.refuseRefinement && instance.connections > 1) {
			socket.destroy();
			return;
		}
		if (options.silent) {
			return;
		}
		if (options.refinementReply && instance.connections > 1) {
			socket.write(options.refinementReply);
			return;
		}
		// The client closes the socket once it has what it needs, which ends the loop
		serve(socket, options, instance).catch(() => socket.destroy());
	});

	const instance: FakeServer = {
		port: 0,
		connections: 0,
		handshakes: [],
		close: () =>
			new Promise<void>((resolve, reject) => {
				for (const socket of sockets) {
					socket.destroy();
				}
				server.close((error) => (error ? reject(error) : resolve()));
			}),
	};

	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	instance.port = listeningPort(server);
	return instance;
}

/** A port with nothing listening on it. */
export async function closedPort(): Promise<number> {
	const server = net.createServer();
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	const port = listeningPort(server);
	await new Promise<void>((resolve) => server.close(() => resolve()));
	return port;
}
