import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, NodeTracerProvider, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-node";
import pino from "pino";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { InvalidAddressError, LengthMismatchError, ProtocolParseError } from "./errors";
import { closedPort, type FakeServer, startFakeServer } from "./fake-server";
import { getPlayerCount, isOnline, ping } from "./ping";
import { buildHandshake, PingSession } from "./session";
import { encodeVarInt } from "./varint";

const STATUS_JSON = JSON.stringify({
	version: { name: "1.20.4", protocol: 765 },
	players: { max: 50, online: 3, sample: [{ name: "Alice" }, { name: "Bob" }, { name: "Carol" }] },
	description: { text: "A test server" },
	favicon: "data:image/png;base64,iVBORw0KGgo=",
});

const silent = pino({ level: "silent" });

const spans = new InMemorySpanExporter();
trace.setGlobalTracerProvider(new NodeTracerProvider({ spanProcessors: [new SimpleSpanProcessor(spans)] }));

beforeEach(() => {
	spans.reset();
});

let server: FakeServer | null = null;

afterEach(async () => {
	await server?.close();
	server = null;
});

describe("ping", () => {
	test("returns the status and a latency from the second connection", async () => {
		server = await startFakeServer({ status: STATUS_JSON });

		const result = await ping("127.0.0.1", server.port, { log: silent });

		if (!result.success) {
			throw new Error(`ping failed: ${result.reason}`);
		}
		expect(result.status).toEqual({
			description: "A test server",
			versionName: "1.20.4",
			versionProtocol: 765,
			playerCount: 3,
			playerLimit: 50,
			playerSample: ["Alice", "Bob", "Carol"],
			icon: "data:image/png;base64,iVBORw0KGgo=",
		});
		expect(result.latency).not.toBeNull();
		expect(result.latency).toBeGreaterThan(0);
		expect(result.latency).toBeLessThan(5000);
		expect(server.connections).toBe(2);
	});

	test("sends the handshake with unknown protocol version and status next state", async () => {
		server = await startFakeServer({ status: STATUS_JSON });

		await ping("127.0.0.1", server.port, { log: silent });

		expect(server.handshakes).toHaveLength(1);
		expect(Array.from(server.handshakes[0])).toEqual(
			Array.from(buildHandshake({ host: "127.0.0.1", port: server.port }))
		);
	});

	test("reports null latency when the refinement connection is dropped", async () => {
		server = await startFakeServer({ status: STATUS_JSON, refuseRefinement: true });

		const result = await ping("127.0.0.1", server.port, { log: silent });

		expect(result.success).toBe(true);
		expect(result.success && result.latency).toBeNull();
		expect(server.connections).toBe(2);
	});

	test("returns a failure reason when the connection is refused", async () => {
		const port = await closedPort();

		const result = await ping("127.0.0.1", port, { log: silent });

		expect(result.success).toBe(false);
		expect(!result.success && result.reason).toContain("ECONNREFUSED");
	});

	test("picks the status response when the pong arrives first", async () => {
		server = await startFakeServer({ status: STATUS_JSON, pongFirst: true });

		const result = await ping("127.0.0.1", server.port, { log: silent });

		if (!result.success) {
			throw new Error(`ping failed: ${result.reason}`);
		}
		expect(result.status.description).toBe("A test server");
		expect(result.status.playerSample).toEqual(["Alice", "Bob", "Carol"]);
		expect(result.latency).toBeGreaterThan(0);
	});

	test("reports null latency when the refinement reply is malformed", async () => {
		server = await startFakeServer({
			status: STATUS_JSON,
			refinementReply: new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]),
		});

		const result = await ping("127.0.0.1", server.port, { log: silent });

		if (!result.success) {
			throw new Error(`ping failed: ${result.reason}`);
		}
		expect(result.status.playerCount).toBe(3);
		expect(result.latency).toBeNull();
		expect(server.connections).toBe(2);
	});

	test("marks the span as failed when the server is unreachable", async () => {
		const port = await closedPort();

		const result = await ping("127.0.0.1", port, { log: silent });

		expect(result.success).toBe(false);
		const [span] = spans.getFinishedSpans();
		expect(span.name).toBe("mc.ping");
		expect(span.status.code).toBe(SpanStatusCode.ERROR);
		expect(span.status.message).toContain("ECONNREFUSED");
		expect(span.attributes["mc.failure"]).toBe(!result.success && result.reason);
	});

	test("marks the span as ok after a successful ping", async () => {
		server = await startFakeServer({ status: STATUS_JSON });

		await ping("127.0.0.1", server.port, { log: silent });

		const [span] = spans.getFinishedSpans();
		expect(span.status.code).toBe(SpanStatusCode.OK);
		expect(span.attributes["server.port"]).toBe(server.port);
	});

	test("returns a failure reason when the server never answers", async () => {
		server = await startFakeServer({ status: STATUS_JSON, silent: true });

		const result = await ping("127.0.0.1", server.port, { timeout: 200, log: silent });

		expect(result).toEqual({ success: false, reason: "TimeoutError: No response within 200ms" });
	});

	test("rejects an oversized hostname before connecting", async () => {
		await expect(ping("a".repeat(32768), 25565, { log: silent })).rejects.toBeInstanceOf(InvalidAddressError);
	});

	test("rejects a status payload with a bad length", async () => {
		const json = Buffer.from(STATUS_JSON, "utf8");
		server = await startFakeServer({ status: Buffer.concat([encodeVarInt(json.length + 1), json]) });

		await expect(ping("127.0.0.1", server.port, { log: silent })).rejects.toBeInstanceOf(LengthMismatchError);
	});

	test("rejects a status document missing required fields", async () => {
		server = await startFakeServer({ status: '{"description":{"text":"x"}}' });

		await expect(ping("127.0.0.1", server.port, { log: silent })).rejects.toBeInstanceOf(ProtocolParseError);
	});

	test("rejects when no status packet arrives", async () => {
		server = await startFakeServer({ status: STATUS_JSON, statusPacketId: 0x02 });

		await expect(ping("127.0.0.1", server.port, { log: silent })).rejects.toThrow("Server sent no status response");
	});
});

describe("PingSession", () => {
	test("ends closed after a successful exchange", async () => {
		server = await startFakeServer({ status: STATUS_JSON });
		const session = new PingSession({ host: "127.0.0.1", port: server.port }, { timeout: 5000, debug: false, log: silent });

		expect(session.state).toBe("disconnected");
		await session.run();

		expect(session.state).toBe("closed");
		expect(session.status?.playerCount).toBe(3);
		expect(session.latency).toBeGreaterThan(0);
	});

	test("ends failed when the connection is refused", async () => {
		const port = await closedPort();
		const session = new PingSession({ host: "127.0.0.1", port }, { timeout: 5000, debug: false, log: silent });

		await expect(session.run()).rejects.toThrow("ECONNREFUSED");
		expect(session.state).toBe("failed");
		expect(session.status).toBeNull();
	});

	test("cannot run twice", async () => {
		server = await startFakeServer({ status: STATUS_JSON });
		const session = new PingSession({ host: "127.0.0.1", port: server.port }, { timeout: 5000, debug: false, log: silent });
		await session.run();

		await expect(session.run()).rejects.toThrow("PingSession already ran (state: closed)");
	});
});

describe("helpers", () => {
	test("isOnline is true for a responding server", async () => {
		server = await startFakeServer({ status: STATUS_JSON });
		expect(await isOnline("127.0.0.1", server.port)).toBe(true);
	});

	test("isOnline is false when nothing listens", async () => {
		expect(await isOnline("127.0.0.1", await closedPort())).toBe(false);
	});

	test("getPlayerCount returns online and max", async () => {
		server = await startFakeServer({ status: STATUS_JSON });
		expect(await getPlayerCount("127.0.0.1", server.port)).toEqual({ online: 3, max: 50 });
	});
});
