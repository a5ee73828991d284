/**
 * Minecraft Server List Ping implementation
 * Protocol: https://wiki.vg/Server_List_Ping
 */

import { DEFAULT_PORT, toServerAddress } from "./address";
import { DEFAULT_TIMEOUT, resolvePingOptions } from "./config";
import { ConnectionError, PingError } from "./errors";
import { PingSession } from "./session";
import { withSpan } from "./telemetry";
import type { PingOptions, PingResult } from "./types";

/**
 * Ping a Minecraft server using the Server List Ping protocol.
 *
 * Connection failures resolve to `{ success: false, reason }`. Invalid addresses and
 * malformed responses reject.
 */
export async function ping(host: string, port = DEFAULT_PORT, options: PingOptions = {}): Promise<PingResult> {
	const address = toServerAddress(host, port);
	const sessionOptions = resolvePingOptions(options);

	try {
		return await withSpan(
			"mc-ping",
			"mc.ping",
			async (span): Promise<PingResult> => {
				const session = new PingSession(address, sessionOptions);
				try {
					const { status, latency } = await session.run();
					if (latency !== null) {
						span.setAttribute("mc.latency_ms", latency);
					}
					return { success: true, status, latency };
				} catch (error) {
					if (error instanceof ConnectionError) {
						span.setAttribute("mc.failure", error.message);
					}
					throw error;
				}
			},
			{ "server.address": host, "server.port": port }
		);
	} catch (error) {
		// withSpan has already marked the span as errored
		if (error instanceof ConnectionError) {
			sessionOptions.log.debug({ host, port, reason: error.message }, "Could not reach server");
			return { success: false, reason: error.message };
		}
		throw error;
	}
}

/**
 * Check if a server is online (simple boolean check)
 */
export async function isOnline(host: string, port = DEFAULT_PORT, timeout = DEFAULT_TIMEOUT): Promise<boolean> {
	try {
		const result = await ping(host, port, { timeout });
		return result.success;
	} catch (error) {
		if (error instanceof PingError) {
			return false;
		}
		throw error;
	}
}

/**
 * Get player count from a server
 */
export async function getPlayerCount(
	host: string,
	port = DEFAULT_PORT,
	timeout = DEFAULT_TIMEOUT
): Promise<{ online: number; max: number }> {
	const result = await ping(host, port, { timeout });
	if (!result.success) {
		throw new ConnectionError(result.reason);
	}
	return {
		online: result.status.playerCount,
		max: result.status.playerLimit,
	};
}
