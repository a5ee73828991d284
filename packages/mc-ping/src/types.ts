/**
 * Types for Minecraft Server List Ping responses
 */

import type { Logger } from "@mcping/logger";

/**
 * Normalized server status, built once per status exchange.
 */
export interface StatusResult {
	readonly description: string;
	readonly versionName: string;
	readonly versionProtocol: number;
	readonly playerCount: number;
	readonly playerLimit: number;
	readonly playerSample: readonly string[];
	/** `data:image/png;base64,...` URI, or "" when the server sends none. */
	readonly icon: string;
}

export type PingResult =
	| {
			success: true;
			status: StatusResult;
			/** Milliseconds from the refinement round, null when it could not be taken. */
			latency: number | null;
	  }
	| {
			success: false;
			reason: string;
	  };

export interface PingOptions {
	/** Connect and idle timeout in milliseconds (default 5000). */
	timeout?: number;
	debug?: boolean;
	log?: Logger;
}

export type SessionState =
	| "disconnected"
	| "connected"
	| "handshake-sent"
	| "status-requested"
	| "status-received"
	| "ping-sent"
	| "ping-acked"
	| "closed"
	| "failed";
