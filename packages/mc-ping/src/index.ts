/**
 * mc-ping - Minecraft server status library
 *
 * A pure TypeScript implementation of the Minecraft Server List Ping protocol.
 * Works with modern Minecraft servers (1.7+).
 *
 * @example
 * ```ts
 * import { decodeIcon, ping } from "mc-ping";
 *
 * const result = await ping("play.example.com", 25565);
 * if (result.success) {
 *   console.log(`${result.status.playerCount}/${result.status.playerLimit} players`);
 *   const png = decodeIcon(result.status);
 * } else {
 *   console.error(result.reason);
 * }
 * ```
 */

export { DEFAULT_PORT, MAX_HOST_BYTES, parseTarget, toServerAddress } from "./address";
export type { ServerAddress } from "./address";
export { DEFAULT_TIMEOUT, pingOptionsSchema } from "./config";
export {
	ConnectionError,
	FramingError,
	InvalidAddressError,
	LengthMismatchError,
	PingError,
	ProtocolParseError,
	VarIntOverflowError,
} from "./errors";
export { buildPacket, createFramer, hexDump } from "./framing";
export type { Framer, FramerOptions, Packet } from "./framing";
export { getPlayerCount, isOnline, ping } from "./ping";
export { createByteReader } from "./reader";
export type { ByteReader } from "./reader";
export { PingSession } from "./session";
export { decodeIcon, ICON_PREFIX, iconData, parseStatusResponse } from "./status";
export type { PingOptions, PingResult, SessionState, StatusResult } from "./types";
export { decodeVarInt, encodeVarInt, readVarInt, varIntLength } from "./varint";
