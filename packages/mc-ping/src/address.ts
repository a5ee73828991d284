import { z } from "zod";
import { describeIssues, InvalidAddressError } from "./errors";

export const DEFAULT_PORT = 25565;
export const MAX_HOST_BYTES = 32767;

export const serverAddressSchema = z.object({
	host: z
		.string()
		.min(1, "Hostname is empty")
		.refine((host) => Buffer.byteLength(host, "utf8") <= MAX_HOST_BYTES, {
			message: `Hostname too large: >${MAX_HOST_BYTES} bytes in size`,
		}),
	port: z.number().int().min(0).max(65535),
});

export type ServerAddress = z.infer<typeof serverAddressSchema>;

/**
 * Validate a host/port pair before any network I/O.
 */
export function toServerAddress(host: string, port: number): ServerAddress {
	const result = serverAddressSchema.safeParse({ host, port });
	if (!result.success) {
		throw new InvalidAddressError(describeIssues(result.error));
	}
	return result.data;
}

/**
 * Parse `host`, `host:port` or `[v6]:port` into an address.
 */
export function parseTarget(target: string, defaultPort = DEFAULT_PORT): ServerAddress {
	const match = /^(?:\[(?<v6>[^\]]+)\]|(?<name>[^:]+))(?::(?<port>.*))?$/.exec(target.trim());
	if (!match?.groups) {
		return toServerAddress(target, defaultPort);
	}

	const host = match.groups.v6 ?? match.groups.name ?? "";
	const rawPort = match.groups.port;
	if (rawPort === undefined) {
		return toServerAddress(host, defaultPort);
	}
	if (!/^\d+$/.test(rawPort)) {
		throw new InvalidAddressError(`Non-numeric port provided: ${rawPort}`);
	}
	return toServerAddress(host, Number(rawPort));
}
