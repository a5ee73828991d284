/**
 * Status Response payload parsing: VarInt(json length) | UTF-8 JSON.
 */

import { TextDecoder } from "node:util";
import { z } from "zod";
import { describeIssues, LengthMismatchError, ProtocolParseError } from "./errors";
import type { StatusResult } from "./types";
import { decodeVarInt } from "./varint";

export const ICON_PREFIX = "data:image/png;base64,";

const chatComponentSchema = z.object({
	text: z.string(),
	extra: z.array(z.union([z.string(), z.object({ text: z.string().optional() }).passthrough()])).optional(),
});

export const statusDocumentSchema = z.object({
	description: z.union([z.string(), chatComponentSchema]),
	players: z.object({
		max: z.number().int(),
		online: z.number().int(),
		sample: z.array(z.object({ name: z.string() })).optional(),
	}),
	version: z.object({
		name: z.string(),
		protocol: z.number().int(),
	}),
	favicon: z.string().optional(),
});

export type StatusDocument = z.infer<typeof statusDocumentSchema>;

/**
 * Parse description to plain text
 */
export function parseDescription(desc: StatusDocument["description"]): string {
	if (typeof desc === "string") {
		return desc;
	}
	let text = desc.text;
	if (desc.extra) {
		text += desc.extra.map((e) => (typeof e === "string" ? e : (e.text ?? ""))).join("");
	}
	return text;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decodeDocument(bytes: Uint8Array): unknown {
	let json: string;
	try {
		json = utf8.decode(bytes);
	} catch (error) {
		throw new ProtocolParseError("Status response is not valid UTF-8", { cause: error });
	}
	try {
		return JSON.parse(json);
	} catch (error) {
		throw new ProtocolParseError(`Failed to parse status JSON: ${error}`, { cause: error });
	}
}

/**
 * Parse the payload of a Status Response packet (id 0x00).
 *
 * A server reporting online players without a `players.sample` gets an empty sample.
 */
export function parseStatusResponse(payload: Uint8Array): StatusResult {
	const { value: declaredLength, bytesRead } = decodeVarInt(payload);
	const document = payload.subarray(bytesRead);
	if (document.length !== declaredLength) {
		throw new LengthMismatchError(declaredLength, document.length);
	}

	const parsed = statusDocumentSchema.safeParse(decodeDocument(document));
	if (!parsed.success) {
		throw new ProtocolParseError(`Invalid status document: ${describeIssues(parsed.error)}`);
	}
	const raw = parsed.data;

	const playerSample =
		raw.players.online !== 0 ? (raw.players.sample ?? []).map((player) => player.name) : [];

	return Object.freeze({
		description: parseDescription(raw.description),
		versionName: raw.version.name,
		versionProtocol: raw.version.protocol,
		playerCount: raw.players.online,
		playerLimit: raw.players.max,
		playerSample: Object.freeze(playerSample),
		icon: raw.favicon ?? "",
	});
}

/**
 * Base64 PNG data from the status icon, without the data URI prefix.
 */
export function iconData(status: StatusResult): string | null {
	if (!status.icon.startsWith(ICON_PREFIX)) {
		return null;
	}
	return status.icon.slice(ICON_PREFIX.length);
}

/**
 * Decoded PNG bytes of the status icon.
 */
export function decodeIcon(status: StatusResult): Buffer | null {
	const data = iconData(status);
	return data === null ? null : Buffer.from(data, "base64");
}
