/**
 * VarInt encoding/decoding for the Minecraft protocol.
 * VarInts are 1-5 bytes, using 7 bits per byte with MSB as continuation flag.
 * Values are 32-bit two's complement, so negatives always take 5 bytes.
 * See: https://wiki.vg/Protocol#VarInt_and_VarLong
 */

import { FramingError, VarIntOverflowError } from "./errors";
import type { ByteReader } from "./reader";

const SEGMENT_BITS = 0x7f;
const CONTINUE_BIT = 0x80;
const MAX_BYTES = 5;

/**
 * Encode a number as a VarInt
 */
export function encodeVarInt(value: number): Uint8Array {
	const bytes: number[] = [];
	let remaining = value >>> 0;
	while (true) {
		if ((remaining & ~SEGMENT_BITS) === 0) {
			bytes.push(remaining);
			break;
		}
		bytes.push((remaining & SEGMENT_BITS) | CONTINUE_BIT);
		remaining >>>= 7;
	}
	return new Uint8Array(bytes);
}

/**
 * Decode a VarInt from a buffer, returning the value and bytes consumed.
 * The unconsumed remainder is `buffer.subarray(offset + bytesRead)`.
 */
export function decodeVarInt(buffer: Uint8Array, offset = 0): { value: number; bytesRead: number } {
	let value = 0;
	let bytesRead = 0;

	while (true) {
		if (offset + bytesRead >= buffer.length) {
			throw new FramingError("VarInt is too short");
		}
		const currentByte = buffer[offset + bytesRead];
		value |= (currentByte & SEGMENT_BITS) << (7 * bytesRead);
		bytesRead++;

		if ((currentByte & CONTINUE_BIT) === 0) {
			break;
		}
		if (bytesRead >= MAX_BYTES) {
			throw new VarIntOverflowError();
		}
	}

	return { value, bytesRead };
}

/**
 * Read a VarInt from a live stream, one byte at a time.
 */
export async function readVarInt(reader: ByteReader): Promise<number> {
	let value = 0;
	let bytesRead = 0;

	while (true) {
		const currentByte = await reader.readByte();
		value |= (currentByte & SEGMENT_BITS) << (7 * bytesRead);
		bytesRead++;

		if ((currentByte & CONTINUE_BIT) === 0) {
			return value;
		}
		if (bytesRead >= MAX_BYTES) {
			throw new VarIntOverflowError();
		}
	}
}

/**
 * Calculate the byte length of a VarInt
 */
export function varIntLength(value: number): number {
	let remaining = value >>> 0;
	let len = 0;
	do {
		len++;
		remaining >>>= 7;
	} while (remaining !== 0);
	return len;
}
