/**
 * Pull-style reads over a push-style Node stream.
 *
 * Socket data arrives in arbitrary chunks; callers ask for an exact number of bytes and
 * wait until that many are buffered.
 */

import type { Readable } from "node:stream";
import { ConnectionError, FramingError, PingError } from "./errors";

export interface ByteReader {
	readByte(): Promise<number>;
	readExact(length: number): Promise<Uint8Array>;
}

export function createByteReader(stream: Readable): ByteReader {
	let buffer: Buffer = Buffer.alloc(0);
	let ended = false;
	let failure: PingError | null = null;
	let wake: (() => void) | null = null;

	const notify = () => {
		const resume = wake;
		wake = null;
		resume?.();
	};

	stream.on("data", (chunk: Buffer) => {
		buffer = buffer.length > 0 ? Buffer.concat([buffer, chunk]) : chunk;
		notify();
	});
	stream.on("end", () => {
		ended = true;
		notify();
	});
	stream.on("close", () => {
		ended = true;
		notify();
	});
	stream.on("error", (error: Error) => {
		failure = error instanceof PingError ? error : ConnectionError.from(error);
		notify();
	});

	async function readExact(length: number): Promise<Uint8Array> {
		while (buffer.length < length) {
			if (failure) {
				throw failure;
			}
			if (ended) {
				throw new FramingError(
					`Stream ended after ${buffer.length} of ${length} expected bytes`
				);
			}
			await new Promise<void>((resolve) => {
				wake = resolve;
			});
		}

		const bytes = buffer.subarray(0, length);
		buffer = buffer.subarray(length);
		return bytes;
	}

	return {
		readExact,
		async readByte() {
			const [byte] = await readExact(1);
			return byte;
		},
	};
}
