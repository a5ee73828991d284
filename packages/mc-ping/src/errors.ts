/**
 * Error taxonomy for Server List Ping failures.
 *
 * `ConnectionError` is the only one `ping()` turns into a failed result; the rest
 * reject the ping promise.
 */

import type { ZodError } from "zod";

export class PingError extends Error {
	override readonly name: string = "PingError";
}

/** Refused, timed out, DNS failure, or a socket that broke mid-session. */
export class ConnectionError extends PingError {
	override readonly name: string = "ConnectionError";

	static from(error: unknown): ConnectionError {
		if (error instanceof ConnectionError) {
			return error;
		}
		if (error instanceof Error) {
			return new ConnectionError(`${error.name}: ${error.message}`, { cause: error });
		}
		return new ConnectionError(String(error));
	}
}

/** Length or id inconsistency, or a stream that ended inside a frame. */
export class FramingError extends PingError {
	override readonly name: string = "FramingError";
}

export class VarIntOverflowError extends PingError {
	override readonly name: string = "VarIntOverflowError";

	constructor(message = "VarInt is too big") {
		super(message);
	}
}

/** Status document is not UTF-8 JSON or lacks required fields. */
export class ProtocolParseError extends PingError {
	override readonly name: string = "ProtocolParseError";
}

export class LengthMismatchError extends PingError {
	override readonly name: string = "LengthMismatchError";

	constructor(
		readonly declared: number,
		readonly actual: number
	) {
		super(`Status payload declares ${declared} bytes but carries ${actual}`);
	}
}

export class InvalidAddressError extends PingError {
	override readonly name: string = "InvalidAddressError";
}

export function describeIssues(error: ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}
