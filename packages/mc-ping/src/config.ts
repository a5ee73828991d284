import logger from "@mcping/logger";
import { z } from "zod";
import { describeIssues, PingError } from "./errors";
import type { PingOptions } from "./types";
import type { SessionOptions } from "./session";

export const DEFAULT_TIMEOUT = 5000;

export const pingOptionsSchema = z.object({
	timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
	debug: z.boolean().default(false),
});

const defaultLog = logger.child({ module: "mc-ping" });

export function resolvePingOptions(options: PingOptions = {}): SessionOptions {
	const { log, ...rest } = options;
	const parsed = pingOptionsSchema.safeParse(rest);
	if (!parsed.success) {
		throw new PingError(`Invalid ping options: ${describeIssues(parsed.error)}`);
	}
	return { ...parsed.data, log: log ?? defaultLog };
}
