/**
 * Shared pino logger for mcping packages.
 *
 * @example
 * ```ts
 * import logger from "@mcping/logger";
 *
 * const log = logger.child({ module: "session" });
 * log.info({ host, port }, "Connected");
 * ```
 */

import pino from "pino";

const logger = pino({
	name: "mcping",
	level: process.env.LOG_LEVEL || "info",
});

export default logger;
export type { Logger } from "pino";
