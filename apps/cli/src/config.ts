import { z } from "zod";

export const configSchema = z.object({
	LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
	MCPING_TIMEOUT: z.coerce.number().int().positive().default(5000),
	MCPING_ICON_PATH: z.string().min(1).default("server.png"),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	return configSchema.parse({
		LOG_LEVEL: env.LOG_LEVEL,
		MCPING_TIMEOUT: env.MCPING_TIMEOUT,
		MCPING_ICON_PATH: env.MCPING_ICON_PATH,
	});
}
