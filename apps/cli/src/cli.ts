/**
 * mcping command line: ping one server and print its status.
 */

import { parseArgs } from "node:util";
import logger from "@mcping/logger";
import { InvalidAddressError, parseTarget, ping, type ServerAddress, toServerAddress } from "mc-ping";
import { type Config, loadConfig } from "./config";
import { formatStatus, USAGE } from "./format";
import { saveIcon } from "./icon";

export interface CliIo {
	write(line: string): void;
	confirm(question: string): Promise<boolean>;
}

export const EXIT_OK = 0;
export const EXIT_UNREACHABLE = 1;
export const EXIT_USAGE = 2;

interface Invocation {
	address: ServerAddress;
	debug: boolean;
	saveImage: boolean;
}

/**
 * Parse argv into an invocation, or null when only usage should be shown.
 */
export function parseInvocation(argv: string[]): Invocation | null {
	const { values, positionals } = parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			debug: { type: "boolean", short: "d", default: false },
			"save-image": { type: "boolean", short: "s", default: false },
			help: { type: "boolean", short: "h", default: false },
		},
	});

	if (values.help || positionals.length === 0) {
		return null;
	}
	if (positionals.length > 2) {
		throw new InvalidAddressError(`Unexpected arguments: ${positionals.slice(2).join(" ")}`);
	}

	const target = positionals[0];
	let address: ServerAddress;
	if (positionals.length === 1) {
		address = parseTarget(target);
	} else {
		const rawPort = positionals[1];
		if (!/^\d+$/.test(rawPort)) {
			throw new InvalidAddressError(`Non-numeric port provided: ${rawPort}`);
		}
		address = toServerAddress(target, Number(rawPort));
	}

	return {
		address,
		debug: values.debug ?? false,
		saveImage: values["save-image"] ?? false,
	};
}

function isArgumentError(error: unknown): boolean {
	return (
		error instanceof InvalidAddressError ||
		(error instanceof TypeError && "code" in error && String(error.code).startsWith("ERR_PARSE_ARGS"))
	);
}

export async function run(argv: string[], io: CliIo, config: Config = loadConfig()): Promise<number> {
	let invocation: Invocation | null;
	try {
		invocation = parseInvocation(argv);
	} catch (error) {
		if (isArgumentError(error) && error instanceof Error) {
			io.write(`Argument error: ${error.message}`);
			return EXIT_USAGE;
		}
		throw error;
	}
	if (!invocation) {
		for (const line of USAGE) {
			io.write(line);
		}
		return EXIT_OK;
	}

	const { address, debug, saveImage } = invocation;
	const log = logger.child({ module: "cli" }, { level: debug ? "debug" : config.LOG_LEVEL });

	const result = await ping(address.host, address.port, { timeout: config.MCPING_TIMEOUT, debug, log });
	if (!result.success) {
		io.write(`Could not connect to server: ${result.reason}`);
		return EXIT_UNREACHABLE;
	}

	for (const line of formatStatus(result.status, result.latency, debug)) {
		io.write(line);
	}

	if (saveImage) {
		const outcome = await saveIcon(result.status, config.MCPING_ICON_PATH, io.confirm);
		if (outcome === "written") {
			io.write(`Server icon written to ${config.MCPING_ICON_PATH}`);
		} else if (outcome === "aborted") {
			io.write("Target file exists; aborting");
		} else {
			io.write("Server has no icon");
		}
	}
	return EXIT_OK;
}
