/**
 * mcping entry point.
 */

import { createInterface } from "node:readline/promises";
import logger from "@mcping/logger";
import { type CliIo, run } from "./cli";

const log = logger.child({ service: "mcping-cli" });

const io: CliIo = {
	write(line) {
		process.stdout.write(`${line}\n`);
	},
	async confirm(question) {
		const rl = createInterface({ input: process.stdin, output: process.stdout });
		try {
			const answer = (await rl.question(question)).trim().toLowerCase();
			return answer === "" || answer === "y" || answer === "yes";
		} finally {
			rl.close();
		}
	},
};

run(process.argv.slice(2), io).then(
	(code) => {
		process.exitCode = code;
	},
	(error) => {
		log.error({ err: error }, "Ping failed");
		process.exitCode = 1;
	}
);
