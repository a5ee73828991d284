import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { decodeIcon, type StatusResult } from "mc-ping";

export type SaveIconOutcome = "written" | "no-icon" | "aborted";

/**
 * Write the server icon as PNG, asking before replacing an existing file.
 */
export async function saveIcon(
	status: StatusResult,
	path: string,
	confirm: (question: string) => Promise<boolean>
): Promise<SaveIconOutcome> {
	const png = decodeIcon(status);
	if (!png) {
		return "no-icon";
	}
	if (existsSync(path) && !(await confirm(`Target image file ${path} exists. Overwrite? [Y/n] `))) {
		return "aborted";
	}
	await writeFile(path, png);
	return "written";
}
