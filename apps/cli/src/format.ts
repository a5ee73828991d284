import type { StatusResult } from "mc-ping";

export const USAGE = [
	"mcping: short and sweet Minecraft server ping tool",
	"Usage: mcping <host[:port]> [port] [-ds]",
	"  -d, --debug       Debug mode (print raw packet IO and show protocol version)",
	"  -h, --help        Show this help",
	"  -s, --save-image  Save server thumbnail image to file",
];

export function formatLatency(latency: number | null): string {
	return latency === null ? "Latency: unavailable" : `Latency: ${latency.toFixed(1)} ms`;
}

/**
 * Lines printed for a successful ping.
 */
export function formatStatus(status: StatusResult, latency: number | null, debug = false): string[] {
	const lines = [
		status.description,
		"-".repeat(32),
		formatLatency(latency),
		`Players: ${status.playerCount}/${status.playerLimit}`,
	];
	if (status.playerCount > 0 && status.playerSample.length > 0) {
		lines.push(`Online: ${status.playerSample.join(", ")}`);
	}
	lines.push(`Version: ${status.versionName}`);
	if (debug) {
		lines.push(`Version ID: ${status.versionProtocol}`);
	}
	return lines;
}
