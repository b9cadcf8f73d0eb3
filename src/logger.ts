/**
 * Resolution diagnostics. Everything goes to stderr so that stdout only ever
 * carries the resolved configs; verbose lines are timestamped and off by default.
 */

let verbose = false;

export function setVerbose(enabled: boolean): void {
	verbose = enabled;
}

function writeLine(line: string): void {
	process.stderr.write(`${line}\n`);
}

export function logVerbose(message: string): void {
	if (verbose) {
		writeLine(`[${new Date().toISOString()}] ${message}`);
	}
}

export function logInfo(message: string): void {
	writeLine(message);
}

export function logError(message: string): void {
	writeLine(`Error: ${message}`);
}
