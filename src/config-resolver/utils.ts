import * as path from "node:path";
import {
	DEFAULT_SGREP_CONFIG_NAME,
	YML_EXTENSIONS,
} from "../constants";
import { lookupRegistry } from "./registry";
import type { ConfigSpecifier, Registry } from "./types";

export function detectConfigSource(
	source: string | undefined,
	registry: Registry,
): ConfigSpecifier {
	if (source === undefined) {
		return { type: "default" };
	}

	const registryUrl = lookupRegistry(registry, source);
	if (registryUrl !== undefined) {
		return { type: "registry", name: source, url: registryUrl };
	}

	if (isUrl(source)) {
		return { type: "url", url: source };
	}

	return { type: "local", location: source };
}

/**
 * True when the value has both a scheme and a host, e.g. `https://host/x`.
 * Windows drive paths such as `C:\rules` parse with an empty host and stay local.
 */
export function isUrl(value: string): boolean {
	try {
		const url = new URL(value);
		return url.protocol.length > 1 && url.host.length > 0;
	} catch {
		return false;
	}
}

export function indent(message: string): string {
	return message
		.split(/\r?\n/)
		.map((line) => `\t${line}`)
		.join("\n");
}

export function hasConfigExtension(filePath: string): boolean {
	return YML_EXTENSIONS.includes(path.extname(filePath));
}

/**
 * Keeps `rules/.sgrep.yml` and `src/.sgrep/bad_pattern.yml` but not
 * `path/.github/foo.yml`: only ancestor directories are inspected.
 */
export function isHiddenConfigDir(filePath: string): boolean {
	const parts = filePath.split(/[\\/]+/).filter((part) => part.length > 0);
	return parts
		.slice(0, -1)
		.some(
			(part) =>
				part !== "." &&
				part !== ".." &&
				part.startsWith(".") &&
				!part.includes(DEFAULT_SGREP_CONFIG_NAME),
		);
}

/**
 * Joins path segments with forward slashes so config ids stay stable across platforms.
 */
export function toConfigId(...segments: string[]): string {
	return path.join(...segments).split(path.sep).join("/");
}
