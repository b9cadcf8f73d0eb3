import * as fs from "node:fs/promises";
import yaml from "js-yaml";
import { logError, logVerbose } from "../logger";
import { indent } from "./utils";
import type { ConfigDocument, ResolvedConfigSet } from "./types";

function toConfigDocument(value: unknown): ConfigDocument {
	if (value === null || value === undefined) {
		return null;
	}
	if (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean"
	) {
		return value;
	}
	if (Array.isArray(value)) {
		return value.map(toConfigDocument);
	}
	if (typeof value === "object") {
		const mapping: { [key: string]: ConfigDocument } = {};
		for (const [key, child] of Object.entries(value)) {
			// a plain assignment would treat a `__proto__` key as the prototype
			Object.defineProperty(mapping, key, {
				value: toConfigDocument(child),
				enumerable: true,
				writable: true,
				configurable: true,
			});
		}
		return mapping;
	}
	return String(value);
}

/**
 * Parse one YAML document. Syntax errors are reported and recorded as a
 * `null` entry for `configId` so sibling documents still resolve.
 */
export function parseConfigString(
	configId: string,
	contents: string,
): ResolvedConfigSet {
	try {
		const loaded: unknown = yaml.load(contents, {
			schema: yaml.CORE_SCHEMA,
			filename: configId,
		});
		return { [configId]: toConfigDocument(loaded) };
	} catch (error) {
		if (error instanceof yaml.YAMLException) {
			logError(`Invalid yaml file ${configId}:\n${indent(error.message)}`);
			return { [configId]: null };
		}
		throw error;
	}
}

export async function parseConfigAtPath(
	filePath: string,
	configId: string,
): Promise<ResolvedConfigSet> {
	logVerbose(`[ConfigResolver:parse] Reading file: ${filePath}`);
	let contents: string;
	try {
		contents = await fs.readFile(filePath, "utf-8");
	} catch (error) {
		if ((error as NodeJS.ErrnoException).code === "ENOENT") {
			logError(`YAML file at ${filePath} not found`);
			return { [configId]: null };
		}
		throw error;
	}
	return parseConfigString(configId, contents);
}
