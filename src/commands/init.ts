import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
	DEFAULT_CONFIG_FILE,
	FALLBACK_TEMPLATE_YAML,
	TEMPLATE_FETCH_TIMEOUT_MS,
	TEMPLATE_YAML_URL,
	USER_AGENT,
} from "../constants";
import { ConfigResolutionError, errorMessage } from "../errors";
import { logInfo, logVerbose } from "../logger";

export interface GenerateConfigOptions {
	/** Directory the template is written into (default: cwd) */
	baseDir?: string;
	templateUrl?: string;
	timeoutMs?: number;
}

export interface GenerateConfigResult {
	status: "created";
	path: string;
	source: "remote" | "fallback";
	content: string;
}

async function fetchTemplate(url: string, timeoutMs: number): Promise<string> {
	const controller = new AbortController();
	const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

	try {
		const response = await fetch(url, {
			signal: controller.signal,
			headers: {
				"User-Agent": USER_AGENT,
			},
		});
		if (!response.ok) {
			throw new Error(
				`Failed to fetch template: HTTP ${response.status} ${response.statusText}`,
			);
		}
		return await response.text();
	} catch (error) {
		if (error instanceof Error && error.name === "AbortError") {
			throw new Error(`Request timeout after ${timeoutMs}ms`);
		}
		throw error;
	} finally {
		clearTimeout(timeoutId);
	}
}

async function pathExists(target: string): Promise<boolean> {
	try {
		await fs.access(target);
		return true;
	} catch {
		return false;
	}
}

/**
 * Write a starter `sgrep.yml`, preferring the published template and falling
 * back to a built-in one. Never overwrites an existing file.
 */
export async function generateConfig(
	opts: GenerateConfigOptions = {},
): Promise<GenerateConfigResult> {
	const outPath = path.resolve(opts.baseDir ?? process.cwd(), DEFAULT_CONFIG_FILE);

	if (await pathExists(outPath)) {
		throw new ConfigResolutionError(
			"CONFIG_EXISTS",
			`${DEFAULT_CONFIG_FILE} already exists. Please remove and try again`,
		);
	}

	let content: string;
	let source: GenerateConfigResult["source"];
	try {
		content = await fetchTemplate(
			opts.templateUrl ?? TEMPLATE_YAML_URL,
			opts.timeoutMs ?? TEMPLATE_FETCH_TIMEOUT_MS,
		);
		source = "remote";
	} catch (error) {
		logVerbose(`[init] ${errorMessage(error)}`);
		logInfo(
			"There was a problem downloading the latest template config. Using fallback template",
		);
		content = FALLBACK_TEMPLATE_YAML;
		source = "fallback";
	}

	try {
		await fs.writeFile(outPath, content, { encoding: "utf8", flag: "wx" });
	} catch (error) {
		throw new ConfigResolutionError(
			"WRITE_FAILED",
			`Failed to write ${outPath}: ${errorMessage(error)}`,
			{ cause: error },
		);
	}

	return { status: "created", path: outPath, source, content };
}
