import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_CONFIG_FILE, DEFAULT_CONFIG_FOLDER } from "../constants";
import { ConfigResolutionError } from "../errors";
import { logVerbose } from "../logger";
import { parseConfigAtPath } from "./parse-config";
import { hasConfigExtension, isHiddenConfigDir, toConfigId } from "./utils";
import type {
	ConfigLoader,
	ExecutionContext,
	ResolvedConfigSet,
} from "./types";

export interface FolderScanOptions {
	/** Key configs by their path inside the folder instead of the shown path */
	relative: boolean;
	/** How the folder is presented to the caller; prefixes non-relative ids */
	displayRoot?: string;
}

async function statOrUndefined(target: string): Promise<Stats | undefined> {
	try {
		return await fs.stat(target);
	} catch (error) {
		if ((error as NodeJS.ErrnoException).code === "ENOENT") {
			return undefined;
		}
		throw error;
	}
}

async function listFiles(root: string, dir = ""): Promise<string[]> {
	const entries = await fs.readdir(path.join(root, dir), {
		withFileTypes: true,
	});
	entries.sort((a, b) => a.name.localeCompare(b.name));

	const files: string[] = [];
	for (const entry of entries) {
		const relativePath = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			files.push(...(await listFiles(root, relativePath)));
		} else if (entry.isFile()) {
			files.push(relativePath);
		} else if (entry.isSymbolicLink()) {
			// linked files are scanned; linked directories are not descended into
			const target = await statOrUndefined(path.join(root, relativePath));
			if (target?.isFile()) {
				files.push(relativePath);
			}
		}
	}
	return files;
}

/**
 * Parse every YAML file below `root`, one at a time. Files inside hidden
 * directories are skipped unless the directory is an sgrep config folder.
 */
export async function parseConfigFolder(
	root: string,
	options: FolderScanOptions,
): Promise<ResolvedConfigSet> {
	const displayRoot = options.displayRoot ?? root;
	const configs: ResolvedConfigSet = {};

	for (const relativePath of await listFiles(root)) {
		const shownPath = path.join(displayRoot, relativePath);
		if (!hasConfigExtension(relativePath) || isHiddenConfigDir(shownPath)) {
			continue;
		}
		const configId = options.relative
			? toConfigId(relativePath)
			: toConfigId(displayRoot, relativePath);
		Object.assign(
			configs,
			await parseConfigAtPath(path.join(root, relativePath), configId),
		);
	}

	logVerbose(
		`[ConfigResolver:local] Parsed ${Object.keys(configs).length} configs in ${root}`,
	);
	return configs;
}

export class LocalConfigLoader implements ConfigLoader {
	private baseDir: string;
	private context?: ExecutionContext;

	constructor(baseDir: string, context?: ExecutionContext) {
		this.baseDir = baseDir;
		this.context = context;
	}

	/**
	 * Probe `sgrep.yml`, then `.sgrep/`. Neither existing is not fatal.
	 */
	async loadDefault(): Promise<ResolvedConfigSet> {
		const defaultFile = path.join(this.baseDir, DEFAULT_CONFIG_FILE);
		if (await statOrUndefined(defaultFile)) {
			return parseConfigAtPath(defaultFile, DEFAULT_CONFIG_FILE);
		}

		const defaultFolder = path.join(this.baseDir, DEFAULT_CONFIG_FOLDER);
		if (await statOrUndefined(defaultFolder)) {
			return parseConfigFolder(defaultFolder, {
				relative: true,
				displayRoot: DEFAULT_CONFIG_FOLDER,
			});
		}

		logVerbose(
			`[ConfigResolver:local] No ${DEFAULT_CONFIG_FILE} or ${DEFAULT_CONFIG_FOLDER}/ in ${this.baseDir}`,
		);
		return { [DEFAULT_CONFIG_FILE]: null };
	}

	async load(location: string): Promise<ResolvedConfigSet> {
		const resolvedPath = path.resolve(this.baseDir, location);
		const shownPath = path.normalize(location);
		logVerbose(`[ConfigResolver:local] Resolving: ${resolvedPath}`);

		const stats = await statOrUndefined(resolvedPath);
		if (!stats) {
			const addendum = this.context?.inDocker
				? " (since you are running in docker, you cannot specify arbitrary paths on the host; they must be mounted into the container)"
				: "";
			throw new ConfigResolutionError(
				"CONFIG_NOT_FOUND",
				`unable to find a config; path \`${resolvedPath}\` does not exist${addendum}`,
			);
		}

		if (stats.isFile()) {
			return parseConfigAtPath(resolvedPath, toConfigId(shownPath));
		}
		if (stats.isDirectory()) {
			return parseConfigFolder(resolvedPath, {
				relative: false,
				displayRoot: shownPath,
			});
		}

		throw new ConfigResolutionError(
			"INVALID_LOCATION_TYPE",
			`config location \`${resolvedPath}\` is not a file or folder!`,
		);
	}
}
