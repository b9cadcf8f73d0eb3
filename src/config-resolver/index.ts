import { ID_KEY, RULES_KEY } from "../constants";
import { isConfigResolutionError } from "../errors";
import { logVerbose } from "../logger";
import { LocalConfigLoader } from "./local-config-loader";
import { RemoteConfigLoader } from "./remote-config-loader";
import { DEFAULT_REGISTRY } from "./registry";
import { detectConfigSource } from "./utils";
import type {
	Registry,
	ResolvedConfigSet,
	ResolveResult,
	ResolverOptions,
} from "./types";

export * from "./types";
export * from "./utils";
export * from "./registry";
export { parseConfigString, parseConfigAtPath } from "./parse-config";
export { parseConfigFolder, LocalConfigLoader } from "./local-config-loader";
export { RemoteConfigLoader } from "./remote-config-loader";
export { withExtractedArchive } from "./archive";

export class ConfigResolver {
	private localLoader: LocalConfigLoader;
	private remoteLoader: RemoteConfigLoader;
	private registry: Registry;

	constructor(options: ResolverOptions = {}) {
		this.localLoader = new LocalConfigLoader(
			options.baseDir ?? process.cwd(),
			options.context,
		);
		this.remoteLoader = new RemoteConfigLoader();
		this.registry = options.registry ?? DEFAULT_REGISTRY;
	}

	/**
	 * Resolve a config specifier: a registry alias, a URL, a file or folder,
	 * or the default config location when `source` is undefined.
	 */
	async resolve(source: string | undefined): Promise<ResolveResult> {
		const start = Date.now();
		try {
			const configs = await this.load(source);
			const elapsed = ((Date.now() - start) / 1000).toFixed(3);
			logVerbose(
				`[ConfigResolver] loaded ${Object.keys(configs).length} configs in ${elapsed}s`,
			);
			return { status: "resolved", configs };
		} catch (error) {
			if (isConfigResolutionError(error)) {
				return { status: "failed", error };
			}
			throw error;
		}
	}

	private async load(source: string | undefined): Promise<ResolvedConfigSet> {
		const configSource = detectConfigSource(source, this.registry);
		logVerbose(`[ConfigResolver] Detected source type: ${configSource.type}`);

		switch (configSource.type) {
			case "default":
				return this.localLoader.loadDefault();
			case "registry":
				logVerbose(
					`[ConfigResolver] Registry entry ${configSource.name} → ${configSource.url}`,
				);
				return this.remoteLoader.load(configSource.url);
			case "url":
				return this.remoteLoader.load(configSource.url);
			case "local":
				return this.localLoader.load(configSource.location);
		}
	}
}

export async function resolveConfig(
	source: string | undefined,
	options: ResolverOptions = {},
): Promise<ResolveResult> {
	return new ConfigResolver(options).resolve(source);
}

/**
 * Build an in-memory config holding one rule for an inline pattern.
 */
export function manualConfig(pattern: string, lang: string): ResolvedConfigSet {
	return {
		manual: {
			[RULES_KEY]: [
				{
					[ID_KEY]: "-",
					pattern,
					message: pattern,
					languages: [lang],
					severity: "ERROR",
				},
			],
		},
	};
}
