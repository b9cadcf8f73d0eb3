#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { generateConfig } from "./commands/init";
import { manualConfig, resolveConfig } from "./config-resolver";
import type { ResolvedConfigSet } from "./config-resolver";
import { DEFAULT_CONFIG_FILE } from "./constants";
import { errorMessage } from "./errors";
import {
	readExecutionEnv,
	resolveTargets,
	selectBaseDir,
} from "./execution-context";
import { logError, logInfo, logVerbose, setVerbose } from "./logger";

function fail(error: unknown): never {
	logError(errorMessage(error));
	process.exit(1);
}

async function main() {
	const parser = yargs(hideBin(process.argv))
		.scriptName("sgrep-config")
		.usage("$0 [targets..] [options]")
		.command(
			"$0 [targets..]",
			"Resolve rule configs and print them as JSON",
			(cmd) =>
				cmd
					.positional("targets", {
						type: "string",
						array: true,
						description: "Files or folders to search (default: .)",
					})
					.option("config", {
						alias: "f",
						type: "string",
						description:
							"Config source: registry name, URL, YAML file, or folder of YAML files",
						example: "r2c",
					})
					.option("pattern", {
						alias: "e",
						type: "string",
						description: "Inline pattern used instead of a config",
					})
					.option("lang", {
						alias: "l",
						type: "string",
						description: "Language of the inline pattern",
					})
					.option("generate-config", {
						type: "boolean",
						description: `Generate starter ${DEFAULT_CONFIG_FILE}`,
						default: false,
					})
					.option("precommit", {
						type: "boolean",
						description: "Running as a pre-commit hook",
						default: false,
					})
					.option("verbose", {
						alias: "v",
						type: "boolean",
						description: "Enable verbose logging",
						default: false,
					})
					.conflicts("pattern", "config")
					.implies("pattern", "lang"),
			async (args) => {
				setVerbose(!!args.verbose);
				logVerbose("[CLI] Verbose mode enabled");

				try {
					const context = readExecutionEnv(process.env);
					const baseDir = selectBaseDir(context, {
						precommit: !!args.precommit,
					});
					logVerbose(`[CLI] Base directory: ${baseDir}`);

					if (args["generate-config"]) {
						const res = await generateConfig({ baseDir });
						logInfo(
							`Template config successfully written to ${res.path}`,
						);
						return;
					}

					let configs: ResolvedConfigSet;
					if (args.pattern !== undefined && args.lang !== undefined) {
						configs = manualConfig(args.pattern, args.lang);
					} else {
						const result = await resolveConfig(args.config, {
							baseDir,
							context,
						});
						if (result.status === "failed") {
							fail(result.error);
						}
						configs = result.configs;
					}

					const targets = resolveTargets(
						args.targets && args.targets.length > 0 ? args.targets : ["."],
						baseDir,
					);
					process.stdout.write(
						JSON.stringify({ targets, configs }, null, 2) + "\n",
					);
				} catch (e) {
					fail(e);
				}
			},
		)
		.help("help")
		.alias("help", "h")
		.version(false)
		.example("$0", `Use ${DEFAULT_CONFIG_FILE} or .sgrep/ from the current directory`)
		.example("$0 --config r2c", "Use the r2c rule registry")
		.example(
			"$0 --config https://example.com/rules.yml",
			"Use a remote config (text/plain YAML or a gzipped tarball)",
		)
		.example("$0 -e '$X == $X' -l python src/", "Use an inline pattern")
		.epilogue(
			"Environment:\n" +
				"  SGREP_IN_DOCKER   running inside the sgrep container; paths resolve against /home/repo/\n" +
				"  GITHUB_WORKSPACE  running in GitHub Actions; keeps the current directory",
		)
		.strict()
		.wrap(100);

	await parser.parseAsync();
}

main().catch(fail);
