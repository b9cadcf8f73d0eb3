import { existsSync } from "node:fs";
import * as path from "node:path";
import { REPO_HOME_DOCKER } from "./constants";
import { ConfigResolutionError } from "./errors";
import type { ExecutionContext } from "./config-resolver/types";

export interface BaseDirOptions {
	precommit?: boolean;
	cwd?: string;
	/** Mount-point probe; replaced in tests */
	exists?: (target: string) => boolean;
}

export function readExecutionEnv(env: NodeJS.ProcessEnv): ExecutionContext {
	return {
		inDocker: env.SGREP_IN_DOCKER !== undefined,
		inCi: env.GITHUB_WORKSPACE !== undefined,
	};
}

/**
 * Pick the directory relative config paths and targets resolve against.
 * Inside the sgrep container (outside CI and pre-commit) that is the
 * repository mount point, which must exist.
 */
export function selectBaseDir(
	context: ExecutionContext,
	options: BaseDirOptions = {},
): string {
	const cwd = options.cwd ?? process.cwd();
	const exists = options.exists ?? existsSync;

	if (context.inDocker && !context.inCi && !options.precommit) {
		if (!exists(REPO_HOME_DOCKER)) {
			throw new ConfigResolutionError(
				"DOCKER_MOUNT_MISSING",
				`you are running sgrep in docker, but you forgot to mount the current directory in Docker: missing: -v "\${PWD}:${REPO_HOME_DOCKER}"`,
			);
		}
		return REPO_HOME_DOCKER;
	}
	return cwd;
}

export function resolveTargets(targets: string[], baseDir: string): string[] {
	return targets.map((target) =>
		path.isAbsolute(target) ? target : path.join(baseDir, target),
	);
}
