import * as crypto from "node:crypto";
import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { ReadableStream } from "node:stream/web";
import * as tar from "tar";
import { ConfigResolutionError } from "../errors";
import { logVerbose } from "../logger";

const ARCHIVE_FILE_NAME = "archive.tar.gz";
const EXTRACT_DIR_NAME = "extracted";

/**
 * Scratch directory prefix derived from the archive URL. `mkdtemp` appends a
 * unique suffix, so concurrent extractions of one URL never share a directory.
 */
export function scratchPrefix(url: string): string {
	const digest = crypto.createHash("sha256").update(url).digest("hex");
	return path.join(os.tmpdir(), `sgrep-config-${digest.slice(0, 16)}-`);
}

function leadingComponent(memberPath: string): string | undefined {
	return memberPath
		.split("/")
		.find((part) => part.length > 0 && part !== ".");
}

/**
 * Extract `archivePath` into `extractDir` and return the top-level
 * component of the first member, in archive order.
 */
async function extractArchive(
	archivePath: string,
	extractDir: string,
): Promise<string | undefined> {
	const firstMembers: string[] = [];
	await tar.x({
		file: archivePath,
		cwd: extractDir,
		strict: true,
		filter: (memberPath) => {
			const top = leadingComponent(memberPath);
			if (firstMembers.length === 0 && top !== undefined) {
				firstMembers.push(top);
			}
			return true;
		},
	});
	return firstMembers[0];
}

async function findTopLevelDirectory(
	extractDir: string,
	firstMember: string | undefined,
): Promise<string> {
	if (firstMember === undefined) {
		throw new ConfigResolutionError(
			"INVALID_ARCHIVE",
			"config archive is empty; expected a top-level directory",
		);
	}
	const root = path.join(extractDir, firstMember);
	const stats = await fs.lstat(root);
	if (!stats.isDirectory()) {
		throw new ConfigResolutionError(
			"INVALID_ARCHIVE",
			`config archive top-level entry \`${firstMember}\` is not a directory`,
		);
	}
	return root;
}

/**
 * Download a gzipped tarball into a scratch directory, extract it, and hand
 * the directory of the archive's first member to `scan`. The scratch directory
 * is removed once `scan` settles, whether it succeeded or threw.
 */
export async function withExtractedArchive<T>(
	url: string,
	body: ReadableStream<Uint8Array>,
	scan: (root: string) => Promise<T>,
): Promise<T> {
	const scratchDir = await fs.mkdtemp(scratchPrefix(url));
	logVerbose(`[ConfigResolver:archive] Extracting ${url} into ${scratchDir}`);

	try {
		const archivePath = path.join(scratchDir, ARCHIVE_FILE_NAME);
		const extractDir = path.join(scratchDir, EXTRACT_DIR_NAME);

		await pipeline(Readable.fromWeb(body), createWriteStream(archivePath));
		await fs.mkdir(extractDir);
		const firstMember = await extractArchive(archivePath, extractDir);

		const root = await findTopLevelDirectory(extractDir, firstMember);
		logVerbose(`[ConfigResolver:archive] Scanning ${root}`);
		return await scan(root);
	} finally {
		await fs.rm(scratchDir, { recursive: true, force: true });
		logVerbose(`[ConfigResolver:archive] Removed ${scratchDir}`);
	}
}
