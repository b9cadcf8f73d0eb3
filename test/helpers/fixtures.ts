import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import * as tar from "tar";

export async function makeTempDir(prefix = "sgrep-config-test-"): Promise<string> {
	return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write `files` (relative path → content) below `root`.
 */
export async function writeFiles(
	root: string,
	files: Record<string, string>,
): Promise<void> {
	for (const [relativePath, content] of Object.entries(files)) {
		const target = path.join(root, relativePath);
		await fs.mkdir(path.dirname(target), { recursive: true });
		await fs.writeFile(target, content);
	}
}

/**
 * Build a gzipped tarball in memory whose members are `files`.
 */
export async function buildTarball(
	files: Record<string, string>,
): Promise<Buffer> {
	const workDir = await makeTempDir("sgrep-config-tarball-");
	try {
		const stageDir = path.join(workDir, "stage");
		const archivePath = path.join(workDir, "archive.tar.gz");
		await fs.mkdir(stageDir);
		await writeFiles(stageDir, files);
		const topLevel = (await fs.readdir(stageDir)).sort();
		await tar.c({ gzip: true, file: archivePath, cwd: stageDir }, topLevel);
		return await fs.readFile(archivePath);
	} finally {
		await fs.rm(workDir, { recursive: true, force: true });
	}
}

export function tarballResponse(body: Buffer): Response {
	return new Response(body, {
		status: 200,
		headers: { "Content-Type": "application/x-gzip" },
	});
}

export function textResponse(
	body: string,
	contentType = "text/plain; charset=utf-8",
): Response {
	return new Response(body, {
		status: 200,
		headers: { "Content-Type": contentType },
	});
}
