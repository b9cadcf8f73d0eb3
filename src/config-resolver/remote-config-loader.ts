import { TextDecoder } from "node:util";
import { REMOTE_CONFIG_ID, USER_AGENT } from "../constants";
import {
	ConfigResolutionError,
	errorMessage,
	isConfigResolutionError,
} from "../errors";
import { logError, logVerbose } from "../logger";
import { withExtractedArchive } from "./archive";
import { parseConfigFolder } from "./local-config-loader";
import { parseConfigString } from "./parse-config";
import type { ConfigLoader, ResolvedConfigSet } from "./types";

const PLAIN_TEXT_TYPE = "text/plain";
const GZIP_ARCHIVE_TYPE = "application/x-gzip";

function mediaType(contentType: string): string {
	return (contentType.split(";")[0] ?? "").trim().toLowerCase();
}

export class RemoteConfigLoader implements ConfigLoader {
	/**
	 * Fetch a config from `url`. Bad status codes and unknown content types are
	 * fatal; any other failure is logged and yields `{ [url]: null }`.
	 */
	async load(url: string): Promise<ResolvedConfigSet> {
		logVerbose(`[ConfigResolver:remote] trying to download from ${url}`);
		try {
			return await this.download(url);
		} catch (error) {
			if (isConfigResolutionError(error)) {
				throw error;
			}
			logError(`Failed to fetch config from ${url}: ${errorMessage(error)}`);
			return { [url]: null };
		}
	}

	private async download(url: string): Promise<ResolvedConfigSet> {
		const response = await fetch(url, {
			headers: {
				"User-Agent": USER_AGENT,
			},
		});

		if (!response.ok) {
			throw new ConfigResolutionError(
				"BAD_HTTP_STATUS",
				`bad status code: ${response.status} returned by config url: ${url}`,
			);
		}

		const contentType = response.headers.get("content-type");
		logVerbose(
			`[ConfigResolver:remote] ${url} responded with content-type ${contentType ?? "(none)"}`,
		);

		if (contentType && mediaType(contentType) === PLAIN_TEXT_TYPE) {
			// throws on invalid UTF-8 rather than substituting U+FFFD
			const text = new TextDecoder("utf-8", { fatal: true }).decode(
				await response.arrayBuffer(),
			);
			return parseConfigString(REMOTE_CONFIG_ID, text);
		}

		if (contentType && mediaType(contentType) === GZIP_ARCHIVE_TYPE) {
			const body = response.body;
			if (!body) {
				throw new Error(`empty response body from ${url}`);
			}
			return withExtractedArchive(url, body, (root) =>
				parseConfigFolder(root, { relative: true, displayRoot: "" }),
			);
		}

		throw new ConfigResolutionError(
			"UNSUPPORTED_CONTENT_TYPE",
			`unknown content-type: ${contentType ?? "(none)"} returned by config url: ${url}. Can not parse`,
		);
	}
}
