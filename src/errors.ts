export type ConfigErrorCode =
	| "CONFIG_NOT_FOUND"
	| "INVALID_LOCATION_TYPE"
	| "BAD_HTTP_STATUS"
	| "UNSUPPORTED_CONTENT_TYPE"
	| "INVALID_ARCHIVE"
	| "DOCKER_MOUNT_MISSING"
	| "CONFIG_EXISTS"
	| "WRITE_FAILED";

/**
 * Raised for conditions that leave no meaningful config set to return.
 * Recoverable problems (bad YAML, unreadable file, network failure) never
 * surface as this error; they become `null` entries in the result instead.
 */
export class ConfigResolutionError extends Error {
	readonly code: ConfigErrorCode;

	constructor(code: ConfigErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "ConfigResolutionError";
		this.code = code;
	}
}

export function isConfigResolutionError(
	error: unknown,
): error is ConfigResolutionError {
	return error instanceof ConfigResolutionError;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
