import type { ConfigResolutionError } from "../errors";

/**
 * Tree produced by parsing one YAML document with the core schema.
 */
export type ConfigDocument =
	| string
	| number
	| boolean
	| null
	| ConfigDocument[]
	| { [key: string]: ConfigDocument };

/**
 * Config id → parsed document, or `null` when resolution of that document
 * was attempted and failed.
 */
export type ResolvedConfigSet = Record<string, ConfigDocument | null>;

export type Registry = Readonly<Record<string, string>>;

export type ConfigSpecifier =
	| { type: "default" }
	| { type: "registry"; name: string; url: string }
	| { type: "url"; url: string }
	| { type: "local"; location: string };

export type ResolveResult =
	| { status: "resolved"; configs: ResolvedConfigSet }
	| { status: "failed"; error: ConfigResolutionError };

export interface ExecutionContext {
	inDocker: boolean;
	inCi: boolean;
}

export interface ResolverOptions {
	/** Directory relative specifiers and the default config are resolved against */
	baseDir?: string;
	registry?: Registry;
	context?: ExecutionContext;
}

export interface ConfigLoader {
	load(location: string): Promise<ResolvedConfigSet>;
}
