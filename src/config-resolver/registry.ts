import type { Registry } from "./types";

export const DEFAULT_REGISTRY_KEY = "r2c";

export function createRegistry(entries: Record<string, string>): Registry {
	return Object.freeze({ ...entries });
}

export const DEFAULT_REGISTRY: Registry = createRegistry({
	r2c: "https://github.com/returntocorp/sgrep-rules/tarball/master",
	"r2c-develop": "https://github.com/returntocorp/sgrep-rules/tarball/develop",
});

export function lookupRegistry(
	registry: Registry,
	name: string,
): string | undefined {
	return Object.prototype.hasOwnProperty.call(registry, name)
		? registry[name]
		: undefined;
}
