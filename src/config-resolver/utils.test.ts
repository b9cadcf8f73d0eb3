import { describe, it, expect } from "@jest/globals";
import {
	detectConfigSource,
	hasConfigExtension,
	indent,
	isHiddenConfigDir,
	isUrl,
	toConfigId,
} from "./utils";
import {
	createRegistry,
	DEFAULT_REGISTRY,
	DEFAULT_REGISTRY_KEY,
	lookupRegistry,
} from "./registry";

describe("detectConfigSource", () => {
	it("treats a missing specifier as the default location", () => {
		expect(detectConfigSource(undefined, DEFAULT_REGISTRY)).toEqual({
			type: "default",
		});
	});

	it("detects registry aliases", () => {
		expect(detectConfigSource("r2c", DEFAULT_REGISTRY)).toEqual({
			type: "registry",
			name: "r2c",
			url: "https://github.com/returntocorp/sgrep-rules/tarball/master",
		});
		expect(detectConfigSource("r2c-develop", DEFAULT_REGISTRY)).toEqual({
			type: "registry",
			name: "r2c-develop",
			url: "https://github.com/returntocorp/sgrep-rules/tarball/develop",
		});
	});

	it("matches aliases exactly", () => {
		expect(detectConfigSource("R2C", DEFAULT_REGISTRY)).toEqual({
			type: "local",
			location: "R2C",
		});
		expect(detectConfigSource("toString", DEFAULT_REGISTRY)).toEqual({
			type: "local",
			location: "toString",
		});
	});

	it("detects URLs", () => {
		expect(
			detectConfigSource("https://example.com/rules.yml", DEFAULT_REGISTRY),
		).toEqual({ type: "url", url: "https://example.com/rules.yml" });
		expect(
			detectConfigSource("http://localhost:8080/rules", DEFAULT_REGISTRY),
		).toEqual({ type: "url", url: "http://localhost:8080/rules" });
	});

	it("falls back to a local path", () => {
		expect(detectConfigSource("./rules", DEFAULT_REGISTRY)).toEqual({
			type: "local",
			location: "./rules",
		});
		expect(detectConfigSource("", DEFAULT_REGISTRY)).toEqual({
			type: "local",
			location: "",
		});
	});

	it("uses the injected registry", () => {
		const registry = createRegistry({
			team: "https://rules.example.com/team.tar.gz",
		});
		expect(detectConfigSource("team", registry)).toEqual({
			type: "registry",
			name: "team",
			url: "https://rules.example.com/team.tar.gz",
		});
		expect(detectConfigSource("r2c", registry)).toEqual({
			type: "local",
			location: "r2c",
		});
	});
});

describe("registry", () => {
	it("defaults to the r2c entry", () => {
		expect(DEFAULT_REGISTRY_KEY).toBe("r2c");
		expect(lookupRegistry(DEFAULT_REGISTRY, DEFAULT_REGISTRY_KEY)).toBe(
			"https://github.com/returntocorp/sgrep-rules/tarball/master",
		);
	});

	it("is frozen", () => {
		expect(Object.isFrozen(DEFAULT_REGISTRY)).toBe(true);
		const registry = createRegistry({ a: "https://example.com/a.tgz" });
		expect(Object.isFrozen(registry)).toBe(true);
	});

	it("copies its entries", () => {
		const entries = { a: "https://example.com/a.tgz" };
		const registry = createRegistry(entries);
		entries.a = "https://example.com/changed.tgz";
		expect(lookupRegistry(registry, "a")).toBe("https://example.com/a.tgz");
	});
});

describe("isUrl", () => {
	it("requires a scheme and a host", () => {
		expect(isUrl("https://example.com/rules.yml")).toBe(true);
		expect(isUrl("http://127.0.0.1/x")).toBe(true);
		expect(isUrl("rules/a.yml")).toBe(false);
		expect(isUrl("/abs/rules.yml")).toBe(false);
		expect(isUrl("file:///tmp/rules.yml")).toBe(false);
		expect(isUrl("C:\\rules\\a.yml")).toBe(false);
		expect(isUrl("mailto:someone@example.com")).toBe(false);
	});
});

describe("indent", () => {
	it("prefixes every line with a tab", () => {
		expect(indent("first\nsecond")).toBe("\tfirst\n\tsecond");
		expect(indent("single")).toBe("\tsingle");
	});
});

describe("hasConfigExtension", () => {
	it("accepts .yml and .yaml only", () => {
		expect(hasConfigExtension("a.yml")).toBe(true);
		expect(hasConfigExtension("dir/b.yaml")).toBe(true);
		expect(hasConfigExtension("c.json")).toBe(false);
		expect(hasConfigExtension("yml")).toBe(false);
		expect(hasConfigExtension("d.YML")).toBe(false);
	});
});

describe("isHiddenConfigDir", () => {
	it("excludes files below hidden directories", () => {
		expect(isHiddenConfigDir("proj/.github/rule.yml")).toBe(true);
		expect(isHiddenConfigDir(".github/workflows/ci.yml")).toBe(true);
		expect(isHiddenConfigDir("/home/user/.config/rules/a.yml")).toBe(true);
	});

	it("keeps sgrep config directories", () => {
		expect(isHiddenConfigDir("proj/.sgrep/rule.yml")).toBe(false);
		expect(isHiddenConfigDir("src/.sgrep_rules/bad_pattern.yml")).toBe(false);
	});

	it("never inspects the file name itself", () => {
		expect(isHiddenConfigDir("proj/rules/.hidden.yml")).toBe(false);
		expect(isHiddenConfigDir("rules/.sgrep.yml")).toBe(false);
		expect(isHiddenConfigDir(".hidden.yml")).toBe(false);
	});

	it("ignores current and parent directory markers", () => {
		expect(isHiddenConfigDir("./rules/a.yml")).toBe(false);
		expect(isHiddenConfigDir("../rules/a.yml")).toBe(false);
	});
});

describe("toConfigId", () => {
	it("joins with forward slashes", () => {
		expect(toConfigId("rules", "python", "a.yml")).toBe("rules/python/a.yml");
		expect(toConfigId("./rules/", "a.yml")).toBe("rules/a.yml");
	});
});
