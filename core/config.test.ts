import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	ConfigError,
	interpolateEnvVars,
	interpolateEnvVarsInObject,
	loadRegistryConfig,
	parseRegistryConfig,
} from "./config.ts";

describe("interpolateEnvVars", () => {
	const env = { HOST: "db.internal", EMPTY: "" };

	it("substitutes set variables", () => {
		expect(interpolateEnvVars("postgres://${HOST}:5432", env)).toBe("postgres://db.internal:5432");
	});

	it("falls back to the default for unset or empty variables", () => {
		expect(interpolateEnvVars("${PORT:-5432}", env)).toBe("5432");
		expect(interpolateEnvVars("${EMPTY:-fallback}", env)).toBe("fallback");
		expect(interpolateEnvVars("${PORT:-}", env)).toBe("");
	});

	it("keeps the placeholder when unset without a default", () => {
		expect(interpolateEnvVars("${MISSING}", env)).toBe("${MISSING}");
	});

	it("walks nested objects and arrays", () => {
		expect(
			interpolateEnvVarsInObject({ a: ["${HOST}", 1], b: { c: "${X:-y}", d: null } }, env),
		).toEqual({ a: ["db.internal", 1], b: { c: "y", d: null } });
	});
});

describe("parseRegistryConfig", () => {
	it("fills every default", () => {
		expect(parseRegistryConfig({})).toEqual({
			logLevel: "warn",
			selections: {},
			discovery: { concurrency: 4 },
			security: {
				requireSignature: true,
				requireApproval: true,
				requireSupplyChain: true,
				signatureAlgorithm: "SHA256-RSA",
				signatureExpirySeconds: 31_536_000,
			},
		});
	});

	it("treats an empty document as defaults", () => {
		expect(parseRegistryConfig(null).logLevel).toBe("warn");
	});

	it("lists validation issues with their paths", () => {
		try {
			parseRegistryConfig({ logLevel: "loud", discovery: { concurrency: 0 } }, "test.yaml");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigError);
			expect(error).toMatchObject({ source: "test.yaml" });
			const message = error instanceof Error ? error.message : "";
			expect(message.split("\n")[0]).toBe("Validation failed for test.yaml:");
			expect(message).toContain("  - logLevel: ");
			expect(message).toContain("  - discovery.concurrency: ");
		}
	});
});

describe("loadRegistryConfig", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "registry-config-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("loads and interpolates a YAML file", async () => {
		const path = join(dir, "registry.yaml");
		await writeFile(
			path,
			[
				"logLevel: ${LOG_LEVEL:-info}",
				"selections:",
				"  text: ${TEXT_PROCESSOR}",
				"discovery:",
				"  concurrency: 2",
				"security:",
				"  requireApproval: false",
			].join("\n"),
		);

		const config = await loadRegistryConfig(path, { TEXT_PROCESSOR: "reverse" });

		expect(config.logLevel).toBe("info");
		expect(config.selections).toEqual({ text: "reverse" });
		expect(config.discovery.concurrency).toBe(2);
		expect(config.security.requireApproval).toBe(false);
		expect(config.security.requireSignature).toBe(true);
	});

	it("uses the path from the environment", async () => {
		const path = join(dir, "custom.yaml");
		await writeFile(path, "logLevel: debug\n");

		const config = await loadRegistryConfig(undefined, { MODULE_REGISTRY_CONFIG: path });

		expect(config.logLevel).toBe("debug");
	});

	it("returns defaults when the file does not exist", async () => {
		const config = await loadRegistryConfig(join(dir, "absent.yaml"), {});

		expect(config.selections).toEqual({});
		expect(config.discovery.concurrency).toBe(4);
	});

	it("rejects malformed YAML", async () => {
		const path = join(dir, "broken.yaml");
		await writeFile(path, "selections: [unclosed\n");

		await expect(loadRegistryConfig(path, {})).rejects.toThrow(`Invalid YAML in ${path}`);
	});

	it("rejects values that fail validation", async () => {
		const path = join(dir, "invalid.yaml");
		await writeFile(path, "discovery:\n  concurrency: many\n");

		await expect(loadRegistryConfig(path, {})).rejects.toBeInstanceOf(ConfigError);
	});
});
