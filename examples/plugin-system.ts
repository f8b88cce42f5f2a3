/**
 * Plugin system walkthrough.
 *
 * Run with: npm run example
 */

import { noopLogger } from "../core/logger.ts";
import {
	bootstrapRegistry,
	describeMatches,
	discover,
	isRegistryError,
} from "../core/registry/index.ts";
import { SecurityPolicy } from "../core/security/index.ts";
import { builtinRegistrars, TextProcessorCapability } from "../plugins/index.ts";

function section(title: string): void {
	console.log(`\n${title}`);
	console.log("-".repeat(title.length));
}

async function main(): Promise<void> {
	console.log("=== Module Registry: Plugin System Example ===");

	section("1. Registering plugins");
	const registry = bootstrapRegistry(builtinRegistrars, { logger: noopLogger });
	console.log(`Registered ${registry.size} plugins`);

	section("2. Available plugins");
	for (const { name, metadata } of describeMatches(registry)) {
		console.log(`  - ${name} (${metadata.moduleType})`);
		console.log(`    Struct: ${metadata.structName}`);
		console.log(`    Path: ${metadata.modulePath}`);
	}

	section("3. Executing plugins");
	const input = "Hello, World!";
	for (const name of registry.list()) {
		const plugin = await registry.createAs(name, TextProcessorCapability);
		console.log(`  ${plugin.name} v${plugin.version}: "${input}" → "${plugin.process(input)}"`);
	}

	section("4. Discovery");
	console.log(`  tags [transform]: ${discover(registry, { requiredTags: ["transform"] }).join(", ")}`);
	console.log(`  prefer [case]:    ${discover(registry, { optionalTags: ["case"] }).join(", ")}`);

	section("5. Error handling");
	const missing = await registry.safeCreate("nonexistent");
	if (!missing.success) {
		console.log(`  ${missing.error.code}: ${missing.error.message}`);
	}

	section("6. Security audit");
	const policy = new SecurityPolicy(registry, { logger: noopLogger });
	for (const [name, result] of Object.entries(policy.audit())) {
		console.log(`  ${name}: ${result.isSecure ? "secure" : `risk ${result.riskLevel}`}`);
	}
	try {
		await policy.createSecure("echo", TextProcessorCapability);
	} catch (error) {
		if (!isRegistryError(error, "security_rejected")) throw error;
		console.log(`  ${error.message}`);
	}

	console.log("\n=== Example Complete ===");
}

main().catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
