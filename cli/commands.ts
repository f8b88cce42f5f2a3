/**
 * CLI commands over a ModuleRegistry.
 * Each command prints to stdout and returns the process exit code.
 */

import type { RegistryConfig } from "../core/config.ts";
import { resolveSelection } from "../core/selection.ts";
import {
	createMatching,
	describeMatches,
	isRegistryError,
	type DiscoveryQuery,
	type ModuleRegistry,
} from "../core/registry/index.ts";
import { SecurityPolicy } from "../core/security/index.ts";
import { TextProcessorCapability } from "../plugins/text-processors.ts";
import { toStringArray, toStringOption, type OptionValue } from "./args.ts";

/**
 * Print help message.
 */
export function printHelp(): void {
	console.log(`
Usage:
  module-registry <command> [options]

Commands:
  list                 List registered modules
  describe <name>      Show metadata for a module
  run [name] <input>   Create a text processor and run it on <input>
                       (without a name, the one selected for "text")
  run-all <input>      Run every matching text processor on <input>
  audit                Run security checks on every module
  help                 Show this help message

Options:
  --config <path>      Config file (default: $MODULE_REGISTRY_CONFIG or registry.yaml)

Options for list and run-all:
  --type <type>        Only modules of this type
  --tags a,b           Only modules carrying every tag
  --prefer a,b         Rank modules carrying these tags first
  --pattern <text>     Only names containing <text>

Examples:
  module-registry list --tags text
  module-registry run-all "Hello" --tags transform
  module-registry describe uppercase
  module-registry run reverse "Hello, World!"
  TEXT_PROCESSOR=echo module-registry run "Hello"
`);
}

function queryFromOptions(options: Record<string, OptionValue>): DiscoveryQuery {
	return {
		moduleType: toStringOption(options.type),
		pattern: toStringOption(options.pattern),
		requiredTags: toStringArray(options.tags),
		optionalTags: toStringArray(options.prefer),
	};
}

/**
 * List command - list modules matching the filters.
 */
export function listCommand(
	registry: ModuleRegistry,
	options: Record<string, OptionValue>,
): number {
	const matches = describeMatches(registry, queryFromOptions(options));

	console.log("\nModules:");
	console.log("─".repeat(60));

	if (matches.length === 0) {
		console.log("  No modules found.");
	} else {
		for (const { name, metadata } of matches) {
			const tagsStr = metadata.tags.length ? ` [${metadata.tags.join(", ")}]` : "";
			console.log(`  ${name.padEnd(25)} ${metadata.moduleType}${tagsStr}`);
			if (metadata.description) {
				console.log(`  ${"".padEnd(25)} ${metadata.description}`);
			}
		}
	}

	console.log();
	return 0;
}

/**
 * Describe command - show the metadata of one module.
 */
export function describeCommand(registry: ModuleRegistry, name: string): number {
	const metadata = registry.getMetadata(name);
	if (!metadata) {
		console.error(`\nNot found: '${name}' is not a registered module.\n`);
		return 1;
	}

	console.log(`\nModule: ${metadata.name}`);
	console.log("─".repeat(60));
	console.log(`  Type:        ${metadata.moduleType}`);
	console.log(`  Struct:      ${metadata.structName}`);
	console.log(`  Path:        ${metadata.modulePath}`);
	console.log(`  Factory:     ${metadata.instantiateFn}`);
	if (metadata.description) console.log(`  Description: ${metadata.description}`);
	if (metadata.tags.length) console.log(`  Tags:        ${metadata.tags.join(", ")}`);
	if (metadata.aliases.length) console.log(`  Aliases:     ${metadata.aliases.join(", ")}`);
	console.log();
	return 0;
}

/** Selection slot consulted when `run` is given no module name */
export const TEXT_SLOT = "text";

/**
 * Run command - create a text processor and apply it to the input.
 * `args` is `[name, input]`, or `[input]` to use the configured selection.
 */
export async function runCommand(
	registry: ModuleRegistry,
	config: Pick<RegistryConfig, "selections">,
	args: readonly string[],
): Promise<number> {
	const [first, second] = args;
	if (first === undefined) {
		console.error("\nUsage: module-registry run [name] <input>\n");
		return 1;
	}
	const name = second === undefined ? resolveSelection(config, TEXT_SLOT) : first;
	const input = second ?? first;

	const result = await registry.safeCreateAs(name, TextProcessorCapability);
	if (!result.success) {
		console.error(`\n${result.error.message}\n`);
		return 1;
	}

	console.log(`${result.data.name} → "${result.data.process(input)}"`);
	return 0;
}

/**
 * Run-all command - apply every matching text processor to the input.
 * Processors are created concurrently, up to `discovery.concurrency` at once.
 */
export async function runAllCommand(
	registry: ModuleRegistry,
	config: Pick<RegistryConfig, "discovery">,
	input: string | undefined,
	options: Record<string, OptionValue>,
): Promise<number> {
	if (input === undefined) {
		console.error("\nUsage: module-registry run-all <input> [--type t] [--tags a,b]\n");
		return 1;
	}

	const created = await createMatching(registry, queryFromOptions(options), TextProcessorCapability, {
		concurrency: config.discovery.concurrency,
	});
	if (created.length === 0) {
		console.log("  No modules found.");
	}
	for (const { name, instance } of created) {
		console.log(`${name} → "${instance.process(input)}"`);
	}
	return 0;
}

/**
 * Audit command - print the security check of every module.
 */
export function auditCommand(registry: ModuleRegistry, config: RegistryConfig): number {
	const policy = new SecurityPolicy(registry, {
		requirements: config.security,
		signatureAlgorithm: config.security.signatureAlgorithm,
		signatureExpirySeconds: config.security.signatureExpirySeconds,
	});

	const audit = policy.audit();
	const names = Object.keys(audit);

	console.log("\nSecurity audit:");
	console.log("─".repeat(60));

	if (names.length === 0) {
		console.log("  No modules registered.");
	}
	for (const name of names) {
		const result = audit[name];
		if (!result) continue;
		const status = result.isSecure ? "PASSED" : "FAILED";
		console.log(`  ${name.padEnd(25)} ${status} (risk: ${result.riskLevel})`);
		for (const issue of result.issues) {
			console.log(`    - [${issue.severity}] ${issue.component}: ${issue.message}`);
		}
	}

	console.log();
	return 0;
}

/**
 * Human-readable message for an error raised by a command.
 */
export function formatCommandError(error: unknown): string {
	if (isRegistryError(error)) {
		return `${error.code}: ${error.message}`;
	}
	return error instanceof Error ? error.message : String(error);
}
