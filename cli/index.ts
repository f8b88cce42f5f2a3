#!/usr/bin/env tsx
/**
 * CLI entry point.
 * Lists, describes, runs and audits the modules in the global registry.
 */

import { loadRegistryConfig } from "../core/config.ts";
import { createConsoleLogger } from "../core/logger.ts";
import { globalRegistry, setGlobalRegistryLogger } from "../core/registry/index.ts";
import "../plugins/index.ts";
import { parseArgs, toStringOption } from "./args.ts";
import {
	auditCommand,
	describeCommand,
	formatCommandError,
	listCommand,
	printHelp,
	runAllCommand,
	runCommand,
} from "./commands.ts";

async function main(): Promise<number> {
	const parsed = parseArgs(process.argv);
	const config = await loadRegistryConfig(toStringOption(parsed.options.config));

	setGlobalRegistryLogger(createConsoleLogger("ModuleRegistry", config.logLevel));
	const registry = globalRegistry();

	switch (parsed.command) {
		case "help":
		case "--help":
		case "-h":
			printHelp();
			return 0;

		case "list":
			return listCommand(registry, parsed.options);

		case "describe":
			if (!parsed.args[0]) {
				console.error("\nPlease specify a module name.\n");
				return 1;
			}
			return describeCommand(registry, parsed.args[0]);

		case "run":
			return runCommand(registry, config, parsed.args);

		case "run-all":
			return runAllCommand(registry, config, parsed.args[0], parsed.options);

		case "audit":
			return auditCommand(registry, config);

		default:
			console.error(`\nUnknown command: ${parsed.command}\n`);
			printHelp();
			return 1;
	}
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error(`\n${formatCommandError(error)}\n`);
		process.exitCode = 1;
	},
);
