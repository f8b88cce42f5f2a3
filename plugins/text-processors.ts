/**
 * Text processor plugins.
 *
 * Demo capability used by the CLI and the tests: each processor turns an
 * input string into an output string.
 */

import {
	defineCapability,
	type Module,
	type ModuleRegistration,
	type Registrar,
} from "../core/registry/index.ts";

export interface TextProcessor extends Module {
	readonly version: string;
	process(input: string): string;
}

export const TextProcessorCapability = defineCapability<TextProcessor>("text-processor", {
	description: "Transforms text input",
	guard: (value): value is TextProcessor =>
		typeof value === "object" &&
		value !== null &&
		"process" in value &&
		typeof value.process === "function",
});

export class EchoProcessor implements TextProcessor {
	readonly name = "echo";
	readonly moduleType = "plugin";
	readonly version = "1.0.0";

	process(input: string): string {
		return `[Echo] ${input}`;
	}
}

export class ReverseProcessor implements TextProcessor {
	readonly name = "reverse";
	readonly moduleType = "plugin";
	readonly version = "1.0.0";

	process(input: string): string {
		return Array.from(input).reverse().join("");
	}
}

export class UppercaseProcessor implements TextProcessor {
	readonly name = "uppercase";
	readonly moduleType = "plugin";
	readonly version = "1.1.0";

	process(input: string): string {
		return input.toUpperCase();
	}
}

/**
 * Registrations for the built-in processors.
 */
export const textProcessorRegistrations: readonly ModuleRegistration[] = [
	{
		name: "echo",
		moduleType: "plugin",
		structName: "EchoProcessor",
		modulePath: "plugins/text-processors.ts",
		instantiateFn: "createEchoProcessor",
		tags: ["text", "passthrough"],
		description: "Prefixes input with [Echo]",
		factory: () => TextProcessorCapability.wrap(new EchoProcessor()),
	},
	{
		name: "reverse",
		moduleType: "plugin",
		structName: "ReverseProcessor",
		modulePath: "plugins/text-processors.ts",
		instantiateFn: "createReverseProcessor",
		tags: ["text", "transform"],
		description: "Reverses input characters",
		factory: () => TextProcessorCapability.wrap(new ReverseProcessor()),
	},
	{
		name: "uppercase",
		moduleType: "plugin",
		structName: "UppercaseProcessor",
		modulePath: "plugins/text-processors.ts",
		instantiateFn: "createUppercaseProcessor",
		tags: ["text", "transform", "case"],
		aliases: ["upper"],
		description: "Upper-cases input",
		factory: () => TextProcessorCapability.wrap(new UppercaseProcessor()),
	},
];

/**
 * Register every built-in text processor.
 */
export const registerTextProcessors: Registrar = (registry) => {
	for (const registration of textProcessorRegistrations) {
		registry.register(registration);
	}
};
