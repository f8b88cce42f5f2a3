/**
 * Command line argument parsing.
 */

export type OptionValue = string | string[] | boolean;

export interface ParsedArgs {
	command: string;
	args: string[];
	options: Record<string, OptionValue>;
}

/**
 * Parse command line arguments (argv including the runtime and script path).
 *
 * `--flag` with no following value is a boolean; `--key a b` collects an array.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const args = argv.slice(2);
	const command = args[0] ?? "help";
	const restArgs: string[] = [];
	const options: Record<string, OptionValue> = {};

	for (let i = 1; i < args.length; i++) {
		const arg = args[i];

		if (!arg) continue;

		if (arg.startsWith("-")) {
			const key = arg.replace(/^--?/, "");
			const values: string[] = [];
			let next = args[i + 1];
			while (next !== undefined && next !== "" && !next.startsWith("-")) {
				values.push(next);
				i++;
				next = args[i + 1];
			}

			if (values.length === 0) {
				options[key] = true;
			} else if (values.length === 1) {
				options[key] = values[0] ?? "";
			} else {
				options[key] = values;
			}
		} else {
			restArgs.push(arg);
		}
	}

	return { command, args: restArgs, options };
}

/**
 * Safely convert an option value to a string array.
 * Filters out boolean values and splits comma-separated values
 * (e.g., "a,b,c" → ["a", "b", "c"]).
 */
export function toStringArray(value: OptionValue | undefined): string[] | undefined {
	if (value === undefined || typeof value === "boolean") return undefined;
	const values = Array.isArray(value) ? value : [value];
	return values.flatMap((v) => v.split(",").map((s) => s.trim())).filter(Boolean);
}

/**
 * Single string value of an option, if given.
 */
export function toStringOption(value: OptionValue | undefined): string | undefined {
	if (typeof value === "string") return value;
	if (Array.isArray(value)) return value[0];
	return undefined;
}
