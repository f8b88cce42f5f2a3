/**
 * Minimal logger used by the registry, the bootstrap and the CLI.
 * Writes through console with a `[Prefix]` tag, the way the rest of the
 * codebase reports progress.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface RegistryLogger {
	debug(message: string, meta?: Record<string, unknown>): void;
	info(message: string, meta?: Record<string, unknown>): void;
	warn(message: string, meta?: Record<string, unknown>): void;
	error(message: string | Error, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export const noopLogger: RegistryLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};

/**
 * Create a console-backed logger that drops messages below `level`.
 */
export function createConsoleLogger(prefix?: string, level: LogLevel = "info"): RegistryLogger {
	const base = prefix ? `[${prefix}]` : undefined;
	const threshold = LEVEL_ORDER[level];
	const format = (message: string) => (base ? `${base} ${message}` : message);
	const enabled = (messageLevel: LogLevel) => LEVEL_ORDER[messageLevel] >= threshold;

	return {
		debug(message, meta) {
			if (enabled("debug")) console.debug(format(message), meta ?? "");
		},
		info(message, meta) {
			if (enabled("info")) console.info(format(message), meta ?? "");
		},
		warn(message, meta) {
			if (enabled("warn")) console.warn(format(message), meta ?? "");
		},
		error(message, meta) {
			if (!enabled("error")) return;
			if (message instanceof Error) {
				console.error(format(message.message), meta ?? "", message);
			} else {
				console.error(format(message), meta ?? "");
			}
		},
	} satisfies RegistryLogger;
}
