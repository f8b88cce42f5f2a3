import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger } from "./logger.ts";

describe("createConsoleLogger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("prefixes messages and drops those below the level", () => {
		const info = vi.spyOn(console, "info").mockImplementation(() => {});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const logger = createConsoleLogger("ModuleRegistry", "warn");

		logger.info("hidden");
		logger.warn("Factory failed", { name: "x" });

		expect(info).not.toHaveBeenCalled();
		expect(warn).toHaveBeenCalledWith("[ModuleRegistry] Factory failed", { name: "x" });
	});

	it("logs errors with their message and the error itself", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const failure = new Error("boom");

		createConsoleLogger("CLI").error(failure);

		expect(error).toHaveBeenCalledWith("[CLI] boom", "", failure);
	});

	it("writes nothing when silent", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});

		createConsoleLogger(undefined, "silent").error("ignored");

		expect(error).not.toHaveBeenCalled();
	});

	it("omits the tag without a prefix", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

		createConsoleLogger(undefined, "debug").debug("plain");

		expect(debug).toHaveBeenCalledWith("plain", "");
	});
});
