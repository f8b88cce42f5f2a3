import { describe, expect, it } from "vitest";
import { parseArgs, toStringArray, toStringOption } from "./args.ts";

const argv = (...args: string[]) => ["node", "cli/index.ts", ...args];

describe("parseArgs", () => {
	it("defaults to help", () => {
		expect(parseArgs(argv())).toEqual({ command: "help", args: [], options: {} });
	});

	it("separates positional arguments from options", () => {
		expect(parseArgs(argv("run", "reverse", "Hello"))).toEqual({
			command: "run",
			args: ["reverse", "Hello"],
			options: {},
		});
	});

	it("parses flags, single values and lists", () => {
		expect(
			parseArgs(argv("list", "--type", "plugin", "--prefer", "case", "text", "--verbose")).options,
		).toEqual({ type: "plugin", prefer: ["case", "text"], verbose: true });
	});

	it("accepts single-dash flags", () => {
		expect(parseArgs(argv("list", "-t", "plugin")).options).toEqual({ t: "plugin" });
	});
});

describe("toStringArray", () => {
	it("splits comma-separated values and drops empty entries", () => {
		expect(toStringArray("a, b,,c")).toEqual(["a", "b", "c"]);
		expect(toStringArray(["a,b", "c"])).toEqual(["a", "b", "c"]);
	});

	it("ignores booleans and missing values", () => {
		expect(toStringArray(true)).toBeUndefined();
		expect(toStringArray(undefined)).toBeUndefined();
	});
});

describe("toStringOption", () => {
	it("returns the first string value", () => {
		expect(toStringOption("plugin")).toBe("plugin");
		expect(toStringOption(["first", "second"])).toBe("first");
		expect(toStringOption(true)).toBeUndefined();
	});
});
