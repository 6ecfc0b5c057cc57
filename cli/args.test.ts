import { describe, expect, it } from "vitest";
import { getBooleanOption, getStringOption, parseArgs } from "./args.ts";

const argv = (...args: string[]) => ["node", "alias-registry", ...args];

describe("parseArgs", () => {
	it("defaults to help", () => {
		expect(parseArgs(argv())).toEqual({ command: "help", args: [], options: {} });
	});

	it("separates positional arguments from options", () => {
		expect(parseArgs(argv("canonical", "db", "--dir", "./config", "--strict"))).toEqual({
			command: "canonical",
			args: ["db"],
			options: { dir: "./config", strict: true },
		});
	});

	it("collects multiple option values", () => {
		expect(parseArgs(argv("list", "--pattern", "a/*.yaml", "b/*.yaml", "-x")).options).toEqual({
			pattern: ["a/*.yaml", "b/*.yaml"],
			x: true,
		});
	});

	it("treats flags followed by flags as booleans", () => {
		expect(parseArgs(argv("check", "--no-override", "--raw")).options).toEqual({
			"no-override": true,
			raw: true,
		});
	});
});

describe("option helpers", () => {
	const options = { dir: "x", pattern: ["a", "b"], strict: true };

	it("reads string options", () => {
		expect(getStringOption(options, "dir")).toBe("x");
		expect(getStringOption(options, "pattern")).toBe("b");
		expect(getStringOption(options, "strict")).toBeUndefined();
		expect(getStringOption(options, "missing")).toBeUndefined();
	});

	it("reads boolean options", () => {
		expect(getBooleanOption(options, "strict")).toBe(true);
		expect(getBooleanOption(options, "dir")).toBe(false);
		expect(getBooleanOption(options, "missing")).toBe(false);
	});
});
