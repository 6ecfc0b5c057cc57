import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createLogger } from "../core/logger.ts";
import { AliasRegistry } from "../core/registry/index.ts";
import { parseArgs } from "./args.ts";
import {
	HELP_TEXT,
	aliasesCommand,
	canonicalCommand,
	checkCommand,
	listCommand,
	runCommand,
} from "./commands.ts";

const silent = createLogger("test", "silent");

function sampleRegistry(): AliasRegistry {
	const registry = new AliasRegistry({ logger: silent });
	registry.register("dataSource", "primaryDb");
	registry.register("primaryDb", "db");
	return registry;
}

describe("commands", () => {
	it("lists aliases as a table", () => {
		expect(listCommand(sampleRegistry())).toEqual({
			lines: [
				"Alias     │ Canonical name",
				"──────────┼───────────────",
				"db        │ dataSource",
				"primaryDb │ dataSource",
			],
			exitCode: 0,
		});
	});

	it("reports an empty registry", () => {
		expect(listCommand(new AliasRegistry({ logger: silent })).lines).toEqual([
			"No aliases registered.",
		]);
	});

	it("prints canonical names and aliases", () => {
		const registry = sampleRegistry();

		expect(canonicalCommand(registry, "db").lines).toEqual(["dataSource"]);
		expect(aliasesCommand(registry, "dataSource").lines).toEqual(["primaryDb", "db"]);
	});

	it("fails the check when a file failed", () => {
		const output = checkCommand(sampleRegistry(), {
			files: ["aliases/a.yaml", "aliases/b.yaml"],
			registered: 2,
			failures: [{ file: "aliases/b.yaml", message: "boom" }],
		});

		expect(output).toEqual({
			lines: [
				"Files: 2",
				"Definitions: 2",
				"Aliases: 2",
				"❌ 1 file(s) failed:",
				"  aliases/b.yaml: boom",
			],
			exitCode: 1,
		});
	});
});

describe("runCommand", () => {
	let basePath: string;

	beforeAll(async () => {
		basePath = await mkdtemp(join(tmpdir(), "alias-cli-"));
		await mkdir(join(basePath, "aliases"), { recursive: true });
		await writeFile(
			join(basePath, "aliases", "beans.yaml"),
			"aliases:\n  - name: dataSource\n    aliases: [\"${DB_ALIAS}\"]\n",
			"utf8",
		);
	});

	afterAll(async () => {
		await rm(basePath, { recursive: true, force: true });
	});

	const run = (...args: string[]) =>
		runCommand(parseArgs(["node", "alias-registry", ...args]), { DB_ALIAS: "mainDb" }, silent);

	it("prints help", async () => {
		expect(await run("help")).toEqual({ lines: [HELP_TEXT], exitCode: 0 });
	});

	it("rejects unknown commands", async () => {
		const output = await run("frobnicate");

		expect(output.exitCode).toBe(1);
		expect(output.lines[0]).toBe("❌ Unknown command: frobnicate");
	});

	it("requires a name for lookups", async () => {
		expect(await run("canonical")).toEqual({
			lines: ["❌ Please specify a name."],
			exitCode: 1,
		});
	});

	it("resolves placeholders from the environment", async () => {
		expect((await run("canonical", "mainDb", "--dir", basePath)).lines).toEqual(["dataSource"]);
		expect((await run("aliases", "dataSource", "--dir", basePath)).lines).toEqual(["mainDb"]);
	});

	it("keeps raw placeholders with --raw", async () => {
		expect((await run("aliases", "dataSource", "--dir", basePath, "--raw")).lines).toEqual([
			"${DB_ALIAS}",
		]);
	});

	it("passes the check for valid files", async () => {
		expect(await run("check", "--dir", basePath)).toEqual({
			lines: ["Files: 1", "Definitions: 1", "Aliases: 1", "✅ All alias files loaded."],
			exitCode: 0,
		});
	});
});
