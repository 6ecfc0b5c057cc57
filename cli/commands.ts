/**
 * CLI command implementations.
 * Each command returns the lines to print and an exit code so the entry
 * point stays the only place that touches stdout and process.exit.
 */

import { loadAliasFiles, type LoadResult } from "../core/loader.ts";
import { createLogger, type Logger } from "../core/logger.ts";
import { AliasRegistry } from "../core/registry/index.ts";
import { getBooleanOption, getStringOption, type ParsedArgs } from "./args.ts";

export interface CommandOutput {
	lines: string[];
	exitCode: number;
}

export interface LoadedRegistry {
	registry: AliasRegistry;
	result: LoadResult;
}

/**
 * Build a registry from the alias files selected by the CLI options.
 */
export async function loadFromOptions(
	options: ParsedArgs["options"],
	env: Record<string, string | undefined> = process.env,
	logger: Logger = createLogger("alias-registry"),
): Promise<LoadedRegistry> {
	const registry = new AliasRegistry({
		name: "alias-registry",
		allowOverriding: !getBooleanOption(options, "no-override"),
		logger,
	});
	const result = await loadAliasFiles(registry, {
		basePath: getStringOption(options, "dir") ?? ".",
		pattern: getStringOption(options, "pattern"),
		resolvePlaceholders: !getBooleanOption(options, "raw"),
		onMissing: getBooleanOption(options, "strict") ? "error" : "keep",
		env,
		logger,
	});
	return { registry, result };
}

/**
 * Print alias → canonical name pairs as a table, sorted by alias.
 */
export function listCommand(registry: AliasRegistry): CommandOutput {
	const aliases = registry.aliases();
	if (aliases.length === 0) {
		return { lines: ["No aliases registered."], exitCode: 0 };
	}

	const rows = aliases.map((alias) => [alias, registry.canonicalName(alias)] as const);
	const aliasCol = Math.max("Alias".length, ...rows.map(([alias]) => alias.length));
	const lines = [
		`${"Alias".padEnd(aliasCol)} │ Canonical name`,
		`${"─".repeat(aliasCol)}─┼─${"─".repeat("Canonical name".length)}`,
		...rows.map(([alias, canonical]) => `${alias.padEnd(aliasCol)} │ ${canonical}`),
	];
	return { lines, exitCode: 0 };
}

export function canonicalCommand(registry: AliasRegistry, name: string): CommandOutput {
	return { lines: [registry.canonicalName(name)], exitCode: 0 };
}

export function aliasesCommand(registry: AliasRegistry, name: string): CommandOutput {
	return { lines: registry.getAliases(name), exitCode: 0 };
}

/**
 * Summarize a load; fails when any file could not be loaded.
 */
export function checkCommand(registry: AliasRegistry, result: LoadResult): CommandOutput {
	const lines = [
		`Files: ${result.files.length}`,
		`Definitions: ${result.registered}`,
		`Aliases: ${registry.size}`,
	];
	if (result.failures.length === 0) {
		lines.push("✅ All alias files loaded.");
		return { lines, exitCode: 0 };
	}

	lines.push(`❌ ${result.failures.length} file(s) failed:`);
	for (const failure of result.failures) {
		lines.push(`  ${failure.file}: ${failure.message}`);
	}
	return { lines, exitCode: 1 };
}

export const HELP_TEXT = `
Usage:
  alias-registry <command> [args] [options]

Commands:
  list                List every alias with its canonical name
  canonical <name>    Print the canonical name of <name>
  aliases <name>      Print every alias of <name>, one per line
  check               Load alias files and report failures
  help                Show this message

Options:
  --dir <path>        Base directory (default: .)
  --pattern <glob>    Alias files to load (default: aliases/**/*.{yaml,yml})
  --no-override       Reject an alias bound to two different names
  --strict            Fail on placeholders without a value
  --raw               Skip placeholder resolution
`;

/**
 * Run one parsed command line.
 */
export async function runCommand(
	parsed: ParsedArgs,
	env: Record<string, string | undefined> = process.env,
	logger?: Logger,
): Promise<CommandOutput> {
	switch (parsed.command) {
		case "help":
		case "--help":
		case "-h":
			return { lines: [HELP_TEXT], exitCode: 0 };

		case "list": {
			const { registry } = await loadFromOptions(parsed.options, env, logger);
			return listCommand(registry);
		}

		case "canonical":
		case "aliases": {
			const name = parsed.args[0];
			if (name === undefined) {
				return { lines: ["❌ Please specify a name."], exitCode: 1 };
			}
			const { registry } = await loadFromOptions(parsed.options, env, logger);
			return parsed.command === "canonical"
				? canonicalCommand(registry, name)
				: aliasesCommand(registry, name);
		}

		case "check": {
			const { registry, result } = await loadFromOptions(parsed.options, env, logger);
			return checkCommand(registry, result);
		}

		default:
			return { lines: [`❌ Unknown command: ${parsed.command}`, HELP_TEXT], exitCode: 1 };
	}
}
