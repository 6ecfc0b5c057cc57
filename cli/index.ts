#!/usr/bin/env tsx
/**
 * alias-registry CLI entry point.
 * Loads alias files and answers lookups against the resulting registry.
 */

import { parseArgs } from "./args.ts";
import { runCommand } from "./commands.ts";

async function main(): Promise<void> {
	const parsed = parseArgs(process.argv);
	const { lines, exitCode } = await runCommand(parsed);

	const write = exitCode === 0 ? console.log : console.error;
	for (const line of lines) {
		write(line);
	}
	process.exitCode = exitCode;
}

// Run the CLI
main().catch((error: unknown) => {
	console.error("❌ Error:", error instanceof Error ? error.message : error);
	process.exit(1);
});
