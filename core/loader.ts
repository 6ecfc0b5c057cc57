/**
 * Loads alias definitions from YAML files into an AliasRegistry.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { glob } from "glob";
import pLimit from "p-limit";
import { parse } from "yaml";
import { ZodError } from "zod";
import {
	AliasFileSchema,
	LoaderOptionsSchema,
	type AliasFile,
	type MissingPlaceholderMode,
} from "./config.ts";
import { createLogger, type Logger } from "./logger.ts";
import { createPlaceholderResolver, type PlaceholderEnv } from "./placeholders.ts";
import type { AliasRegistry } from "./registry/index.ts";

/**
 * Error thrown when an alias file is not valid YAML or fails schema validation.
 */
export class AliasFileError extends Error {
	constructor(
		public readonly filePath: string,
		message: string,
	) {
		super(message);
		this.name = "AliasFileError";
	}
}

export interface LoadFailure {
	file: string;
	message: string;
}

export interface LoadResult {
	/** Files that were found, relative to the base path */
	files: string[];
	/** Number of alias definitions applied (before placeholder resolution) */
	registered: number;
	failures: LoadFailure[];
}

type ReadOutcome = { file: string; content: string } | { file: string; error: unknown };

export interface LoadOptions {
	basePath?: string;
	pattern?: string;
	/** Run registry.resolveAliases() with a placeholder resolver afterwards (default: true) */
	resolvePlaceholders?: boolean;
	onMissing?: MissingPlaceholderMode;
	env?: PlaceholderEnv;
	/** Maximum number of files read at once */
	concurrency?: number;
	logger?: Logger;
}

/**
 * Format Zod validation errors for user-friendly display.
 */
function formatZodError(error: ZodError, filePath: string): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `  - ${path ? `${path}: ` : ""}${issue.message}`;
	});
	return `Validation failed for ${filePath}:\n${issues.join("\n")}`;
}

/**
 * Parse and validate the content of one alias file.
 * An empty document is an empty file, not an error.
 */
export function parseAliasFile(content: string, filePath: string): AliasFile {
	let raw: unknown;
	try {
		raw = parse(content);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new AliasFileError(filePath, `Invalid YAML in ${filePath}: ${reason}`);
	}

	try {
		return AliasFileSchema.parse(raw ?? {});
	} catch (error) {
		if (error instanceof ZodError) {
			throw new AliasFileError(filePath, formatZodError(error, filePath));
		}
		throw error;
	}
}

/**
 * Find alias files under `basePath`, sorted so load order is stable.
 */
export async function discoverAliasFiles(
	basePath: string,
	pattern: string = "aliases/**/*.{yaml,yml}",
): Promise<string[]> {
	const files = await glob(pattern, { cwd: basePath, nodir: true, posix: true });
	return files.sort();
}

/**
 * Discover alias files, register every definition they hold, then resolve
 * placeholders across the whole registry.
 *
 * A file that cannot be read, parsed or registered is recorded in `failures`
 * and skipped; bindings registered from it before the failure stay in place.
 * Errors from placeholder resolution propagate.
 */
export async function loadAliasFiles(
	registry: AliasRegistry,
	options: LoadOptions = {},
): Promise<LoadResult> {
	const config = LoaderOptionsSchema.parse({
		basePath: options.basePath,
		pattern: options.pattern,
		resolvePlaceholders: options.resolvePlaceholders,
		onMissing: options.onMissing,
		concurrency: options.concurrency,
	});
	const logger = options.logger ?? createLogger("alias-loader");

	const files = await discoverAliasFiles(config.basePath, config.pattern);
	const limit = pLimit(config.concurrency);
	const contents = await Promise.all(
		files.map((file) =>
			limit(async (): Promise<ReadOutcome> => {
				try {
					return { file, content: await readFile(join(config.basePath, file), "utf8") };
				} catch (error) {
					return { file, error };
				}
			}),
		),
	);

	const failures: LoadFailure[] = [];
	let registered = 0;

	for (const entry of contents) {
		try {
			if ("error" in entry) {
				throw entry.error;
			}
			const aliasFile = parseAliasFile(entry.content, entry.file);
			for (const definition of aliasFile.aliases) {
				for (const alias of definition.aliases) {
					registry.register(definition.name, alias);
					registered++;
				}
			}
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			failures.push({ file: entry.file, message });
			logger.error(`Failed to load aliases from ${entry.file}: ${message}`);
		}
	}

	if (config.resolvePlaceholders) {
		registry.resolveAliases(
			createPlaceholderResolver({ env: options.env, onMissing: config.onMissing }),
		);
	}

	logger.debug(`Loaded ${registered} alias bindings from ${files.length} files`);
	return { files, registered, failures };
}
