/**
 * Configuration schemas for alias-registry.
 * Defines Zod schemas for registry options, logging and YAML alias files.
 */

import { z } from "zod";

// ============================================================================
// Logging
// ============================================================================

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

// ============================================================================
// Registry Options Schema
// ============================================================================

export const AliasRegistryOptionsSchema = z.object({
	name: z.string().min(1).default("AliasRegistry"),
	allowOverriding: z.boolean().default(true),
});

export type AliasRegistryConfig = z.infer<typeof AliasRegistryOptionsSchema>;

// ============================================================================
// Alias File Schema
// ============================================================================

const AliasDefinitionSchema = z.object({
	name: z.string().trim().min(1, "name must not be empty"),
	aliases: z.array(z.string().trim().min(1, "alias must not be empty")).default([]),
});

export const AliasFileSchema = z.object({
	description: z.string().optional(),
	aliases: z.array(AliasDefinitionSchema).default([]),
});

export type AliasDefinition = z.infer<typeof AliasDefinitionSchema>;
export type AliasFile = z.infer<typeof AliasFileSchema>;

// ============================================================================
// Loader Options Schema
// ============================================================================

export const MissingPlaceholderSchema = z.enum(["keep", "drop", "error"]);

export type MissingPlaceholderMode = z.infer<typeof MissingPlaceholderSchema>;

export const LoaderOptionsSchema = z.object({
	basePath: z.string().default("."),
	pattern: z.string().default("aliases/**/*.{yaml,yml}"),
	resolvePlaceholders: z.boolean().default(true),
	onMissing: MissingPlaceholderSchema.default("keep"),
	concurrency: z.number().int().positive().default(8),
});

export type LoaderConfig = z.infer<typeof LoaderOptionsSchema>;
