/**
 * Placeholder interpolation for alias and target names.
 * Supports ${VAR} and ${VAR:-default} syntax.
 */

import type { MissingPlaceholderMode } from "./config.ts";
import type { NameTransformer } from "./registry/index.ts";

const PLACEHOLDER_PATTERN = /\$\{(\w+)(?::-([^}]*))?\}/g;

export type PlaceholderEnv = Record<string, string | undefined>;

/**
 * Error thrown when a placeholder has neither a value nor a default
 * and the resolver runs in "error" mode.
 */
export class UnresolvedPlaceholderError extends Error {
	constructor(
		public readonly placeholder: string,
		public readonly value: string,
	) {
		super(`Could not resolve placeholder "${placeholder}" in value "${value}"`);
		this.name = "UnresolvedPlaceholderError";
	}
}

export interface InterpolationResult {
	value: string;
	unresolved: string[];
}

/**
 * Substitute placeholders in `value`.
 * A variable that is set and non-empty wins, then the default; otherwise the
 * placeholder is left as written and reported in `unresolved`.
 */
export function interpolatePlaceholders(
	value: string,
	env: PlaceholderEnv = process.env,
): InterpolationResult {
	const unresolved: string[] = [];
	const interpolated = value.replace(
		PLACEHOLDER_PATTERN,
		(match: string, name: string, defaultValue: string | undefined) => {
			const envVal = env[name];
			if (envVal !== undefined && envVal !== "") {
				return envVal;
			}
			if (defaultValue !== undefined) {
				return defaultValue;
			}
			unresolved.push(name);
			return match;
		},
	);
	return { value: interpolated, unresolved };
}

export interface PlaceholderResolverOptions {
	env?: PlaceholderEnv;
	/** What to do with a value that still holds an unresolved placeholder (default: "keep") */
	onMissing?: MissingPlaceholderMode;
}

/**
 * Build a NameTransformer for AliasRegistry.resolveAliases().
 */
export function createPlaceholderResolver(
	options: PlaceholderResolverOptions = {},
): NameTransformer {
	const env = options.env ?? process.env;
	const onMissing = options.onMissing ?? "keep";

	return (value: string) => {
		const { value: interpolated, unresolved } = interpolatePlaceholders(value, env);
		const [first] = unresolved;
		if (first === undefined || onMissing === "keep") {
			return interpolated;
		}
		if (onMissing === "drop") {
			return null;
		}
		throw new UnresolvedPlaceholderError(first, value);
	};
}
