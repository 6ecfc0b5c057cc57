/**
 * Error types raised by AliasRegistry.
 * Every error carries the registry name and a stable `kind` for callers that
 * branch on the failure without instanceof checks.
 */

export type AliasErrorKind =
	| "InvalidArgument"
	| "ConflictingAlias"
	| "CircularAlias"
	| "NotFound"
	| "ResolutionLoop"
	| "ReentrantMutation";

export class AliasRegistryError extends Error {
	constructor(
		public readonly kind: AliasErrorKind,
		public readonly registryName: string,
		message: string,
	) {
		super(`${registryName}: ${message}`);
		this.name = "AliasRegistryError";
	}
}

/**
 * Error thrown when a name or alias argument is missing or blank.
 */
export class InvalidAliasArgumentError extends AliasRegistryError {
	constructor(
		public readonly argument: "name" | "alias",
		registryName: string,
	) {
		super("InvalidArgument", registryName, `'${argument}' must not be empty`);
		this.name = "InvalidAliasArgumentError";
	}
}

function describeAlias(alias: string, original: string | undefined): string {
	return original === undefined
		? `alias "${alias}"`
		: `resolved alias "${alias}" (original: "${original}")`;
}

/**
 * Error thrown when an alias is already bound to a different name.
 */
export class AliasConflictError extends AliasRegistryError {
	constructor(
		public readonly alias: string,
		public readonly target: string,
		public readonly existingTarget: string,
		registryName: string,
		original?: string,
	) {
		super(
			"ConflictingAlias",
			registryName,
			`Cannot register ${describeAlias(alias, original)} for name "${target}": it is already registered for name "${existingTarget}"`,
		);
		this.name = "AliasConflictError";
	}
}

export class CircularAliasError extends AliasRegistryError {
	constructor(
		public readonly alias: string,
		public readonly target: string,
		registryName: string,
	) {
		super(
			"CircularAlias",
			registryName,
			`Cannot register alias "${alias}" for name "${target}": circular reference, "${target}" is a direct or indirect alias for "${alias}" already`,
		);
		this.name = "CircularAliasError";
	}
}

export class AliasNotFoundError extends AliasRegistryError {
	constructor(
		public readonly alias: string,
		registryName: string,
	) {
		super("NotFound", registryName, `No alias "${alias}" registered`);
		this.name = "AliasNotFoundError";
	}
}

/**
 * Error thrown when canonical-name resolution does not terminate,
 * which only happens if the alias map has been corrupted.
 */
export class AliasResolutionLoopError extends AliasRegistryError {
	constructor(
		public readonly start: string,
		registryName: string,
	) {
		super("ResolutionLoop", registryName, `Resolving "${start}" did not reach a canonical name`);
		this.name = "AliasResolutionLoopError";
	}
}

export class ReentrantMutationError extends AliasRegistryError {
	constructor(
		public readonly operation: string,
		registryName: string,
	) {
		super(
			"ReentrantMutation",
			registryName,
			`${operation}() called while resolveAliases() is running`,
		);
		this.name = "ReentrantMutationError";
	}
}
