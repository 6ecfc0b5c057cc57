/**
 * Registry module - the alias registry and its error types.
 */

export {
	AliasRegistry,
	type AliasRegistryOptions,
	type NameTransformer,
} from "./alias-registry.ts";
export {
	AliasRegistryError,
	AliasConflictError,
	AliasNotFoundError,
	AliasResolutionLoopError,
	CircularAliasError,
	InvalidAliasArgumentError,
	ReentrantMutationError,
	type AliasErrorKind,
} from "./errors.ts";
