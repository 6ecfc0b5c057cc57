/**
 * AliasRegistry - maps alternate names onto canonical names.
 *
 * This class provides:
 * - Alias registration with conflict and circular-reference detection
 * - Transitive lookups in both directions (alias → canonical, canonical → aliases)
 * - Bulk rewriting of every stored name through a NameTransformer
 *
 * Each alias key maps to exactly one name, which may itself be an alias.
 * Following alias → name edges always terminates: a binding that would close
 * a cycle is rejected before it is written.
 *
 * @example
 * ```typescript
 * const registry = new AliasRegistry({ name: "beans" });
 * registry.register("dataSource", "primaryDb");
 * registry.register("primaryDb", "db");
 * registry.canonicalName("db"); // "dataSource"
 * registry.getAliases("dataSource"); // ["primaryDb", "db"]
 * ```
 */

import { AliasRegistryOptionsSchema } from "../config.ts";
import { createLogger, type Logger } from "../logger.ts";
import {
	AliasConflictError,
	AliasNotFoundError,
	AliasResolutionLoopError,
	CircularAliasError,
	InvalidAliasArgumentError,
	ReentrantMutationError,
} from "./errors.ts";

/**
 * Rewrites a stored name. Returning null or undefined drops the entry.
 */
export type NameTransformer = (value: string) => string | null | undefined;

/**
 * Options for registry behavior.
 */
export interface AliasRegistryOptions {
	/** Name of the registry (used in error messages and log output) */
	name?: string;
	/** Whether an alias may be rebound to a different name (default: true) */
	allowOverriding?: boolean;
	logger?: Logger;
}

export class AliasRegistry {
	protected readonly aliasMap = new Map<string, string>(); // alias -> name
	protected readonly registryName: string;
	protected readonly logger: Logger;
	private readonly allowOverriding: boolean;
	private resolving = false;

	constructor(options: AliasRegistryOptions = {}) {
		const config = AliasRegistryOptionsSchema.parse({
			name: options.name,
			allowOverriding: options.allowOverriding,
		});
		this.registryName = config.name;
		this.allowOverriding = config.allowOverriding;
		this.logger = options.logger ?? createLogger(config.name);
	}

	/**
	 * Register `alias` as an alternate name for `name`.
	 *
	 * @throws InvalidAliasArgumentError if either argument is blank
	 * @throws AliasConflictError if `alias` is bound to another name and overriding is disabled
	 * @throws CircularAliasError if `name` is already an alias of `alias`
	 */
	register(name: string, alias: string): void {
		this.assertHasText(name, "name");
		this.assertHasText(alias, "alias");
		this.assertMutable("register");

		if (alias === name) {
			this.aliasMap.delete(alias);
			this.logger.debug(`Alias definition "${alias}" ignored since it points to same name`);
			return;
		}

		const registeredName = this.aliasMap.get(alias);
		if (registeredName !== undefined) {
			if (registeredName === name) {
				return;
			}
			if (!this.allowAliasOverriding()) {
				throw new AliasConflictError(alias, name, registeredName, this.registryName);
			}
			this.logger.info(
				`Overriding alias "${alias}" definition for registered name "${registeredName}" with new target name "${name}"`,
			);
		}

		this.checkForAliasCircle(name, alias);
		this.aliasMap.set(alias, name);
		this.logger.debug(`Alias definition "${alias}" registered for name "${name}"`);
	}

	/**
	 * Remove a single alias entry.
	 *
	 * @throws AliasNotFoundError if `alias` is not registered
	 */
	removeAlias(alias: string): void {
		this.assertMutable("removeAlias");
		if (!this.aliasMap.delete(alias)) {
			throw new AliasNotFoundError(alias, this.registryName);
		}
	}

	/**
	 * Whether `name` is registered as an alias (not as a canonical target).
	 */
	isAlias(name: string): boolean {
		return this.aliasMap.has(name);
	}

	/**
	 * Whether `alias` is a direct or transitive alias of `name`.
	 */
	hasAlias(name: string, alias: string): boolean {
		for (const candidate of this.walkAliases(name)) {
			if (candidate === alias) {
				return true;
			}
		}
		return false;
	}

	/**
	 * Every direct and transitive alias of `name`.
	 * Each alias comes before its own aliases.
	 */
	getAliases(name: string): string[] {
		return Array.from(this.walkAliases(name));
	}

	/**
	 * Follow alias edges from `name` to the name that is not itself an alias.
	 *
	 * @throws AliasResolutionLoopError if the chain does not terminate
	 */
	canonicalName(name: string): string {
		let canonical = name;
		// A chain in an acyclic map visits each entry at most once.
		let remaining = this.aliasMap.size + 1;
		let next = this.aliasMap.get(canonical);
		while (next !== undefined) {
			if (--remaining === 0) {
				throw new AliasResolutionLoopError(name, this.registryName);
			}
			canonical = next;
			next = this.aliasMap.get(canonical);
		}
		return canonical;
	}

	/**
	 * Rewrite every alias and target name through `transform`.
	 *
	 * Pairs are read from a snapshot taken before the pass; writes go to the live
	 * map, so later pairs see the rewrites of earlier ones. A failure aborts the
	 * pass and leaves the rewrites applied so far in place.
	 *
	 * @throws AliasConflictError if a rewritten alias is already bound to another name
	 * @throws CircularAliasError if a rewritten binding would close a cycle
	 * @throws ReentrantMutationError if `transform` mutates this registry
	 */
	resolveAliases(transform: NameTransformer): void {
		this.assertMutable("resolveAliases");
		const snapshot = Array.from(this.aliasMap.entries());

		this.resolving = true;
		try {
			for (const [alias, registeredName] of snapshot) {
				this.resolveEntry(alias, registeredName, transform);
			}
		} finally {
			this.resolving = false;
		}
	}

	/**
	 * Get all aliases (sorted alphabetically).
	 */
	aliases(): string[] {
		return Array.from(this.aliasMap.keys()).sort();
	}

	/**
	 * Snapshot of alias → name pairs in registration order.
	 */
	entries(): Array<[alias: string, name: string]> {
		return Array.from(this.aliasMap.entries());
	}

	get size(): number {
		return this.aliasMap.size;
	}

	clear(): void {
		this.assertMutable("clear");
		this.aliasMap.clear();
	}

	/**
	 * Whether `register` may rebind an alias to a different name.
	 * Subclasses may override; the default comes from the constructor options.
	 */
	protected allowAliasOverriding(): boolean {
		return this.allowOverriding;
	}

	/**
	 * Reject `alias` → `name` when `name` already resolves back through `alias`.
	 *
	 * @throws CircularAliasError
	 */
	protected checkForAliasCircle(name: string, alias: string): void {
		if (this.hasAlias(alias, name)) {
			throw new CircularAliasError(alias, name, this.registryName);
		}
	}

	private resolveEntry(alias: string, registeredName: string, transform: NameTransformer): void {
		const resolvedAlias = transform(alias) ?? null;
		const resolvedName = transform(registeredName) ?? null;

		if (resolvedAlias === null || resolvedName === null || resolvedAlias === resolvedName) {
			this.aliasMap.delete(alias);
			return;
		}

		if (resolvedAlias !== alias) {
			const existingName = this.aliasMap.get(resolvedAlias);
			if (existingName !== undefined) {
				if (existingName === resolvedName) {
					// Already represented by the resolved entry
					this.aliasMap.delete(alias);
					return;
				}
				throw new AliasConflictError(
					resolvedAlias,
					resolvedName,
					existingName,
					this.registryName,
					alias,
				);
			}
			this.checkForAliasCircle(resolvedName, resolvedAlias);
			this.aliasMap.delete(alias);
			this.aliasMap.set(resolvedAlias, resolvedName);
			return;
		}

		if (resolvedName !== registeredName) {
			this.aliasMap.set(alias, resolvedName);
		}
	}

	/**
	 * Pre-order walk over the alias tree rooted at `name`.
	 * Children are visited in map insertion order.
	 */
	private *walkAliases(name: string): Generator<string> {
		const children = new Map<string, string[]>();
		for (const [alias, target] of this.aliasMap) {
			const list = children.get(target);
			if (list) {
				list.push(alias);
			} else {
				children.set(target, [alias]);
			}
		}

		const visited = new Set<string>([name]);
		const stack = [...(children.get(name) ?? [])].reverse();
		let current = stack.pop();
		while (current !== undefined) {
			// Only a corrupted map can lead back to a visited name
			if (!visited.has(current)) {
				visited.add(current);
				yield current;
				const next = children.get(current);
				if (next) {
					for (let i = next.length - 1; i >= 0; i--) {
						const child = next[i];
						if (child !== undefined) stack.push(child);
					}
				}
			}
			current = stack.pop();
		}
	}

	private assertHasText(value: string, argument: "name" | "alias"): void {
		if (typeof value !== "string" || value.trim().length === 0) {
			throw new InvalidAliasArgumentError(argument, this.registryName);
		}
	}

	private assertMutable(operation: string): void {
		if (this.resolving) {
			throw new ReentrantMutationError(operation, this.registryName);
		}
	}
}
