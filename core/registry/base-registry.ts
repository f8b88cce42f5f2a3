/**
 * BaseRegistry - generic keyed store for pluggable components.
 *
 * This base class provides:
 * - Key-based registration with optional aliases
 * - Lookup by key or alias
 * - Conflict rejection on registration (keys and aliases share one namespace)
 * - List and iteration utilities
 *
 * Used by: ModuleRegistry
 *
 * All methods are synchronous. A call runs to completion before any other
 * code on the event loop touches the store, so reads never observe a
 * half-applied write.
 *
 * @example
 * ```typescript
 * class MyRegistry extends BaseRegistry<MyItem> {
 *   register(item: MyItem): void {
 *     super.registerItem(item.name, item, item.aliases);
 *   }
 * }
 * ```
 */

import {
	InternalRegistryError,
	RegistryConflictError,
	RegistryNotFoundError,
} from "./errors.ts";

/**
 * Options for registry behavior.
 */
export interface RegistryOptions {
	/** Name of the registry (used in error messages) */
	name: string;
}

/**
 * Generic base registry class.
 *
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T> {
	protected items = new Map<string, T>();
	protected aliasMap = new Map<string, string>(); // alias -> primary key
	protected readonly registryName: string;

	constructor(options: RegistryOptions) {
		this.registryName = options.name;
	}

	/**
	 * Register an item with a key and optional aliases.
	 * Nothing is stored unless the key and every alias are free.
	 *
	 * @throws RegistryConflictError if the key or an alias is taken
	 */
	protected registerItem(key: string, item: T, aliases?: readonly string[]): void {
		if (this.isTaken(key)) {
			throw new RegistryConflictError(key, this.registryName, "key");
		}

		const seen = new Set<string>([key]);
		for (const alias of aliases ?? []) {
			if (seen.has(alias) || this.isTaken(alias)) {
				throw new RegistryConflictError(alias, this.registryName, "alias");
			}
			seen.add(alias);
		}

		this.items.set(key, item);
		for (const alias of aliases ?? []) {
			this.aliasMap.set(alias, key);
		}
	}

	private isTaken(name: string): boolean {
		return this.items.has(name) || this.aliasMap.has(name);
	}

	/**
	 * Get an item by key or alias.
	 * Returns undefined if not found.
	 */
	get(keyOrAlias: string): T | undefined {
		const direct = this.items.get(keyOrAlias);
		if (direct !== undefined) {
			return direct;
		}

		const primaryKey = this.aliasMap.get(keyOrAlias);
		if (primaryKey === undefined) {
			return undefined;
		}

		const aliased = this.items.get(primaryKey);
		if (aliased === undefined) {
			throw new InternalRegistryError(
				`${this.registryName}: alias "${keyOrAlias}" points at missing key "${primaryKey}"`,
			);
		}
		return aliased;
	}

	/**
	 * Get an item by key or alias.
	 * Throws RegistryNotFoundError if not found.
	 */
	getOrThrow(keyOrAlias: string): T {
		const item = this.get(keyOrAlias);
		if (item === undefined) {
			throw new RegistryNotFoundError(keyOrAlias, this.registryName, this.keys());
		}
		return item;
	}

	/**
	 * Check if an item exists by key or alias.
	 */
	has(keyOrAlias: string): boolean {
		return this.isTaken(keyOrAlias);
	}

	/**
	 * Get all registered items, ordered by primary key.
	 */
	values(): T[] {
		return this.keys().map((key) => this.getOrThrow(key));
	}

	/**
	 * Get all primary keys (sorted alphabetically).
	 */
	keys(): string[] {
		return Array.from(this.items.keys()).sort();
	}

	/**
	 * Get all aliases (sorted alphabetically).
	 */
	aliases(): string[] {
		return Array.from(this.aliasMap.keys()).sort();
	}

	/**
	 * Get number of registered items (not counting aliases).
	 */
	get size(): number {
		return this.items.size;
	}

	/**
	 * Remove an item by primary key or alias.
	 * Also removes all associated aliases.
	 */
	delete(keyOrAlias: string): boolean {
		const key = this.resolveAlias(keyOrAlias);
		if (!this.items.has(key)) {
			return false;
		}

		for (const [alias, primaryKey] of this.aliasMap.entries()) {
			if (primaryKey === key) {
				this.aliasMap.delete(alias);
			}
		}

		this.items.delete(key);
		return true;
	}

	/**
	 * Clear all items and aliases.
	 */
	clear(): void {
		this.items.clear();
		this.aliasMap.clear();
	}

	/**
	 * Resolve an alias to its primary key.
	 * Returns the input if it's already a primary key or not found.
	 */
	resolveAlias(keyOrAlias: string): string {
		return this.aliasMap.get(keyOrAlias) ?? keyOrAlias;
	}
}
