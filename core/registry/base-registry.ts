/**
 * BaseRegistry - insert-only registry with dense, 1-based slots.
 *
 * This base class provides:
 * - Key-based registration that assigns the next free slot
 * - Replay of entries at an explicit slot (for migrations)
 * - Lookup by key or by slot index
 * - Iteration in slot order
 *
 * There is intentionally no removal: once a key owns a slot, it keeps it for
 * the lifetime of the registry.
 *
 * Used by: PaletteRegistry
 *
 * @example
 * ```typescript
 * class MyRegistry extends BaseRegistry<MyItem> {
 *   add(item: MyItem): boolean {
 *     return super.registerItem(item.id, () => item) !== undefined;
 *   }
 * }
 * ```
 */

/**
 * Error thrown when a requested item is not found in the registry.
 */
export class RegistryNotFoundError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly availableKeys: string[],
	) {
		const available = availableKeys.length > 0
			? `Available: ${availableKeys.join(", ")}`
			: "Registry is empty";
		super(`${registryName}: "${key}" not found. ${available}`);
		this.name = "RegistryNotFoundError";
	}
}

/**
 * Error thrown when a replayed key is already registered.
 */
export class RegistryConflictError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
	) {
		super(`${registryName}: Key "${key}" is already registered`);
		this.name = "RegistryConflictError";
	}
}

/**
 * Error thrown when an entry is replayed at a slot other than the next free one.
 */
export class RegistryIndexError extends Error {
	constructor(
		public readonly index: number,
		public readonly expectedIndex: number,
		public readonly registryName: string,
	) {
		super(
			`${registryName}: Cannot place entry at index ${index}, next free index is ${expectedIndex}`,
		);
		this.name = "RegistryIndexError";
	}
}

/**
 * Options for registry behavior.
 */
export interface RegistryOptions {
	/** Name of the registry (used in error messages) */
	name: string;
}

/**
 * Backing storage for a registry. Exposed so that a newer registry instance can
 * adopt the maps of an older one without copying.
 */
export interface RegistryStorage<T> {
	/** key -> item */
	readonly items: Map<string, T>;
	/** index -> key; slot 0 is unused */
	readonly slots: string[];
}

export function createRegistryStorage<T>(): RegistryStorage<T> {
	return { items: new Map<string, T>(), slots: [""] };
}

/**
 * Generic base registry class.
 *
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T> {
	protected readonly storage: RegistryStorage<T>;
	protected readonly registryName: string;

	constructor(options: RegistryOptions, storage: RegistryStorage<T> = createRegistryStorage<T>()) {
		this.registryName = options.name;
		this.storage = storage;
	}

	/**
	 * Register an item under the next free index.
	 * The item is built by `create` only when the key is new.
	 *
	 * @returns the stored item, or undefined if the key was already registered
	 */
	protected registerItem(key: string, create: (index: number) => T): T | undefined {
		if (this.storage.items.has(key)) {
			return undefined;
		}
		return this.commit(key, this.size + 1, create);
	}

	/**
	 * Register an item at an explicit index, which must be the next free one.
	 *
	 * @throws RegistryIndexError if index is not size + 1
	 * @throws RegistryConflictError if the key is already registered
	 */
	protected registerItemAt(key: string, index: number, create: (index: number) => T): T {
		const expected = this.size + 1;
		if (index !== expected) {
			throw new RegistryIndexError(index, expected, this.registryName);
		}
		if (this.storage.items.has(key)) {
			throw new RegistryConflictError(key, this.registryName);
		}
		return this.commit(key, index, create);
	}

	private commit(key: string, index: number, create: (index: number) => T): T {
		const item = create(index);
		this.storage.items.set(key, item);
		this.storage.slots[index] = key;
		return item;
	}

	/**
	 * Get an item by key.
	 * Returns undefined if not found.
	 */
	get(key: string): T | undefined {
		return this.storage.items.get(key);
	}

	/**
	 * Get an item by key.
	 * Throws RegistryNotFoundError if not found.
	 */
	getOrThrow(key: string): T {
		const item = this.get(key);
		if (item === undefined) {
			throw new RegistryNotFoundError(key, this.registryName, this.keys());
		}
		return item;
	}

	/**
	 * Check if an item exists by key.
	 */
	has(key: string): boolean {
		return this.storage.items.has(key);
	}

	/**
	 * Get the key stored at a 1-based index.
	 * Returns undefined for indexes outside [1, size].
	 */
	keyAt(index: number): string | undefined {
		if (!Number.isInteger(index) || index < 1 || index > this.size) {
			return undefined;
		}
		return this.storage.slots[index];
	}

	/**
	 * Get the item stored at a 1-based index.
	 */
	itemAt(index: number): T | undefined {
		const key = this.keyAt(index);
		return key === undefined ? undefined : this.storage.items.get(key);
	}

	/**
	 * Get all registered items, in index order.
	 */
	list(): T[] {
		const items: T[] = [];
		for (let index = 1; index <= this.size; index++) {
			const item = this.itemAt(index);
			if (item !== undefined) {
				items.push(item);
			}
		}
		return items;
	}

	/**
	 * Get all keys (sorted alphabetically).
	 */
	keys(): string[] {
		return Array.from(this.storage.items.keys()).sort();
	}

	/**
	 * Number of occupied slots.
	 */
	get size(): number {
		return this.storage.slots.length - 1;
	}
}
