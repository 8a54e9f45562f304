/**
 * Id and name resolution for palettes migrated from another implementation.
 *
 * Migrated palettes arrive as bare colors at an index. Their id and name come
 * from an ordered chain of resolvers; the first one with an answer wins.
 */

/**
 * Resolve something for a 1-based palette index, or undefined if this
 * source knows nothing about it.
 */
export type NameResolver = (index: number) => string | undefined;

export interface BuiltinPalette {
	id: string;
	name: string;
}

/**
 * Palettes shipped with the game, at indexes 1..9.
 */
export const BUILTIN_PALETTES: readonly BuiltinPalette[] = [
	{ id: "RiftWalkers", name: "Archive Olive" },
	{ id: "RustingHulks", name: "Rust Orange" },
	{ id: "ZenithGuard", name: "Pinnacle Dark Blue" },
	{ id: "Blitzkrieg", name: "Detrius Yellow" },
	{ id: "SteelJudoka", name: "Archive Shivan" },
	{ id: "FlameBehemoths", name: "Rust Red" },
	{ id: "FrozenTitans", name: "Pinnacle Ice Blue" },
	{ id: "HazardousMechs", name: "Detrius Tan" },
	{ id: "SecretSquad", name: "Vek Purple" },
];

export const builtinIds: NameResolver = (index) => BUILTIN_PALETTES[index - 1]?.id;

export const builtinNames: NameResolver = (index) => BUILTIN_PALETTES[index - 1]?.name;

export const indexFallback: NameResolver = (index) => String(index);

/**
 * Resolver over a foreign implementation's id -> offset table.
 * Returns undefined when there is no table.
 */
export function foreignIds(offsets: Readonly<Record<string, number>> | undefined): NameResolver | undefined {
	if (offsets === undefined) {
		return undefined;
	}
	const byIndex = new Map<number, string>();
	for (const [id, offset] of Object.entries(offsets)) {
		if (Number.isInteger(offset) && offset >= 0) {
			byIndex.set(offset + 1, id);
		}
	}
	return (index) => byIndex.get(index);
}

/**
 * Every answer the chain has for an index, in priority order, without duplicates.
 */
export function candidates(chain: readonly (NameResolver | undefined)[], index: number): string[] {
	const found: string[] = [];
	for (const resolver of chain) {
		const value = resolver?.(index);
		if (value !== undefined && value !== "" && !found.includes(value)) {
			found.push(value);
		}
	}
	return found;
}

export function resolveFirst(chain: readonly (NameResolver | undefined)[], index: number): string | undefined {
	return candidates(chain, index)[0];
}

/**
 * Id and name chains used when migrating from a host.
 */
export interface MigrationNaming {
	/** Id candidates, best first; the last one is always the stringified index */
	idCandidates(index: number): string[];
	/** Display name, falling back to the chosen id */
	nameFor(index: number, id: string): string;
}

export function createMigrationNaming(foreignOffsets?: Readonly<Record<string, number>>): MigrationNaming {
	const foreign = foreignIds(foreignOffsets);
	const idChain = [builtinIds, foreign, indexFallback];
	const nameChain = [builtinNames, foreign];
	return {
		idCandidates: (index) => candidates(idChain, index),
		nameFor: (index, id) => resolveFirst(nameChain, index) ?? id,
	};
}
