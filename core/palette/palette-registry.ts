/**
 * Palette Registry - owns the id <-> index bijection for mech palettes.
 *
 * Indexes are 1-based and dense: with N palettes, every index in [1, N] maps to
 * exactly one id. Entries are frozen on creation and never removed, so an index
 * always refers to the same palette once assigned.
 */

import {
	BaseRegistry,
	createRegistryStorage,
	type RegistryStorage,
} from "../registry/index.ts";
import type { PaletteColorsInput, PaletteDefinitionInput } from "../config.ts";
import {
	validateColorSequence,
	validatePaletteDefinition,
	type ColorSequence,
	type ValidPalette,
} from "./colors.ts";

export interface PaletteEntry {
	readonly id: string;
	/** Human readable name; getName() falls back to the id when unset */
	readonly name: string | undefined;
	readonly colors: ColorSequence;
	readonly index: number;
}

export type PaletteStorage = RegistryStorage<PaletteEntry>;

export function createPaletteStorage(): PaletteStorage {
	return createRegistryStorage<PaletteEntry>();
}

export class PaletteRegistry extends BaseRegistry<PaletteEntry> {
	/**
	 * @param storage - Existing maps to adopt, e.g. those of an older library instance
	 */
	constructor(storage?: PaletteStorage) {
		super({ name: "PaletteRegistry" }, storage);
	}

	/**
	 * Register a palette under the next free index.
	 * Registering a known id changes nothing, not even its name.
	 *
	 * @returns true if the palette was added
	 * @throws PaletteValidationError if the id, name or colors are malformed
	 */
	register(id: string, name: string | null | undefined, colors: PaletteColorsInput): boolean {
		return this.registerValidated([validatePaletteDefinition({ id, name, colors })]) === 1;
	}

	/**
	 * Register several palettes at once. Every definition is validated before
	 * any is stored, so a bad definition leaves the registry unchanged.
	 *
	 * @returns number of palettes added
	 * @throws PaletteValidationError
	 */
	registerMany(definitions: readonly PaletteDefinitionInput[]): number {
		return this.registerValidated(definitions.map((definition) => validatePaletteDefinition(definition)));
	}

	/**
	 * Register palettes that already passed validatePaletteDefinition().
	 * Known ids, including ids repeated within the batch, are skipped.
	 *
	 * @returns number of palettes added
	 */
	registerValidated(palettes: readonly ValidPalette[]): number {
		let added = 0;
		for (const palette of palettes) {
			const entry = this.registerItem(palette.id, (index) =>
				Object.freeze({ id: palette.id, name: palette.name, colors: palette.colors, index }),
			);
			if (entry !== undefined) {
				added++;
			}
		}
		return added;
	}

	/**
	 * Replay a palette at a given index. Used when migrating palettes owned by
	 * another implementation, so the index must be the next free one.
	 *
	 * @throws RegistryIndexError if index is not count() + 1
	 * @throws RegistryConflictError if the id is already registered
	 * @throws PaletteValidationError if colors are not 8 valid colors
	 */
	registerAt(
		id: string,
		index: number,
		name: string | undefined,
		colors: ColorSequence,
	): PaletteEntry {
		const validColors = validateColorSequence(id, colors);
		return this.registerItemAt(id, index, (slot) =>
			Object.freeze({ id, name, colors: validColors, index: slot }),
		);
	}

	byIndex(index: number): PaletteEntry | undefined {
		return this.itemAt(index);
	}

	indexOf(id: string): number | undefined {
		return this.get(id)?.index;
	}

	idAt(index: number): string | undefined {
		return this.keyAt(index);
	}

	/**
	 * Name of a palette, falling back to its id when it has none.
	 */
	getName(id: string): string | undefined {
		const entry = this.get(id);
		if (entry === undefined) {
			return undefined;
		}
		return entry.name ?? entry.id;
	}

	colorsAt(index: number): ColorSequence | undefined {
		return this.byIndex(index)?.colors;
	}

	count(): number {
		return this.size;
	}

	/**
	 * Underlying maps, handed to a newer library instance on upgrade.
	 */
	get data(): PaletteStorage {
		return this.storage;
	}
}
