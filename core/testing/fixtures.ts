/**
 * Shared test data: deterministic palettes and an in-memory host.
 */

import { PALETTE_KEYS, type PaletteColorsInput } from "../config.ts";
import { rgb, type ColorSequence } from "../palette/colors.ts";

/**
 * Palette colors derived from a small seed (0..50), distinct per seed.
 */
export function makeColors(seed: number): PaletteColorsInput {
	const triple = (slot: number): [number, number, number] => [seed, slot * 30, 200 - seed];
	return {
		PlateHighlight: triple(0),
		PlateLight: triple(1),
		PlateMid: triple(2),
		PlateDark: triple(3),
		PlateOutline: triple(4),
		PlateShadow: triple(5),
		BodyColor: triple(6),
		BodyHighlight: triple(7),
	};
}

/**
 * The normalized form of makeColors(seed).
 */
export function makeColorSequence(seed: number): ColorSequence {
	return PALETTE_KEYS.map((_, slot) => rgb(seed, slot * 30, 200 - seed));
}

/**
 * makeColors(seed) with one slot left out, typed as complete input so it can
 * reach runtime validation.
 */
export function colorsWithout(seed: number, key: (typeof PALETTE_KEYS)[number]): PaletteColorsInput {
	const colors: Partial<PaletteColorsInput> = { ...makeColors(seed) };
	delete colors[key];
	return colors as PaletteColorsInput;
}

/**
 * makeColors(seed) with one slot replaced by an arbitrary value.
 */
export function colorsWith(seed: number, key: (typeof PALETTE_KEYS)[number], value: unknown): PaletteColorsInput {
	return { ...makeColors(seed), [key]: value } as PaletteColorsInput;
}
