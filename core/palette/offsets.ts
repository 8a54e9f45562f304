/**
 * Offset view over a palette registry.
 *
 * Sprite consumers address palettes by image offset, which is the palette
 * index minus one.
 */

import type { PaletteRegistry } from "./palette-registry.ts";

export function offsetToId(registry: PaletteRegistry, offset: number): string | undefined {
	if (!Number.isInteger(offset) || offset < 0) {
		return undefined;
	}
	return registry.idAt(offset + 1);
}

export function idToOffset(registry: PaletteRegistry, id: string): number | undefined {
	const index = registry.indexOf(id);
	return index === undefined ? undefined : index - 1;
}
