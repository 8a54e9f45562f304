/**
 * Host boundary - the process-wide palette accessors and render descriptors
 * that the library reads and rewrites.
 */

import type { ColorSequence } from "../palette/colors.ts";

/** Number of palettes the host can render */
export type ColorCountFn = () => number;

/** Colors of the palette at a 1-based index, or undefined past the end */
export type ColorAtFn = (index: number) => ColorSequence | undefined;

/**
 * The pair of accessor functions an implementation installs into the host
 * to become the source of truth for palettes.
 */
export interface AuthorityToken {
	readonly colorCount: ColorCountFn;
	readonly colorAt: ColorAtFn;
}

/**
 * A render object whose frame count may track the palette count.
 * Sprites under the palette path carry one vertical frame per palette.
 */
export interface DependentDescriptor {
	spritePath: string;
	frameHeight?: number;
}

export type DescriptorTable = Record<string, DependentDescriptor>;

/**
 * Process-wide host state shared by every palette implementation.
 * The two accessor slots are overwritten by whichever implementation takes authority.
 */
export interface PaletteHost {
	colorCount: ColorCountFn;
	colorAt: ColorAtFn;
	/**
	 * Id -> image offset table of a foreign palette implementation, when one is loaded.
	 * Offsets are 0-based.
	 */
	foreignOffsets?: Readonly<Record<string, number>>;
	descriptors: DescriptorTable;
	/** Palette count last published to the host's renderer */
	paletteCount?: number;
}

/**
 * Whether both host slots currently hold the token's functions.
 */
export function holdsAuthority(host: PaletteHost, token: AuthorityToken): boolean {
	return host.colorCount === token.colorCount && host.colorAt === token.colorAt;
}

export function installAuthority(host: PaletteHost, token: AuthorityToken): void {
	host.colorCount = token.colorCount;
	host.colorAt = token.colorAt;
}

/**
 * Create a host whose accessors serve a fixed list of palettes, the way the
 * game does before any library is loaded.
 *
 * @param palettes - Colors for indexes 1..n
 */
export function createBuiltinHost(
	palettes: readonly ColorSequence[] = [],
	descriptors: DescriptorTable = {},
): PaletteHost {
	const builtin = [...palettes];
	return {
		colorCount: () => builtin.length,
		colorAt: (index) => builtin[index - 1],
		descriptors,
		paletteCount: builtin.length,
	};
}
