/**
 * Core configuration schemas for the palette registry.
 * Defines Zod schemas for palette input, YAML palette packs, and library options.
 */

import { z } from "zod";

// ============================================================================
// Colors
// ============================================================================

/**
 * Semantic slots of a mech palette, in the order the host reads them.
 */
export const PALETTE_KEYS = [
	"PlateHighlight",
	"PlateLight",
	"PlateMid",
	"PlateDark",
	"PlateOutline",
	"PlateShadow",
	"BodyColor",
	"BodyHighlight",
] as const;

export type PaletteKey = (typeof PALETTE_KEYS)[number];

export const CHANNEL_MAX = 255;

const ChannelSchema = z
	.number()
	.int("Color channels must be integers")
	.min(0, "Color channels must be between 0 and 255")
	.max(CHANNEL_MAX, "Color channels must be between 0 and 255");

/**
 * Raw color as written by palette authors: [r, g, b].
 */
export const ColorTripleSchema = z.tuple([ChannelSchema, ChannelSchema, ChannelSchema], {
	invalid_type_error: "Color must contain three integers",
});

/**
 * Normalized color, as stored in the registry and returned by host accessors.
 */
export const ColorSchema = z.object({
	r: ChannelSchema,
	g: ChannelSchema,
	b: ChannelSchema,
});

export const ColorSequenceSchema = z
	.array(ColorSchema)
	.length(PALETTE_KEYS.length, `A palette has exactly ${PALETTE_KEYS.length} colors`);

export const PaletteColorsSchema = z.object({
	PlateHighlight: ColorTripleSchema,
	PlateLight: ColorTripleSchema,
	PlateMid: ColorTripleSchema,
	PlateDark: ColorTripleSchema,
	PlateOutline: ColorTripleSchema,
	PlateShadow: ColorTripleSchema,
	BodyColor: ColorTripleSchema,
	BodyHighlight: ColorTripleSchema,
} satisfies Record<PaletteKey, typeof ColorTripleSchema>);

// ============================================================================
// Palette definitions
// ============================================================================

export const PaletteIdSchema = z
	.string({ invalid_type_error: "ID must be a string", required_error: "Missing palette ID" })
	.min(1, "ID must not be empty");

export const PaletteNameSchema = z
	.string({ invalid_type_error: "Name must be a string" })
	.nullish();

export const PaletteDefinitionSchema = z.object({
	id: PaletteIdSchema,
	name: PaletteNameSchema,
	colors: PaletteColorsSchema,
});

// ============================================================================
// Palette packs (YAML)
// ============================================================================

export const PalettePackSchema = z.object({
	name: z.string(),
	description: z.string().optional(),
	author: z.string().optional(),
	tags: z.array(z.string()).optional(),
	palettes: z.array(PaletteDefinitionSchema).min(1, "A pack must define at least one palette"),
});

// ============================================================================
// Library options
// ============================================================================

export const DEFAULT_LIBRARY_KEY = "mech-palettes";

export const LibraryConfigSchema = z.object({
	/** Key under which instances are arbitrated in the process scope */
	libraryKey: z.string().min(1).default(DEFAULT_LIBRARY_KEY),
	/** Sprite path prefix of descriptors that carry one frame per palette */
	palettePath: z.string().min(1).default("units/player"),
	/** Descriptors that carry one frame per palette whatever their sprite path */
	baseDescriptors: z.array(z.string()).default(["MechUnit", "MechIcon"]),
});

// ============================================================================
// Type exports
// ============================================================================

export type ColorTriple = z.infer<typeof ColorTripleSchema>;
export type PaletteColorsInput = z.infer<typeof PaletteColorsSchema>;
export type PaletteDefinitionInput = z.input<typeof PaletteDefinitionSchema>;
export type PaletteDefinition = z.infer<typeof PaletteDefinitionSchema>;
export type PalettePack = z.infer<typeof PalettePackSchema>;
export type LibraryConfigInput = z.input<typeof LibraryConfigSchema>;
export type LibraryConfig = z.infer<typeof LibraryConfigSchema>;

/**
 * Fill in defaults for library options.
 */
export function resolveLibraryConfig(input: LibraryConfigInput = {}): LibraryConfig {
	return LibraryConfigSchema.parse(input);
}
