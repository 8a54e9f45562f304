/**
 * Color validation and normalization.
 *
 * Palette authors write colors as `[r, g, b]` triples keyed by slot name; the
 * registry stores them as frozen `Color` values in slot order.
 */

import { ZodError } from "zod";
import {
	ColorSequenceSchema,
	PALETTE_KEYS,
	PaletteDefinitionSchema,
	PaletteIdSchema,
	type ColorTriple,
} from "../config.ts";

export interface Color {
	readonly r: number;
	readonly g: number;
	readonly b: number;
}

/** Colors of one palette, one per PALETTE_KEYS slot */
export type ColorSequence = readonly Color[];

/**
 * A palette definition that passed validation.
 */
export interface ValidPalette {
	id: string;
	name: string | undefined;
	colors: ColorSequence;
}

/**
 * Error thrown when palette input is malformed.
 * Nothing has been registered when this is thrown.
 */
export class PaletteValidationError extends Error {
	constructor(
		public readonly paletteId: string | undefined,
		public readonly issues: string[],
	) {
		const subject = paletteId === undefined ? "Invalid palette" : `Invalid palette "${paletteId}"`;
		super(`${subject}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
		this.name = "PaletteValidationError";
	}
}

/**
 * Format Zod validation issues as `path: message` lines.
 */
export function formatZodIssues(error: ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `${path ? `${path}: ` : ""}${issue.message}`;
	});
}

export function rgb(r: number, g: number, b: number): Color {
	return Object.freeze({ r, g, b });
}

function fromTriple([r, g, b]: ColorTriple): Color {
	return rgb(r, g, b);
}

/**
 * Best-effort id for error messages, before the id itself is validated.
 */
function peekId(input: unknown): string | undefined {
	if (typeof input !== "object" || input === null || !("id" in input)) {
		return undefined;
	}
	const parsed = PaletteIdSchema.safeParse(input.id);
	return parsed.success ? parsed.data : undefined;
}

/**
 * Validate a palette definition `{ id, name?, colors }` and normalize its colors.
 *
 * @throws PaletteValidationError
 */
export function validatePaletteDefinition(input: unknown): ValidPalette {
	const parsed = PaletteDefinitionSchema.safeParse(input);
	if (!parsed.success) {
		throw new PaletteValidationError(peekId(input), formatZodIssues(parsed.error));
	}
	const { id, name, colors } = parsed.data;
	return {
		id,
		name: name ?? undefined,
		colors: Object.freeze(PALETTE_KEYS.map((key) => fromTriple(colors[key]))),
	};
}

/**
 * Validate an already-normalized color sequence, such as one read back from a host accessor.
 *
 * @throws PaletteValidationError
 */
export function validateColorSequence(paletteId: string, colors: unknown): ColorSequence {
	const parsed = ColorSequenceSchema.safeParse(colors);
	if (!parsed.success) {
		throw new PaletteValidationError(paletteId, formatZodIssues(parsed.error));
	}
	return Object.freeze(parsed.data.map(({ r, g, b }) => rgb(r, g, b)));
}

export function isColorSequence(value: unknown): value is ColorSequence {
	return ColorSequenceSchema.safeParse(value).success;
}

/**
 * `#rrggbb` form of a color, used by the CLI.
 */
export function toHex(color: Color): string {
	const hex = (n: number) => n.toString(16).padStart(2, "0");
	return `#${hex(color.r)}${hex(color.g)}${hex(color.b)}`;
}
