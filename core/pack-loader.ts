/**
 * Palette pack catalog - discovers YAML palette packs and validates them.
 *
 * A pack is a YAML file with a name and a list of palette definitions. Packs
 * that fail to parse or validate are reported and skipped; the rest still load.
 */

import { readFile } from "node:fs/promises";
import { glob } from "glob";
import { parse } from "yaml";
import { ZodError } from "zod";
import { PalettePackSchema, type PaletteDefinition, type PalettePack } from "./config.ts";
import { formatZodIssues } from "./palette/colors.ts";
import type { PaletteApi } from "./library.ts";

/**
 * Interpolate environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax.
 */
export function interpolateEnvVars(value: string): string {
	return value.replace(
		/\$\{(\w+)(?::-([^}]*))?\}/g,
		(match: string, name: string, defaultValue?: string) => {
			const envVal = process.env[name];
			if (envVal !== undefined && envVal !== "") {
				return envVal;
			}
			if (defaultValue !== undefined) {
				return defaultValue;
			}
			// Unknown variables stay as written
			return match;
		},
	);
}

/**
 * Recursively interpolate environment variables in an object.
 */
function interpolateEnvVarsInObject(obj: unknown): unknown {
	if (typeof obj === "string") {
		return interpolateEnvVars(obj);
	}
	if (Array.isArray(obj)) {
		return obj.map((item) => interpolateEnvVarsInObject(item));
	}
	if (obj !== null && typeof obj === "object") {
		const result: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(obj)) {
			result[key] = interpolateEnvVarsInObject(value);
		}
		return result;
	}
	return obj;
}

/**
 * Format Zod validation errors for user-friendly display.
 */
export function formatZodError(error: ZodError, filePath: string): string {
	const issues = formatZodIssues(error).map((issue) => `  - ${issue}`);
	return `Validation failed for ${filePath}:\n${issues.join("\n")}`;
}

/**
 * Parse and validate one pack file.
 *
 * @throws ZodError if the pack does not match the schema
 * @throws YAMLParseError if the file is not valid YAML
 */
export async function loadPackFile(file: string): Promise<PalettePack> {
	const content = await readFile(file, "utf8");
	const raw: unknown = parse(content);
	return PalettePackSchema.parse(interpolateEnvVarsInObject(raw));
}

export interface PackLoadFailure {
	file: string;
	message: string;
}

export class PackCatalog {
	private packs = new Map<string, PalettePack>();
	private readonly failures: PackLoadFailure[] = [];
	private basePath: string;

	constructor(basePath: string = "packs") {
		this.basePath = basePath;
	}

	/**
	 * Discover and load every pack under the base path (including subdirectories).
	 * Files load in path order, so palette order is stable between runs.
	 */
	async discover(): Promise<void> {
		const files = (await glob(`${this.basePath}/**/*.{yaml,yml}`)).sort();

		for (const file of files) {
			try {
				const pack = await loadPackFile(file);
				if (this.packs.has(pack.name)) {
					console.warn(`[packs] Pack "${pack.name}" in ${file} replaces an earlier pack with the same name`);
				}
				this.packs.set(pack.name, pack);
			} catch (error) {
				const message = error instanceof ZodError
					? formatZodError(error, file)
					: `Failed to load palette pack from ${file}: ${error instanceof Error ? error.message : String(error)}`;
				console.error(message);
				this.failures.push({ file, message });
			}
		}
	}

	/**
	 * Get a pack by name.
	 */
	getPack(name: string): PalettePack {
		const pack = this.packs.get(name);
		if (!pack) {
			const available = Array.from(this.packs.keys()).join(", ");
			throw new Error(`Unknown pack: ${name}. Available packs: ${available || "none"}`);
		}
		return pack;
	}

	hasPack(name: string): boolean {
		return this.packs.has(name);
	}

	/**
	 * List all loaded packs.
	 */
	listPacks(options?: { tags?: string[] }): PalettePack[] {
		const packs = Array.from(this.packs.values());
		const tags = options?.tags;
		if (tags && tags.length > 0) {
			return packs.filter((p) => tags.some((tag) => p.tags?.includes(tag)));
		}
		return packs;
	}

	getPackNames(): string[] {
		return Array.from(this.packs.keys());
	}

	/**
	 * Files that failed to load during discover().
	 */
	getFailures(): readonly PackLoadFailure[] {
		return this.failures;
	}

	/**
	 * Register a pack programmatically (useful for testing).
	 */
	registerPack(pack: PalettePack): void {
		this.packs.set(pack.name, pack);
	}

	/**
	 * Palettes of every loaded pack, in load order.
	 */
	palettes(): PaletteDefinition[] {
		return this.listPacks().flatMap((pack) => pack.palettes);
	}

	/**
	 * Find the pack that defines a palette id.
	 */
	findPaletteSource(id: string): { pack: PalettePack; palette: PaletteDefinition } | undefined {
		for (const pack of this.packs.values()) {
			const palette = pack.palettes.find((p) => p.id === id);
			if (palette) {
				return { pack, palette };
			}
		}
		return undefined;
	}

	/**
	 * Register every loaded palette with a library in one batch.
	 *
	 * @returns number of palettes added
	 */
	registerAll(library: PaletteApi): number {
		return library.registerMany(this.palettes());
	}
}
