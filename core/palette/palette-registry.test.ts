/**
 * Unit tests for PaletteRegistry.
 *
 * Tests cover:
 * 1. Registration, lookup and the id <-> index bijection
 * 2. Idempotent registration
 * 3. Validation failures leaving the registry unchanged
 * 4. Batch registration and migration replay
 */

import { describe, expect, it, beforeEach } from "vitest";
import { PaletteRegistry, createPaletteStorage } from "./palette-registry.ts";
import { PaletteValidationError } from "./colors.ts";
import { RegistryConflictError, RegistryIndexError, RegistryNotFoundError } from "../registry/index.ts";
import { colorsWithout, makeColorSequence, makeColors } from "../testing/fixtures.ts";

describe("PaletteRegistry", () => {
	let registry: PaletteRegistry;

	beforeEach(() => {
		registry = new PaletteRegistry();
	});

	describe("register", () => {
		it("assigns the next index and stores the entry", () => {
			expect(registry.register("Ember", "Ember Red", makeColors(1))).toBe(true);
			expect(registry.register("Frost", null, makeColors(2))).toBe(true);

			expect(registry.count()).toBe(2);
			expect(registry.get("Frost")).toEqual({
				id: "Frost",
				name: undefined,
				colors: makeColorSequence(2),
				index: 2,
			});
		});

		it("keeps the bijection between ids and indexes", () => {
			const ids = ["a", "b", "c", "d", "e"];
			ids.forEach((id, seed) => registry.register(id, null, makeColors(seed)));

			for (const id of ids) {
				const index = registry.indexOf(id);
				expect(index).toBeDefined();
				expect(registry.idAt(index ?? 0)).toBe(id);
			}
			for (let i = 1; i <= registry.count(); i++) {
				const id = registry.idAt(i);
				expect(registry.indexOf(id ?? "")).toBe(i);
			}
		});

		it("ignores a second registration of the same id", () => {
			registry.register("Ember", "Ember Red", makeColors(1));
			registry.register("Frost", null, makeColors(2));
			const before = registry.get("Ember");

			expect(registry.register("Ember", "Renamed", makeColors(9))).toBe(false);

			expect(registry.count()).toBe(2);
			expect(registry.get("Ember")).toBe(before);
			expect(registry.getName("Ember")).toBe("Ember Red");
			expect(registry.idAt(2)).toBe("Frost");
		});

		it("freezes stored entries", () => {
			registry.register("Ember", "Ember Red", makeColors(1));

			expect(Object.isFrozen(registry.get("Ember"))).toBe(true);
		});

		it("rejects a palette missing a slot without changing the registry", () => {
			registry.register("Ember", null, makeColors(1));

			expect(() => registry.register("x", null, colorsWithout(2, "PlateOutline"))).toThrow(
				PaletteValidationError,
			);
			expect(registry.count()).toBe(1);
			expect(registry.has("x")).toBe(false);
		});

		it("never decreases the count", () => {
			const counts: number[] = [registry.count()];
			registry.register("a", null, makeColors(1));
			counts.push(registry.count());
			registry.register("a", null, makeColors(1));
			counts.push(registry.count());
			try {
				registry.register("b", null, colorsWithout(1, "BodyColor"));
			} catch {
				// expected validation failure
			}
			counts.push(registry.count());
			registry.register("b", null, makeColors(2));
			counts.push(registry.count());

			expect(counts).toEqual([0, 1, 1, 1, 2]);
			expect(registry.idAt(1)).toBe("a");
		});
	});

	describe("queries", () => {
		beforeEach(() => {
			registry.register("Ember", "Ember Red", makeColors(1));
			registry.register("Frost", null, makeColors(2));
		});

		it("looks up by index", () => {
			expect(registry.byIndex(2)?.id).toBe("Frost");
			expect(registry.colorsAt(1)).toEqual(makeColorSequence(1));
		});

		it("returns undefined for unknown ids and indexes", () => {
			expect(registry.get("Nope")).toBeUndefined();
			expect(registry.indexOf("Nope")).toBeUndefined();
			expect(registry.idAt(0)).toBeUndefined();
			expect(registry.idAt(3)).toBeUndefined();
			expect(registry.byIndex(3)).toBeUndefined();
			expect(registry.colorsAt(3)).toBeUndefined();
			expect(registry.getName("Nope")).toBeUndefined();
		});

		it("falls back to the id for unnamed palettes", () => {
			expect(registry.getName("Ember")).toBe("Ember Red");
			expect(registry.getName("Frost")).toBe("Frost");
		});

		it("throws from getOrThrow for unknown ids", () => {
			expect(() => registry.getOrThrow("Nope")).toThrow(RegistryNotFoundError);
		});

		it("lists entries in index order", () => {
			expect(registry.list().map((entry) => entry.index)).toEqual([1, 2]);
		});
	});

	describe("registerMany", () => {
		it("adds every new palette and counts them", () => {
			registry.register("Ember", null, makeColors(1));

			const added = registry.registerMany([
				{ id: "Frost", colors: makeColors(2) },
				{ id: "Ember", colors: makeColors(3) },
				{ id: "Moss", name: "Moss Green", colors: makeColors(4) },
				{ id: "Frost", colors: makeColors(5) },
			]);

			expect(added).toBe(2);
			expect(registry.count()).toBe(3);
			expect(registry.idAt(3)).toBe("Moss");
			expect(registry.colorsAt(2)).toEqual(makeColorSequence(2));
		});

		it("commits nothing when any definition is invalid", () => {
			expect(() =>
				registry.registerMany([
					{ id: "Frost", colors: makeColors(2) },
					{ id: "Broken", colors: colorsWithout(3, "PlateLight") },
				]),
			).toThrow('Invalid palette "Broken"');

			expect(registry.count()).toBe(0);
			expect(registry.has("Frost")).toBe(false);
		});
	});

	describe("registerAt", () => {
		it("replays entries in index order", () => {
			registry.registerAt("RiftWalkers", 1, "Archive Olive", makeColorSequence(1));
			registry.registerAt("RustingHulks", 2, "Rust Orange", makeColorSequence(2));

			expect(registry.count()).toBe(2);
			expect(registry.byIndex(1)).toEqual({
				id: "RiftWalkers",
				name: "Archive Olive",
				colors: makeColorSequence(1),
				index: 1,
			});
		});

		it("continues auto-indexing after replayed entries", () => {
			registry.registerAt("RiftWalkers", 1, undefined, makeColorSequence(1));
			registry.register("Ember", null, makeColors(2));

			expect(registry.indexOf("Ember")).toBe(2);
		});

		it("rejects an index other than the next free one", () => {
			expect(() => registry.registerAt("a", 2, undefined, makeColorSequence(1))).toThrow(RegistryIndexError);
			expect(registry.count()).toBe(0);
		});

		it("rejects a known id", () => {
			registry.register("a", null, makeColors(1));

			expect(() => registry.registerAt("a", 2, undefined, makeColorSequence(1))).toThrow(
				RegistryConflictError,
			);
		});

		it("rejects a malformed color sequence", () => {
			expect(() => registry.registerAt("a", 1, undefined, makeColorSequence(1).slice(1))).toThrow(
				PaletteValidationError,
			);
			expect(registry.count()).toBe(0);
		});
	});

	describe("adopted storage", () => {
		it("shares entries with the registry that created the storage", () => {
			const storage = createPaletteStorage();
			const older = new PaletteRegistry(storage);
			older.register("Ember", null, makeColors(1));

			const newer = new PaletteRegistry(older.data);
			newer.register("Frost", null, makeColors(2));

			expect(newer.idAt(1)).toBe("Ember");
			expect(older.count()).toBe(2);
		});
	});
});
