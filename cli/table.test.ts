import { describe, expect, it } from "vitest";
import { formatPaletteColors, formatPaletteTable } from "./table.ts";
import { PALETTE_KEYS } from "../core/config.ts";
import { rgb, type PaletteEntry } from "../core/palette/index.ts";

function entry(id: string, index: number, name?: string): PaletteEntry {
	return {
		id,
		index,
		name,
		colors: PALETTE_KEYS.map(() => rgb(255, 0, 16)),
	};
}

const HEX_ROW = Array(8).fill("#ff0010").join(" ");

describe("formatPaletteTable", () => {
	it("renders one aligned row per palette", () => {
		const lines = formatPaletteTable([entry("Ember", 1, "Ember Red"), entry("Frost", 10)]);

		expect(lines[3]).toBe(`│ Index │ Offset │ ID    │ Name      │ ${"Colors".padEnd(HEX_ROW.length)} │`);
		expect(lines[5]).toBe(`│     1 │      0 │ Ember │ Ember Red │ ${HEX_ROW} │`);
		expect(lines[6]).toBe(`│    10 │      9 │ Frost │ Frost     │ ${HEX_ROW} │`);
		expect(lines).toHaveLength(8);
	});

	it("draws borders as wide as the header row", () => {
		const lines = formatPaletteTable([entry("Ember", 1)]);
		const width = lines[3]?.length ?? 0;

		for (const line of lines) {
			expect(line.length).toBe(width);
		}
		expect(lines[1]?.startsWith("│ PALETTES ")).toBe(true);
	});

	it("says so when there are no palettes", () => {
		const lines = formatPaletteTable([]);

		expect(lines[5]?.startsWith("│ No palettes.")).toBe(true);
		expect(lines).toHaveLength(7);
	});
});

describe("formatPaletteColors", () => {
	it("lists each slot with hex and channels", () => {
		const lines = formatPaletteColors(entry("Ember", 1));

		expect(lines).toHaveLength(8);
		expect(lines[0]).toBe("    PlateHighlight  #ff0010  (255, 0, 16)");
		expect(lines[7]).toBe("    BodyHighlight   #ff0010  (255, 0, 16)");
	});
});
