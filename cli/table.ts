/**
 * Table formatting for the palettes CLI.
 *
 * Produces a boxed ASCII table with one row per palette:
 * index, image offset, id, name and the eight colors as hex.
 */

import { PALETTE_KEYS } from "../core/config.ts";
import { toHex, type PaletteEntry } from "../core/palette/index.ts";

const COLUMN_GAP = " │ ";

interface Column {
	header: string;
	align: "left" | "right";
	value: (entry: PaletteEntry) => string;
}

const COLUMNS: Column[] = [
	{ header: "Index", align: "right", value: (e) => String(e.index) },
	{ header: "Offset", align: "right", value: (e) => String(e.index - 1) },
	{ header: "ID", align: "left", value: (e) => e.id },
	{ header: "Name", align: "left", value: (e) => e.name ?? e.id },
	{ header: "Colors", align: "left", value: (e) => e.colors.map(toHex).join(" ") },
];

function pad(text: string, width: number, align: Column["align"]): string {
	return align === "right" ? text.padStart(width) : text.padEnd(width);
}

/**
 * Render palettes as table lines (no trailing newline).
 */
export function formatPaletteTable(entries: readonly PaletteEntry[], title = "PALETTES"): string[] {
	const widths = COLUMNS.map((column) =>
		Math.max(column.header.length, ...entries.map((entry) => column.value(entry).length)),
	);
	const row = (cells: string[]) =>
		"│ " + cells.map((cell, i) => pad(cell, widths[i] ?? 0, COLUMNS[i]?.align ?? "left")).join(COLUMN_GAP) + " │";

	const header = row(COLUMNS.map((column) => column.header));
	const innerWidth = header.length - 2;
	const lines = [
		"╭" + "─".repeat(innerWidth) + "╮",
		"│ " + title.padEnd(innerWidth - 1) + "│",
		"├" + "─".repeat(innerWidth) + "┤",
		header,
		"├" + "─".repeat(innerWidth) + "┤",
	];
	if (entries.length === 0) {
		lines.push("│ " + "No palettes.".padEnd(innerWidth - 1) + "│");
	}
	for (const entry of entries) {
		lines.push(row(COLUMNS.map((column) => column.value(entry))));
	}
	lines.push("╰" + "─".repeat(innerWidth) + "╯");
	return lines;
}

/**
 * One line per color slot, for `describe`.
 */
export function formatPaletteColors(entry: PaletteEntry): string[] {
	const width = Math.max(...PALETTE_KEYS.map((key) => key.length));
	return PALETTE_KEYS.map((key, slot) => {
		const color = entry.colors[slot];
		const value = color ? `${toHex(color)}  (${color.r}, ${color.g}, ${color.b})` : "-";
		return `    ${key.padEnd(width)}  ${value}`;
	});
}
