#!/usr/bin/env node
/**
 * Palettes CLI entry point.
 * Lists, describes and validates palette packs.
 */

import { PackCatalog, loadPackFile, formatZodError } from "../core/pack-loader.ts";
import { createProcessScope, loadPaletteLibrary, type PaletteLibraryHandle } from "../core/library.ts";
import { createBuiltinHost } from "../core/authority/host.ts";
import { ZodError } from "zod";
import { formatPaletteColors, formatPaletteTable } from "./table.ts";

const CLI_VERSION = "0.4";

interface ParsedArgs {
	command: string;
	args: string[];
	options: Record<string, string | string[] | boolean>;
}

/**
 * Safely convert an option value to a string array.
 * Splits comma-separated values (e.g., "a,b,c" → ["a", "b", "c"]).
 */
function toStringArray(
	value: string | string[] | boolean | undefined,
): string[] | undefined {
	if (value === undefined || typeof value === "boolean") return undefined;
	if (Array.isArray(value)) {
		return value.flatMap((v) => v.split(",").map((s) => s.trim())).filter(Boolean);
	}
	return value.split(",").map((s) => s.trim()).filter(Boolean);
}

function parseArgs(argv: string[]): ParsedArgs {
	const args = argv.slice(2);
	const command = args[0] ?? "help";
	const restArgs: string[] = [];
	const options: Record<string, string | string[] | boolean> = {};

	for (let i = 1; i < args.length; i++) {
		const arg = args[i];

		if (!arg) continue;

		if (arg.startsWith("-")) {
			const key = arg.replace(/^--?/, "");
			// Collect values up to the next flag
			const values: string[] = [];
			let next = args[i + 1];
			while (next !== undefined && !next.startsWith("-")) {
				values.push(next);
				i++;
				next = args[i + 1];
			}
			options[key] = values.length === 0 ? true : values.length === 1 ? (values[0] ?? true) : values;
		} else {
			restArgs.push(arg);
		}
	}

	return { command, args: restArgs, options };
}

function packDir(options: ParsedArgs["options"]): string {
	return toStringArray(options["dir"])?.[0] ?? "packs";
}

function printHelp(): void {
	console.log(`
╭─────────────────────────────────────────────────────────────────╮
│                          PALETTES                               │
│          Versioned palette registry for mech sprites            │
╰─────────────────────────────────────────────────────────────────╯

Usage:
  palettes <command> [options]

Commands:
  list                 List every palette from the pack directory
  describe <id>        Show one palette's pack, index and colors
  validate <files...>  Check palette pack files without loading them
  help                 Show this help message

Options:
  --dir <path>         Pack directory (default: packs)
  --tags <a,b>         Only packs with one of these tags (list)

Examples:
  palettes list
  palettes list --dir my-packs --tags warm
  palettes describe Ember
  palettes validate packs/example.yaml
`);
}

/**
 * Load the catalog and register its palettes with a fresh library instance
 * over a stand-alone host.
 */
async function loadCatalog(dir: string): Promise<{ catalog: PackCatalog; library: PaletteLibraryHandle }> {
	const catalog = new PackCatalog(dir);
	await catalog.discover();
	const library = loadPaletteLibrary({
		version: CLI_VERSION,
		host: createBuiltinHost(),
		scope: createProcessScope(),
	});
	catalog.registerAll(library);
	return { catalog, library };
}

async function listCommand(options: ParsedArgs["options"]): Promise<void> {
	const dir = packDir(options);
	const tags = toStringArray(options["tags"]);
	const { catalog, library } = await loadCatalog(dir);

	let entries = library.list();
	if (tags && tags.length > 0) {
		const allowed = new Set(catalog.listPacks({ tags }).flatMap((pack) => pack.palettes.map((p) => p.id)));
		entries = entries.filter((entry) => allowed.has(entry.id));
	}

	console.log();
	for (const line of formatPaletteTable(entries, `PALETTES (${dir})`)) {
		console.log(line);
	}
	console.log(`\n${entries.length} palette(s) from ${catalog.getPackNames().length} pack(s)`);
	if (catalog.getFailures().length > 0) {
		console.log(`⚠️  ${catalog.getFailures().length} pack file(s) failed to load`);
	}
	console.log();
}

async function describeCommand(id: string, options: ParsedArgs["options"]): Promise<void> {
	const { catalog, library } = await loadCatalog(packDir(options));
	const entry = library.get(id);

	if (!entry) {
		console.error(`\n❌ Unknown palette: ${id}\n`);
		process.exit(1);
	}

	const source = catalog.findPaletteSource(id);
	console.log(`
Palette: ${entry.id}
  Name:   ${entry.name ?? entry.id}
  Pack:   ${source?.pack.name ?? "-"}
  Index:  ${entry.index}
  Offset: ${library.idToOffset(entry.id) ?? "-"}

  Colors:`);
	for (const line of formatPaletteColors(entry)) {
		console.log(line);
	}
	console.log();
}

async function validateCommand(files: string[]): Promise<void> {
	let failed = 0;

	for (const file of files) {
		try {
			const pack = await loadPackFile(file);
			console.log(`✅ ${file}: ${pack.name} (${pack.palettes.length} palette(s))`);
		} catch (error) {
			failed++;
			const message = error instanceof ZodError
				? formatZodError(error, file)
				: `${file}: ${error instanceof Error ? error.message : String(error)}`;
			console.error(`❌ ${message}`);
		}
	}

	if (failed > 0) {
		console.error(`\n${failed} of ${files.length} file(s) failed validation\n`);
		process.exit(1);
	}
}

async function main(): Promise<void> {
	const parsed = parseArgs(process.argv);

	switch (parsed.command) {
		case "help":
		case "--help":
		case "-h":
			printHelp();
			break;

		case "list":
			await listCommand(parsed.options);
			break;

		case "describe":
			if (!parsed.args[0]) {
				console.error("\n❌ Please specify a palette id.\n");
				process.exit(1);
			}
			await describeCommand(parsed.args[0], parsed.options);
			break;

		case "validate":
			if (parsed.args.length === 0) {
				console.error("\n❌ Please specify one or more pack files.\n");
				process.exit(1);
			}
			await validateCommand(parsed.args);
			break;

		default:
			console.error(`\n❌ Unknown command: ${parsed.command}\n`);
			printHelp();
			process.exit(1);
	}
}

main().catch((error: unknown) => {
	console.error("❌ Error:", error);
	process.exit(1);
});
