/**
 * Palette library - the public palette API and version arbitration between
 * library copies loaded into one process.
 *
 * Every copy calls loadPaletteLibrary() with its own version. The process
 * scope keeps one instance per library key; a copy that is newer than the
 * current instance replaces it (adopting its palette maps), an older or equal
 * copy adopts the current one. Copies hold a handle that resolves the current
 * instance on every call, so a superseded copy always runs the newest logic.
 */

import { resolveLibraryConfig, type LibraryConfig, type LibraryConfigInput } from "./config.ts";
import type { PaletteColorsInput, PaletteDefinitionInput } from "./config.ts";
import {
	PaletteRegistry,
	idToOffset,
	offsetToId,
	validatePaletteDefinition,
	type ColorSequence,
	type PaletteEntry,
	type PaletteStorage,
	type ValidPalette,
} from "./palette/index.ts";
import {
	AuthorityManager,
	isAtLeast,
	parseVersion,
	type MigrationReport,
	type PaletteHost,
} from "./authority/index.ts";
import { syncAfterGrowth } from "./dependents/descriptor-sync.ts";

/**
 * Operations every library copy exposes.
 */
export interface PaletteApi {
	readonly version: string;
	/**
	 * Add a palette. Known ids are ignored.
	 * @returns true if the palette was added
	 * @throws PaletteValidationError
	 */
	register(id: string, name: string | null, colors: PaletteColorsInput): boolean;
	/**
	 * Add several palettes with a single descriptor update.
	 * @returns number of palettes added
	 * @throws PaletteValidationError
	 */
	registerMany(definitions: readonly PaletteDefinitionInput[]): number;
	get(id: string): PaletteEntry | undefined;
	/** Palette name, or its id when unnamed */
	getName(id: string): string | undefined;
	indexOf(id: string): number | undefined;
	idAt(index: number): string | undefined;
	offsetToId(offset: number): string | undefined;
	idToOffset(id: string): number | undefined;
	count(): number;
	colorsAt(index: number): ColorSequence | undefined;
	list(): PaletteEntry[];
	/** Take over the host accessors if another implementation holds them */
	ensureAuthority(): MigrationReport | undefined;
	/** Whether this instance currently holds the host accessors */
	handlesPalettes(): boolean;
}

/**
 * A library instance as stored in the process scope.
 * Only structural members are relied upon, since copies loaded from different
 * module graphs do not share classes.
 */
export interface LibraryInstance extends PaletteApi {
	readonly libraryKey: string;
	/** Palette maps, adopted by newer instances */
	readonly data: PaletteStorage;
}

export interface PaletteLibraryOptions {
	version: string;
	host: PaletteHost;
	config?: LibraryConfigInput;
	/** Palette maps of an older instance to adopt */
	storage?: PaletteStorage;
}

export class PaletteLibrary implements LibraryInstance {
	readonly version: string;
	readonly config: LibraryConfig;
	readonly registry: PaletteRegistry;
	private readonly host: PaletteHost;
	private readonly authority: AuthorityManager;

	constructor(options: PaletteLibraryOptions) {
		parseVersion(options.version);
		this.version = options.version;
		this.config = resolveLibraryConfig(options.config);
		this.host = options.host;
		this.registry = new PaletteRegistry(options.storage);
		this.authority = new AuthorityManager(this.host, this.registry);
	}

	get libraryKey(): string {
		return this.config.libraryKey;
	}

	get data(): PaletteStorage {
		return this.registry.data;
	}

	register(id: string, name: string | null, colors: PaletteColorsInput): boolean {
		return this.add([validatePaletteDefinition({ id, name, colors })]) === 1;
	}

	registerMany(definitions: readonly PaletteDefinitionInput[]): number {
		return this.add(definitions.map((definition) => validatePaletteDefinition(definition)));
	}

	/**
	 * Commit validated palettes, then grow descriptors once for the whole batch.
	 */
	private add(palettes: readonly ValidPalette[]): number {
		this.ensureAuthority();
		const added = this.registry.registerValidated(palettes);
		if (added > 0) {
			const count = this.registry.count();
			syncAfterGrowth(added, count, this.host.descriptors, this.config);
			this.host.paletteCount = count;
		}
		return added;
	}

	get(id: string): PaletteEntry | undefined {
		return this.registry.get(id);
	}

	getName(id: string): string | undefined {
		return this.registry.getName(id);
	}

	indexOf(id: string): number | undefined {
		return this.registry.indexOf(id);
	}

	idAt(index: number): string | undefined {
		return this.registry.idAt(index);
	}

	offsetToId(offset: number): string | undefined {
		return offsetToId(this.registry, offset);
	}

	idToOffset(id: string): number | undefined {
		return idToOffset(this.registry, id);
	}

	count(): number {
		return this.registry.count();
	}

	colorsAt(index: number): ColorSequence | undefined {
		return this.registry.colorsAt(index);
	}

	list(): PaletteEntry[] {
		return this.registry.list();
	}

	ensureAuthority(): MigrationReport | undefined {
		return this.authority.ensureAuthority();
	}

	handlesPalettes(): boolean {
		return this.authority.isAuthoritative();
	}
}

// ============================================================================
// Process scope
// ============================================================================

/**
 * Registry of library instances shared by every copy in the process.
 */
export interface ProcessScope {
	readonly instances: Map<string, LibraryInstance>;
}

export function createProcessScope(): ProcessScope {
	return { instances: new Map<string, LibraryInstance>() };
}

const SCOPE_KEY = Symbol.for("mech-palettes.process-scope");

function isProcessScope(value: unknown): value is ProcessScope {
	return typeof value === "object" && value !== null && "instances" in value && value.instances instanceof Map;
}

/**
 * The scope stored on globalThis, created on first use.
 */
export function getDefaultScope(): ProcessScope {
	const existing: unknown = Reflect.get(globalThis, SCOPE_KEY);
	if (isProcessScope(existing)) {
		return existing;
	}
	const scope = createProcessScope();
	Reflect.set(globalThis, SCOPE_KEY, scope);
	return scope;
}

/**
 * Offer a candidate version for `key`. The current instance is kept when its
 * version is the same or newer; otherwise `build` creates the replacement
 * from the instance it supersedes.
 */
export function offerInstance(
	scope: ProcessScope,
	key: string,
	version: string,
	build: (previous: LibraryInstance | undefined) => LibraryInstance,
): LibraryInstance {
	const current = scope.instances.get(key);
	if (current !== undefined && isAtLeast(current.version, version)) {
		return current;
	}
	const instance = build(current);
	scope.instances.set(key, instance);
	return instance;
}

/**
 * What a library copy holds: forwards every call to the scope's current instance.
 */
export class PaletteLibraryHandle implements PaletteApi {
	constructor(
		private readonly scope: ProcessScope,
		private readonly key: string,
		/** Version of the copy that created this handle */
		readonly loadedVersion: string,
	) {}

	private get target(): LibraryInstance {
		const instance = this.scope.instances.get(this.key);
		if (instance === undefined) {
			throw new Error(`No palette library instance registered under "${this.key}"`);
		}
		return instance;
	}

	/** Version of the instance that actually serves calls */
	get version(): string {
		return this.target.version;
	}

	register(id: string, name: string | null, colors: PaletteColorsInput): boolean {
		return this.target.register(id, name, colors);
	}

	registerMany(definitions: readonly PaletteDefinitionInput[]): number {
		return this.target.registerMany(definitions);
	}

	get(id: string): PaletteEntry | undefined {
		return this.target.get(id);
	}

	getName(id: string): string | undefined {
		return this.target.getName(id);
	}

	indexOf(id: string): number | undefined {
		return this.target.indexOf(id);
	}

	idAt(index: number): string | undefined {
		return this.target.idAt(index);
	}

	offsetToId(offset: number): string | undefined {
		return this.target.offsetToId(offset);
	}

	idToOffset(id: string): number | undefined {
		return this.target.idToOffset(id);
	}

	count(): number {
		return this.target.count();
	}

	colorsAt(index: number): ColorSequence | undefined {
		return this.target.colorsAt(index);
	}

	list(): PaletteEntry[] {
		return this.target.list();
	}

	ensureAuthority(): MigrationReport | undefined {
		return this.target.ensureAuthority();
	}

	handlesPalettes(): boolean {
		return this.target.handlesPalettes();
	}
}

export interface LoadPaletteLibraryOptions {
	version: string;
	host: PaletteHost;
	config?: LibraryConfigInput;
	/** Defaults to the scope stored on globalThis */
	scope?: ProcessScope;
}

/**
 * Load one copy of the library: arbitrate against the instance already in the
 * scope, then make sure the winner holds the host accessors.
 */
export function loadPaletteLibrary(options: LoadPaletteLibraryOptions): PaletteLibraryHandle {
	const scope = options.scope ?? getDefaultScope();
	const config = resolveLibraryConfig(options.config);
	const instance = offerInstance(scope, config.libraryKey, options.version, (previous) =>
		new PaletteLibrary({
			version: options.version,
			host: options.host,
			config,
			storage: previous?.data,
		}),
	);
	instance.ensureAuthority();
	return new PaletteLibraryHandle(scope, config.libraryKey, options.version);
}
