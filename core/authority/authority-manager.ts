/**
 * Authority Manager - makes a palette registry the host's source of truth.
 *
 * Ownership is never stored as a flag: the registry owns the host exactly when
 * both accessor slots hold its token's functions. Any other code that rewrites
 * the slots revokes ownership until the next ensureAuthority() call, which
 * first copies over whatever palettes the current owner has that we lack.
 */

import type { PaletteRegistry } from "../palette/palette-registry.ts";
import { isColorSequence } from "../palette/colors.ts";
import {
	holdsAuthority,
	installAuthority,
	type AuthorityToken,
	type PaletteHost,
} from "./host.ts";
import { createMigrationNaming } from "./name-resolvers.ts";

/**
 * Outcome of a takeover.
 */
export interface MigrationReport {
	/** Palettes copied from the previous owner */
	migrated: number;
	/** Count the previous owner reported */
	hostCount: number;
	/** Index at which migration stopped early, if it did */
	gapAt?: number;
}

/**
 * Token whose accessors read straight from the registry.
 */
export function createAuthorityToken(registry: PaletteRegistry): AuthorityToken {
	return {
		colorCount: () => registry.count(),
		colorAt: (index) => registry.colorsAt(index),
	};
}

export class AuthorityManager {
	readonly token: AuthorityToken;

	constructor(
		private readonly host: PaletteHost,
		private readonly registry: PaletteRegistry,
		token?: AuthorityToken,
	) {
		this.token = token ?? createAuthorityToken(registry);
	}

	/**
	 * Whether the host's accessors are currently ours.
	 */
	isAuthoritative(): boolean {
		return holdsAuthority(this.host, this.token);
	}

	/**
	 * Take over the host accessors, migrating missing palettes first.
	 *
	 * @returns undefined if we already held authority, otherwise what was migrated
	 */
	ensureAuthority(): MigrationReport | undefined {
		if (this.isAuthoritative()) {
			return undefined;
		}
		const report = this.migrate();
		installAuthority(this.host, this.token);
		return report;
	}

	/**
	 * Copy palettes N+1..hostCount from the current accessors, in index order.
	 * Stops at the first index without usable colors or without a free id.
	 */
	private migrate(): MigrationReport {
		const hostCount = this.host.colorCount();
		const start = this.registry.count() + 1;
		const report: MigrationReport = { migrated: 0, hostCount };
		if (hostCount < start) {
			return report;
		}

		const naming = createMigrationNaming(this.host.foreignOffsets);
		for (let index = start; index <= hostCount; index++) {
			const colors = this.host.colorAt(index);
			if (!isColorSequence(colors)) {
				console.warn(
					`[palettes] Host reports ${hostCount} palettes but has no valid colors at index ${index}; migrated ${report.migrated}`,
				);
				report.gapAt = index;
				break;
			}

			const id = naming.idCandidates(index).find((candidate) => !this.registry.has(candidate));
			if (id === undefined) {
				console.warn(`[palettes] No free id for palette at index ${index}; migrated ${report.migrated}`);
				report.gapAt = index;
				break;
			}

			this.registry.registerAt(id, index, naming.nameFor(index, id), colors);
			report.migrated++;
		}

		if (report.migrated > 0) {
			console.info(`[palettes] Migrated ${report.migrated} palette(s) from the previous color accessors`);
		}
		return report;
	}
}
