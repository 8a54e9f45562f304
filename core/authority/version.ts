/**
 * Dotted numeric versions ("0.4", "1.2.10") used to arbitrate between
 * library copies loaded into the same process.
 */

import { z } from "zod";

export const VersionSchema = z
	.string()
	.regex(/^\d+(\.\d+)*$/, "Version must be dot-separated numbers, e.g. 0.4");

export function parseVersion(version: string): number[] {
	return VersionSchema.parse(version).split(".").map(Number);
}

/**
 * Compare two versions part by part; missing parts count as 0, so "1.0" equals "1".
 *
 * @returns negative if a < b, 0 if equal, positive if a > b
 */
export function compareVersions(a: string, b: string): number {
	const left = parseVersion(a);
	const right = parseVersion(b);
	const length = Math.max(left.length, right.length);
	for (let i = 0; i < length; i++) {
		const diff = (left[i] ?? 0) - (right[i] ?? 0);
		if (diff !== 0) {
			return diff;
		}
	}
	return 0;
}

/**
 * Whether `version` is the same as or newer than `minimum`.
 */
export function isAtLeast(version: string, minimum: string): boolean {
	return compareVersions(version, minimum) >= 0;
}
