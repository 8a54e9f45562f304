/**
 * Keeps render descriptors in step with the palette count.
 *
 * A sprite under the palette path is sliced into one vertical frame per
 * palette, so adding palettes means growing the frame height of every such
 * descriptor. Only heights in [previous count, new count) are rewritten:
 * other heights belong to sprites sliced for some unrelated frame count.
 */

import type { DependentDescriptor, DescriptorTable } from "../authority/host.ts";

export interface DescriptorSyncOptions {
	/** Sprite path prefix of palette-bearing descriptors */
	palettePath: string;
	/** Keys of descriptors that bear palettes whatever their sprite path */
	baseDescriptors: readonly string[];
}

export function usesPalettes(
	key: string,
	descriptor: DependentDescriptor,
	options: DescriptorSyncOptions,
): boolean {
	return options.baseDescriptors.includes(key) || descriptor.spritePath.startsWith(options.palettePath);
}

/**
 * Grow palette-bearing descriptors after `added` palettes brought the total to `count`.
 *
 * @returns keys of the descriptors that were updated, in table order
 */
export function syncAfterGrowth(
	added: number,
	count: number,
	descriptors: DescriptorTable,
	options: DescriptorSyncOptions,
): string[] {
	if (added <= 0) {
		return [];
	}
	const threshold = count - added;
	const updated: string[] = [];
	for (const [key, descriptor] of Object.entries(descriptors)) {
		const height = descriptor.frameHeight;
		if (height === undefined || height < threshold || height >= count) {
			continue;
		}
		if (usesPalettes(key, descriptor, options)) {
			descriptor.frameHeight = count;
			updated.push(key);
		}
	}
	return updated;
}
