/**
 * Palette module - validation, registry core and offset view.
 */

export * from "./colors.ts";
export * from "./palette-registry.ts";
export * from "./offsets.ts";
