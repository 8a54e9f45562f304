/**
 * Core module exports for mech-palettes.
 */

export * from "./config.ts";
export * from "./registry/index.ts";
export * from "./palette/index.ts";
export * from "./authority/index.ts";
export * from "./dependents/descriptor-sync.ts";
export * from "./library.ts";
export * from "./pack-loader.ts";
