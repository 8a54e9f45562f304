/**
 * Authority module - host boundary, version arbitration helpers and takeover.
 */

export * from "./host.ts";
export * from "./name-resolvers.ts";
export * from "./version.ts";
export * from "./authority-manager.ts";
