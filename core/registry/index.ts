/**
 * Registry module - insert-only, densely indexed registry base.
 *
 * Provides BaseRegistry class and error types for consistent
 * registration, slot lookup, and migration replay.
 */

export {
	BaseRegistry,
	RegistryNotFoundError,
	RegistryConflictError,
	RegistryIndexError,
	createRegistryStorage,
	type RegistryOptions,
	type RegistryStorage,
} from "./base-registry.ts";
