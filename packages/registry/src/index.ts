/**
 * @concord/registry — Role-gated community item registry.
 *
 * @packageDocumentation
 */

export { RegistryEngine } from "./registry.js";
export type { RegistryItem } from "./types.js";
