/**
 * @quorumgate/registry — Immutable owner set and quorum threshold.
 */

export { OwnerRegistry } from "./registry.js";

export type {
  OwnerRegistryOptions,
  RegistryErrorCode,
  RegistryErrorDetails,
} from "./types.js";

export { RegistryError } from "./types.js";
