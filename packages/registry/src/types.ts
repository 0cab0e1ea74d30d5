/**
 * @quorumgate/registry — Types for the owner registry.
 *
 * Rules:
 * - All types are readonly
 * - Construction is all-or-nothing: any invalid input throws and
 *   no registry (and no notification) exists afterward
 */

import type { Address } from "@quorumgate/types";

// ─── Options ─────────────────────────────────────────────────────────────

/**
 * Options for constructing an OwnerRegistry.
 */
export interface OwnerRegistryOptions {
  /**
   * Called once per owner, in input order, after the whole owner list
   * has been validated.
   */
  readonly onOwnerAdded?: (owner: Address) => void;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/**
 * Structured data carried by each registry error code.
 */
export interface RegistryErrorDetails {
  readonly NO_OWNERS: Readonly<Record<string, never>>;
  readonly INVALID_REQUIRED_APPROVALS: {
    readonly requiredApprovals: number;
    readonly ownerCount: number;
  };
  readonly ZERO_ADDRESS_OWNER: { readonly index: number };
  readonly OWNER_ALREADY_EXISTS: { readonly owner: Address; readonly index: number };
}

/** Error codes for registry construction. */
export type RegistryErrorCode = keyof RegistryErrorDetails;

/**
 * Structured error from registry construction.
 */
export class RegistryError<
  C extends RegistryErrorCode = RegistryErrorCode,
> extends Error {
  public readonly code: C;
  public readonly details: RegistryErrorDetails[C];

  constructor(code: C, details: RegistryErrorDetails[C], message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.details = details;
  }
}
