/**
 * @quorumgate/registry — Owner registry.
 *
 * The fixed set of principals allowed to propose, approve and execute
 * transfers, plus the quorum threshold.
 *
 * Rules:
 * - Established once at construction, never mutated afterward
 * - No duplicate owners, no null principal
 * - 1 <= requiredApprovals <= owner count
 * - Insertion order is preserved for enumeration
 */

import type { Address } from "@quorumgate/types";
import { isZeroAddress } from "@quorumgate/types";
import type { OwnerRegistryOptions } from "./types.js";
import { RegistryError } from "./types.js";

/**
 * Immutable registry of owners.
 */
export class OwnerRegistry {
  private readonly _owners: readonly Address[];
  private readonly _ownerSet: ReadonlySet<Address>;
  private readonly _requiredApprovals: number;

  /**
   * Validation order (first failure wins):
   * 1. owners must not be empty
   * 2. requiredApprovals must be an integer in [1, owners.length]
   * 3. each entry, in input order, must be non-null and not repeat an earlier one
   *
   * @throws RegistryError
   */
  constructor(
    owners: readonly Address[],
    requiredApprovals: number,
    options: OwnerRegistryOptions = {},
  ) {
    if (owners.length === 0) {
      throw new RegistryError("NO_OWNERS", {}, "Owners required");
    }

    if (
      !Number.isInteger(requiredApprovals) ||
      requiredApprovals < 1 ||
      requiredApprovals > owners.length
    ) {
      throw new RegistryError(
        "INVALID_REQUIRED_APPROVALS",
        { requiredApprovals, ownerCount: owners.length },
        `Invalid number of required approvals: ${requiredApprovals} (owners: ${owners.length})`,
      );
    }

    const accepted = new Set<Address>();
    owners.forEach((owner, index) => {
      if (isZeroAddress(owner)) {
        throw new RegistryError(
          "ZERO_ADDRESS_OWNER",
          { index },
          `Owner at index ${index} is the null principal`,
        );
      }
      if (accepted.has(owner)) {
        throw new RegistryError(
          "OWNER_ALREADY_EXISTS",
          { owner, index },
          `Owner already exists: "${owner}"`,
        );
      }
      accepted.add(owner);
    });

    this._owners = Object.freeze([...owners]);
    this._ownerSet = accepted;
    this._requiredApprovals = requiredApprovals;

    if (options.onOwnerAdded !== undefined) {
      for (const owner of this._owners) {
        options.onOwnerAdded(owner);
      }
    }
  }

  /**
   * Whether the principal is an owner. O(1).
   */
  isOwner(principal: Address): boolean {
    return this._ownerSet.has(principal);
  }

  /**
   * All owners in insertion order.
   */
  listOwners(): Address[] {
    return [...this._owners];
  }

  get requiredApprovals(): number {
    return this._requiredApprovals;
  }

  get ownerCount(): number {
    return this._owners.length;
  }
}
