/**
 * Principal Types
 *
 * Principals (owners, recipients, depositors, pool accounts) are identified
 * by plain string addresses and compared by exact string equality.
 *
 * Rules:
 * - The null principal is the empty string or "0x" followed only by zeros
 * - No normalization: "0xAbc" and "0xabc" are different principals
 */

/**
 * Identifier of a principal.
 */
export type Address = string;

/**
 * Canonical null principal.
 */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

const ZERO_PATTERN = /^0x0+$/i;

/**
 * Whether the address is the null principal.
 */
export function isZeroAddress(address: Address): boolean {
  return address.length === 0 || ZERO_PATTERN.test(address);
}
