/**
 * @quorumgate/event-store — Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[0].hash = sha256(canonicalize(event[0]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventBody,
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Replace bigint values with decimal strings so JCS can serialize them.
 */
function toCanonicalValue(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toCanonicalValue);
  }
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toCanonicalValue(entry);
    }
    return result;
  }
  return value;
}

/**
 * The structural fields of a stored event, without its chain link.
 */
export type UnhashedEvent<E extends EventBody = EventBody> = Omit<
  StoredEvent<E>,
  "hash" | "previousHash"
>;

/**
 * Canonical content of a stored event for hashing.
 *
 * Wall-clock fields (appendedAt) are included because they are part
 * of the persisted record.
 */
function canonicalEventContent(event: UnhashedEvent): string {
  return canonicalize(
    toCanonicalValue({
      event: event.event,
      streamId: event.streamId,
      version: event.version,
      globalPosition: event.globalPosition,
      appendedAt: event.appendedAt,
    }),
  );
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * @param previousHash - Hash of the preceding event, or GENESIS_HASH for position 1
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  event: UnhashedEvent,
  previousHash: string,
): string {
  const content = canonicalEventContent(event);
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify the hash chain of a sequence of events in global position order.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }
    previousHash = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
