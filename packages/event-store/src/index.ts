/**
 * @quorumgate/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with hash-chained records and synchronous subscriptions
 *
 * @packageDocumentation
 */

// Core types
export type {
  EventBody,
  StoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  SubscriberErrorHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { UnhashedEvent } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";
