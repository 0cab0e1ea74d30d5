/**
 * @quorumgate/event-store — Core types.
 *
 * Defines the interfaces and types for append-only notification persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every stored event is hash-linked to its global predecessor
 * - Subscriptions enable reactive consumers
 */

// =============================================================================
// Stored Event
// =============================================================================

/**
 * Minimal shape of anything the store accepts: a `type`-discriminated record.
 */
export interface EventBody {
  readonly type: string;
}

/**
 * An event as persisted in the store.
 *
 * Wraps the domain event with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 * - hash / previousHash: tamper-evident chain link
 */
export interface StoredEvent<E extends EventBody = EventBody> {
  /** The domain event */
  readonly event: E;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 of this record chained to `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event in global order, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * Result of an append operation.
 */
export interface AppendResult {
  /** Stream ID the events were appended to */
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  /** Number of events appended */
  readonly count: number;
}

// =============================================================================
// Read Options
// =============================================================================

/**
 * Options for reading events from a stream.
 */
export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;
}

/**
 * Options for reading events across all streams.
 */
export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback for event subscriptions.
 */
export type EventHandler<E extends EventBody = EventBody> = (
  event: StoredEvent<E>,
) => void;

/**
 * Receives errors thrown by subscribers during dispatch.
 */
export type SubscriberErrorHandler<E extends EventBody = EventBody> = (
  error: unknown,
  event: StoredEvent<E>,
) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  /** Unsubscribe from the stream */
  unsubscribe(): void;
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Subscriptions see events in order
 */
export interface EventStore<E extends EventBody = EventBody> {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if the stream ID is empty or no events are given
   */
  append(streamId: string, events: readonly E[]): AppendResult;

  /**
   * Read events from a single stream (empty if the stream doesn't exist).
   */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent<E>[];

  /**
   * Read events across all streams in global order.
   */
  readAll(options?: ReadAllOptions): readonly StoredEvent<E>[];

  /**
   * Subscribe to new events on a specific stream, delivered in version order.
   */
  subscribe(streamId: string, handler: EventHandler<E>): Subscription;

  /**
   * Subscribe to all new events, delivered in global position order.
   */
  subscribeAll(handler: EventHandler<E>): Subscription;

  /**
   * Current version of a stream, or 0 if it doesn't exist.
   */
  streamVersion(streamId: string): number;

  /**
   * Position of the last event, or 0 if the store is empty.
   */
  globalPosition(): number;

  /**
   * Verify the hash chain over every stored event.
   */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Integrity
// =============================================================================

/**
 * A single break in the hash chain.
 */
export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

/**
 * Result of verifying the hash chain.
 */
export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event that verified, or 0 */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for EventStore operations.
 */
export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
