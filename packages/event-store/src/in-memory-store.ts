/**
 * @quorumgate/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Wallets keep their notification
 * history here for the lifetime of the process.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch
 * - No durability guarantees
 */

import type {
  AppendResult,
  EventBody,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  SubscriberErrorHandler,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

/**
 * Options for an in-memory store.
 */
export interface InMemoryEventStoreOptions<E extends EventBody> {
  /**
   * Called when a subscriber throws. Without it the error propagates
   * to the caller of `append()` after the events are stored.
   */
  readonly onSubscriberError?: SubscriberErrorHandler<E>;

  /** Clock for `appendedAt`. Default: current time as ISO 8601 */
  readonly now?: () => string;
}

/**
 * In-memory event store.
 *
 * All events are stored in two data structures:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - Global array for readAll and global subscriptions
 *
 * Subscriptions are dispatched synchronously on append.
 */
export class InMemoryEventStore<E extends EventBody = EventBody>
  implements EventStore<E>
{
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent<E>[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent<E>[] = [];

  /** Per-stream subscribers */
  private readonly _streamSubscribers = new Map<string, Set<EventHandler<E>>>();

  /** Global subscribers (all streams) */
  private readonly _globalSubscribers = new Set<EventHandler<E>>();

  /** Next global position to assign */
  private _nextGlobalPosition = 1;

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  private readonly _onSubscriberError: SubscriberErrorHandler<E> | undefined;
  private readonly _now: () => string;

  constructor(options: InMemoryEventStoreOptions<E> = {}) {
    this._onSubscriberError = options.onSubscriberError;
    this._now = options.now ?? (() => new Date().toISOString());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly E[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const fromVersion = stream.length + 1;
    const storedEvents: StoredEvent<E>[] = [];
    const appendedAt = this._now();

    events.forEach((event, i) => {
      const base = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition++,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const stored: StoredEvent<E> = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = stored.hash;

      stream.push(stored);
      this._globalLog.push(stored);
      storedEvents.push(stored);
    });

    this._dispatch(streamId, storedEvents);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent<E>[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result = stream.filter((e) => e.version >= fromVersion);
    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent<E>[] {
    const fromPosition = options?.fromPosition ?? 1;
    const result = this._globalLog.filter(
      (e) => e.globalPosition >= fromPosition,
    );
    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler<E>): Subscription {
    this._validateStreamId(streamId);

    const subscribers = this._streamSubscribers.get(streamId) ?? new Set<EventHandler<E>>();
    this._streamSubscribers.set(streamId, subscribers);
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler<E>): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent<E>[]): void {
    // Snapshot the handler sets so (un)subscribing during dispatch is safe
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];

    for (const event of events) {
      for (const handler of handlers) {
        this._deliver(handler, event);
      }
    }
  }

  private _deliver(handler: EventHandler<E>, event: StoredEvent<E>): void {
    if (this._onSubscriberError === undefined) {
      handler(event);
      return;
    }
    try {
      handler(event);
    } catch (error: unknown) {
      this._onSubscriberError(error, event);
    }
  }
}

function limit<T>(items: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? items.slice(0, maxCount) : items;
}
