/**
 * @vigil/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. All state is lost on process exit;
 * durable persistence is the embedding application's concern.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 */

import type { DomainEvent } from "@vigil/types";
import type {
  AppendOptions,
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Store-level clock for `appendedAt`. Default: wall clock. */
  readonly clock?: () => string;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, HashedStoredEvent[]>();
  private readonly _globalLog: HashedStoredEvent[] = [];
  private readonly _clock: () => string;

  private _nextGlobalPosition = 1;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._clock = options?.clock ?? (() => new Date().toISOString());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    const currentVersion = stream.length;

    const expectedVersion = options?.expectedVersion;
    if (expectedVersion === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expectedVersion === "number" && currentVersion !== expectedVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expectedVersion}`,
        streamId,
      );
    }

    this._streams.set(streamId, stream);

    const fromVersion = currentVersion + 1;
    const appendedAt = this._clock();

    events.forEach((event, i) => {
      const base: StoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition++,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const hashed: HashedStoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = hashed.hash;

      stream.push(hashed);
      this._globalLog.push(hashed);
    });

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
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

    const result =
      (options?.direction ?? "forward") === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result =
      (options?.direction ?? "forward") === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }
}

function limit<T>(items: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? items.slice(0, maxCount) : items;
}
