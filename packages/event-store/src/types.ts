/**
 * @vigil/event-store: Core types.
 *
 * Interfaces for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Concurrency control via expected version (optimistic locking)
 * - Every stored event is linked into a SHA-256 hash chain
 */

import type { DomainEvent, EventMetadata } from "@vigil/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A stored event carrying its hash-chain link.
 */
export interface HashedStoredEvent<TPayload = Record<string, unknown>>
  extends StoredEvent<TPayload> {
  readonly hash: string;
  readonly previousHash: string;
}

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist (first write)
 * - "any": no concurrency check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose link verified */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions are monotonically increasing with no gaps
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[];

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[];

  streamExists(streamId: string): boolean;

  /** Current version of a stream, or 0 if it doesn't exist */
  streamVersion(streamId: string): number;

  /** Current global position, or 0 if the store is empty */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

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
