/**
 * Event Types
 *
 * Append-only event architecture.
 * Every successful state change in the escrow is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Rejected operations produce no events
 */

/**
 * Subsystems that emit events.
 */
export type EventSource = "escrow" | "custody";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events across systems */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "escrow.plan.created") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
