/**
 * @vigil/event-store: Event Catalog.
 *
 * Registry of known domain event types:
 * - Typed event definitions (type string → payload shape)
 * - Schema versions per event type
 * - Runtime payload validation
 *
 * Unknown event types never validate; the audit log only carries
 * registered types.
 */

import type { EventSource } from "@vigil/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "escrow.plan.created") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /** Returns true if the payload is valid for this version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op; a different version
   * replaces the current definition.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }

    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate a payload against its registered schema.
   *
   * @returns false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
