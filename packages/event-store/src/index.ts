/**
 * @vigil/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore
 * - EventCatalog for payload validation
 * - The escrow domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Escrow domain events
export { ESCROW_EVENTS, createEscrowCatalog } from "./escrow-events.js";
export type {
  EscrowEventType,
  EscrowEventPayloads,
  PlanCreatedPayload,
  ProofOfLifeSubmittedPayload,
  ClaimExecutedPayload,
  EmergencyActivatedPayload,
  EmergencyDeactivatedPayload,
  FundsAddedPayload,
  BeneficiariesUpdatedPayload,
} from "./escrow-events.js";
