/**
 * Tests for InMemoryEventStore.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@vigil/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

let counter = 0;

function makeEvent(type: string): DomainEvent {
  counter++;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: `corr-${counter}`,
      source: "escrow",
    },
    payload: { n: counter },
  };
}

function fixedClockStore(): InMemoryEventStore {
  return new InMemoryEventStore({ clock: () => "2026-01-01T00:00:00.000Z" });
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = fixedClockStore();
    const result = store.append("plan:alice", [makeEvent("a")]);

    expect(result).toEqual({
      streamId: "plan:alice",
      fromVersion: 1,
      toVersion: 1,
      count: 1,
    });
  });

  it("assigns contiguous versions and global positions across streams", () => {
    const store = fixedClockStore();
    store.append("plan:alice", [makeEvent("a"), makeEvent("b")]);
    store.append("plan:bob", [makeEvent("c")]);
    const third = store.append("plan:alice", [makeEvent("d")]);

    expect(third.fromVersion).toBe(3);
    expect(store.globalPosition()).toBe(4);
    expect(store.readAll().map((e) => e.globalPosition)).toEqual([1, 2, 3, 4]);
  });

  it("uses the injected clock for appendedAt", () => {
    const store = fixedClockStore();
    store.append("s", [makeEvent("a")]);
    expect(store.read("s")[0]?.appendedAt).toBe("2026-01-01T00:00:00.000Z");
  });

  it("rejects an empty append", () => {
    const store = fixedClockStore();
    expect(() => store.append("s", [])).toThrow(EventStoreError);
  });

  it("rejects an empty stream ID", () => {
    const store = fixedClockStore();
    expect(() => store.append("", [makeEvent("a")])).toThrow(/non-empty/);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("expected version", () => {
  it("accepts no_stream for a new stream and rejects it afterwards", () => {
    const store = fixedClockStore();
    store.append("s", [makeEvent("a")], { expectedVersion: "no_stream" });

    expect(() =>
      store.append("s", [makeEvent("b")], { expectedVersion: "no_stream" }),
    ).toThrow(/expected no_stream/);
  });

  it("rejects a stale numeric version", () => {
    const store = fixedClockStore();
    store.append("s", [makeEvent("a")]);

    try {
      store.append("s", [makeEvent("b")], { expectedVersion: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      expect((err as EventStoreError).code).toBe("CONCURRENCY_CONFLICT");
    }
  });

  it("accepts the current numeric version", () => {
    const store = fixedClockStore();
    store.append("s", [makeEvent("a")]);
    const result = store.append("s", [makeEvent("b")], { expectedVersion: 1 });
    expect(result.toVersion).toBe(2);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns [] for an unknown stream", () => {
    expect(fixedClockStore().read("missing")).toEqual([]);
  });

  it("reads forward from a version with a limit", () => {
    const store = fixedClockStore();
    store.append("s", [makeEvent("a"), makeEvent("b"), makeEvent("c")]);

    const events = store.read("s", { fromVersion: 2, maxCount: 1 });
    expect(events.map((e) => e.event.type)).toEqual(["b"]);
  });

  it("reads backward", () => {
    const store = fixedClockStore();
    store.append("s", [makeEvent("a"), makeEvent("b"), makeEvent("c")]);

    const events = store.read("s", { fromVersion: 2, direction: "backward" });
    expect(events.map((e) => e.event.type)).toEqual(["b", "a"]);
  });

  it("rejects fromVersion below 1", () => {
    const store = fixedClockStore();
    store.append("s", [makeEvent("a")]);
    expect(() => store.read("s", { fromVersion: 0 })).toThrow(EventStoreError);
  });

  it("reads all streams from a global position", () => {
    const store = fixedClockStore();
    store.append("x", [makeEvent("a")]);
    store.append("y", [makeEvent("b")]);

    expect(store.readAll({ fromPosition: 2 }).map((e) => e.streamId)).toEqual(["y"]);
  });
});

// =============================================================================
// Query & integrity
// =============================================================================

describe("query", () => {
  it("reports stream existence and version", () => {
    const store = fixedClockStore();
    expect(store.streamExists("x")).toBe(false);
    expect(store.streamVersion("x")).toBe(0);

    store.append("x", [makeEvent("a"), makeEvent("b")]);
    expect(store.streamExists("x")).toBe(true);
    expect(store.streamVersion("x")).toBe(2);
  });

  it("keeps a valid hash chain across appends", () => {
    const store = fixedClockStore();
    store.append("x", [makeEvent("a")]);
    store.append("y", [makeEvent("b"), makeEvent("c")]);

    const result = store.verifyIntegrity();
    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(3);
  });
});
