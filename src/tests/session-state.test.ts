import { describe, it, expect, vi } from "vitest";
import { CancellationCoordinator } from "../acp/cancellation.js";
import { generateSessionId, InMemorySessionTable, parseSessionId, SessionNotFoundError } from "../acp/session-table.js";
import { KeyedLock } from "../utils/keyed-lock.js";
import { configurePerf, perfScope, perfStart } from "../utils/perf.js";
import { createMockLogger } from "./fakes.js";

// ---------------------------------------------------------------------------
// Session ids
// ---------------------------------------------------------------------------

describe("session ids", () => {
  it("round-trips through the canonical lowercase form", () => {
    const id = generateSessionId();
    expect(parseSessionId(id)).toBe(id);
    expect(parseSessionId(id.toUpperCase())).toBe(id);
  });

  it("sorts by creation time", () => {
    const ids = Array.from({ length: 5 }, () => generateSessionId());
    expect([...ids].sort()).toEqual(ids);
  });

  it("rejects strings that are not UUIDs", () => {
    expect(parseSessionId("")).toBeNull();
    expect(parseSessionId("session-1")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// InMemorySessionTable
// ---------------------------------------------------------------------------

describe("InMemorySessionTable", () => {
  it("creates sessions with zeroed counters", () => {
    const table = new InMemorySessionTable();
    const session = table.create("/work", { terminal: true });

    expect(session).toMatchObject({
      cwd: "/work",
      clientCapabilities: { terminal: true },
      history: [],
      turnRequestCount: 0,
      turnTokenCount: 0,
      mcpServers: [],
    });
    expect(table.list()).toEqual([session.id]);
  });

  it("hands out snapshots", () => {
    const table = new InMemorySessionTable();
    const { id } = table.create("/work", {});
    const snapshot = table.get(id);
    snapshot?.history.push({ update: { sessionUpdate: "current_mode_update", currentModeId: "x" }, timestamp: new Date() });
    expect(table.get(id)?.history).toEqual([]);
  });

  it("applies mutators and returns their result", async () => {
    const table = new InMemorySessionTable();
    const { id } = table.create("/work", {});
    const count = await table.update(id, (s) => ++s.turnRequestCount);
    expect(count).toBe(1);
    expect(table.get(id)?.turnRequestCount).toBe(1);
  });

  it("serializes updates to the same session", async () => {
    const table = new InMemorySessionTable();
    const { id } = table.create("/work", {});
    const seen: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        table.update(id, async (s) => {
          const before = s.turnTokenCount;
          await new Promise((r) => setTimeout(r, 5 - n));
          s.turnTokenCount = before + n;
          seen.push(n);
        }),
      ),
    );

    expect(seen).toEqual([1, 2, 3]);
    expect(table.get(id)?.turnTokenCount).toBe(6);
  });

  it("rejects updates to unknown sessions", async () => {
    const table = new InMemorySessionTable();
    await expect(table.update("missing", () => undefined)).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("deletes sessions", () => {
    const table = new InMemorySessionTable();
    const { id } = table.create("/work", {});
    expect(table.delete(id)).toBe(true);
    expect(table.get(id)).toBeUndefined();
    expect(table.delete(id)).toBe(false);
  });
});

describe("KeyedLock", () => {
  it("forgets keys once their work is done", async () => {
    const lock = new KeyedLock();
    const pending = lock.run("a", async () => "done");
    expect(lock.size).toBe(1);
    await expect(pending).resolves.toBe("done");
    expect(lock.size).toBe(0);
  });

  it("keeps going after a failed task", async () => {
    const lock = new KeyedLock();
    const failed = lock.run("a", () => {
      throw new Error("boom");
    });
    const next = lock.run("a", () => 2);
    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe(2);
  });
});

describe("perf spans", () => {
  it("stay silent until enabled", () => {
    const logger = createMockLogger();
    configurePerf(logger, false);
    expect(perfStart("op").end()).toBe(0);
    perfScope("scope").summary();
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("report through the configured logger", () => {
    const logger = createMockLogger();
    configurePerf(logger, true);
    try {
      perfStart("backend.next").end({ chunk: 1 });
      const scope = perfScope("prompt");
      scope.start("step").end();
      scope.summary();
    } finally {
      configurePerf(logger, false);
    }

    expect(logger.info).toHaveBeenNthCalledWith(
      1,
      { perf: { op: "backend.next", ms: expect.any(Number), chunk: 1 } },
      "perf",
    );
    expect(logger.info).toHaveBeenLastCalledWith(
      {
        perf_summary: {
          scope: "prompt",
          total_ms: expect.any(Number),
          ops: { step: { n: 1, total_ms: expect.any(Number), max_ms: expect.any(Number) } },
        },
      },
      "perf",
    );
  });
});

// ---------------------------------------------------------------------------
// CancellationCoordinator
// ---------------------------------------------------------------------------

describe("CancellationCoordinator", () => {
  it("starts uncancelled", () => {
    const coordinator = new CancellationCoordinator(createMockLogger());
    expect(coordinator.isCancelled("s1")).toBe(false);
    expect(coordinator.getState("s1")).toEqual({ cancelled: false, reason: "", cancelledOperations: new Set() });
  });

  it("marks and pushes to subscribers", () => {
    const coordinator = new CancellationCoordinator(createMockLogger());
    const listener = vi.fn();
    coordinator.subscribe(listener);

    expect(coordinator.markCancelled("s1", "user")).toBe(true);

    expect(coordinator.isCancelled("s1")).toBe(true);
    expect(listener).toHaveBeenCalledWith({ type: "cancelled", sessionId: "s1", reason: "user", at: expect.any(Date) });
  });

  it("still sets the flag with nobody listening", () => {
    const logger = createMockLogger();
    const coordinator = new CancellationCoordinator(logger);
    expect(coordinator.markCancelled("s1", "user")).toBe(false);
    expect(coordinator.isCancelled("s1")).toBe(true);
    expect(logger.debug).toHaveBeenCalledWith({ sessionId: "s1" }, "no cancellation subscribers");
  });

  it("tracks cancelled operations and clears them on a new turn", () => {
    const coordinator = new CancellationCoordinator(createMockLogger());
    coordinator.markCancelled("s1", "user");
    coordinator.addCancelledOperation("s1", "tool_executions");
    expect(coordinator.isOperationCancelled("s1", "tool_executions")).toBe(true);

    coordinator.resetForNewTurn("s1");

    expect(coordinator.isCancelled("s1")).toBe(false);
    expect(coordinator.isOperationCancelled("s1", "tool_executions")).toBe(false);
  });

  it("keeps sessions apart", () => {
    const coordinator = new CancellationCoordinator(createMockLogger());
    coordinator.markCancelled("s1", "user");
    expect(coordinator.isCancelled("s2")).toBe(false);
  });

  it("wakes waiters for the cancelled session only", async () => {
    const coordinator = new CancellationCoordinator(createMockLogger());
    let woke = false;
    const waiting = coordinator.waitForCancellation("s1").then(() => {
      woke = true;
    });

    coordinator.markCancelled("s2", "other");
    await Promise.resolve();
    expect(woke).toBe(false);

    coordinator.markCancelled("s1", "user");
    await waiting;
    expect(woke).toBe(true);
  });

  it("resolves at once when already cancelled", async () => {
    const coordinator = new CancellationCoordinator(createMockLogger());
    coordinator.markCancelled("s1", "user");
    await expect(coordinator.waitForCancellation("s1")).resolves.toBeUndefined();
  });
});
