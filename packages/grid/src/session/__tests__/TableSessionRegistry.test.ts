import { describe, expect, it } from "vitest";
import { InvariantViolationError, SessionStateError } from "../../errors";
import { captureLogger } from "../../__tests__/helpers";
import { TableSessionRegistry, type TableSessionChange } from "../TableSessionRegistry";

describe("TableSessionRegistry", () => {
  it("starts uninitialized", () => {
    const registry = new TableSessionRegistry();
    expect(registry.getState()).toEqual({ status: "uninitialized" });
    expect(registry.getActiveSession()).toBeNull();
    expect(registry.currentGeneration).toBe(-1);
    expect(registry.isCurrent(0)).toBe(false);
  });

  it("creates generation 0 and bumps on every replacement", () => {
    const registry = new TableSessionRegistry();
    const first = registry.createSession({ tableId: "sales", totalRows: 1000 });
    expect(first).toEqual({ id: "sales", generation: 0, totalRows: 1000 });
    expect(registry.getState()).toEqual({ status: "active", session: first });

    const sorted = registry.replaceSession({ totalRows: 1000 });
    expect(sorted).toEqual({ id: "sales", generation: 1, totalRows: 1000 });

    const filtered = registry.replaceSession({ tableId: "sales_view_1", totalRows: 12 });
    expect(filtered).toEqual({ id: "sales_view_1", generation: 2, totalRows: 12 });

    expect(registry.isCurrent(2)).toBe(true);
    expect(registry.isCurrent(1)).toBe(false);
  });

  it("never mutates a replaced session", () => {
    const registry = new TableSessionRegistry();
    const first = registry.createSession({ tableId: "sales", totalRows: 1000 });
    registry.replaceSession({ totalRows: 5 });

    expect(first).toEqual({ id: "sales", generation: 0, totalRows: 1000 });
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("continues the global counter when a new table is imported", () => {
    const registry = new TableSessionRegistry();
    registry.createSession({ tableId: "a", totalRows: 1 });
    registry.replaceSession({ totalRows: 1 });
    const imported = registry.createSession({ tableId: "b", totalRows: 7 });
    expect(imported.generation).toBe(2);
  });

  it("strictly increases the generation across any sequence of identity changes", () => {
    const registry = new TableSessionRegistry();
    const seen = new Set<number>();
    let previous = registry.createSession({ tableId: "t0", totalRows: 10 }).generation;
    seen.add(previous);

    for (let i = 1; i <= 50; i++) {
      const session =
        i % 7 === 0
          ? registry.createSession({ tableId: `t${i}`, totalRows: i })
          : registry.replaceSession({ totalRows: i * 3 });
      expect(session.generation).toBeGreaterThan(previous);
      expect(seen.has(session.generation)).toBe(false);
      seen.add(session.generation);
      previous = session.generation;
    }
  });

  it("updates the row count without bumping the generation", () => {
    const registry = new TableSessionRegistry();
    const first = registry.createSession({ tableId: "sales", totalRows: 100 });
    const updated = registry.updateTotalRows(250);

    expect(updated).not.toBe(first);
    expect(updated).toEqual({ id: "sales", generation: 0, totalRows: 250 });
    expect(registry.isCurrent(first.generation)).toBe(true);
    expect(first.totalRows).toBe(100);
  });

  it("returns the same session when the row count did not change", () => {
    const registry = new TableSessionRegistry();
    const events: TableSessionChange[] = [];
    registry.subscribe((change) => events.push(change));

    const first = registry.createSession({ tableId: "sales", totalRows: 100 });
    expect(registry.updateTotalRows(100)).toBe(first);
    expect(events.map((e) => e.type)).toEqual(["created"]);
  });

  it("notifies subscribers with the previous session", () => {
    const registry = new TableSessionRegistry();
    const events: TableSessionChange[] = [];
    const unsubscribe = registry.subscribe((change) => events.push(change));

    const first = registry.createSession({ tableId: "sales", totalRows: 100 });
    const second = registry.replaceSession({ totalRows: 90 });
    const third = registry.updateTotalRows(95);
    unsubscribe();
    registry.replaceSession({ totalRows: 1 });

    expect(events).toEqual([
      { type: "created", session: first, previous: null },
      { type: "replaced", session: second, previous: first },
      { type: "rowCount", session: third, previous: second }
    ]);
  });

  it("refuses to replace or update before a session exists", () => {
    const registry = new TableSessionRegistry();
    expect(() => registry.replaceSession({ totalRows: 1 })).toThrow(SessionStateError);
    expect(() => registry.updateTotalRows(1)).toThrow(
      "Cannot update row count before a table session has been created"
    );
  });

  it("fails fast on negative row counts in strict mode without consuming a generation", () => {
    const registry = new TableSessionRegistry({ strictInvariants: true });
    registry.createSession({ tableId: "sales", totalRows: 10 });

    expect(() => registry.replaceSession({ totalRows: -1 })).toThrow(InvariantViolationError);
    expect(registry.currentGeneration).toBe(0);
    expect(registry.replaceSession({ totalRows: 3 }).generation).toBe(1);
  });

  it("clamps negative row counts outside strict mode", () => {
    const { logger, lines } = captureLogger("warn");
    const registry = new TableSessionRegistry({ strictInvariants: false, logger });

    const session = registry.createSession({ tableId: "sales", totalRows: -20 });
    expect(session.totalRows).toBe(0);
    expect(lines).toHaveLength(1);
    expect(lines[0]?.msg).toBe("totalRows must be a non-negative safe integer, got -20");
  });
});
