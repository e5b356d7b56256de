import { describe, expect, it } from "vitest";
import { RowWindowController } from "../../controller/RowWindowController";
import { silentLogger } from "../../__tests__/helpers";
import { MockTableProvider, type MockRow } from "../MockTableProvider";
import type { RenderSink, RowBatch } from "../TableProvider";

describe("MockTableProvider", () => {
  it("generates deterministic values", () => {
    expect(MockTableProvider.cellValue(0, 0)).toBe(1);
    expect(MockTableProvider.cellValue(4, 1)).toBe("Row 5");
    expect(MockTableProvider.cellValue(3, 2)).toBe(false);
    expect(MockTableProvider.cellValue(14, 3)).toBeNull();
    expect(MockTableProvider.cellValue(15, 3)).toBe("15,3");
  });

  it("clips windows at the end of the table", async () => {
    const provider = new MockTableProvider({ tables: { demo: 5 }, colCount: 2 });
    await expect(provider.fetchWindow("demo", 3, 10)).resolves.toEqual({
      rows: [
        [4, "Row 4"],
        [5, "Row 5"]
      ],
      totalRows: 5
    });
  });

  it("rejects unknown and dropped tables", async () => {
    const provider = new MockTableProvider({ tables: { demo: 5 } });
    await expect(provider.fetchWindow("missing", 0, 1)).rejects.toThrow("Unknown table: missing");

    await provider.dropTable("demo");
    expect(provider.dropped).toEqual(["demo"]);
    expect(provider.getRowCount("demo")).toBeUndefined();
    await expect(provider.fetchWindow("demo", 0, 1)).rejects.toThrow("Unknown table: demo");
  });

  it("drives a controller end to end", async () => {
    const provider = new MockTableProvider({ tables: { demo: 100 }, colCount: 3 });
    const painted: Array<{ offset: number; rows: RowBatch<MockRow> }> = [];
    const sink: RenderSink<MockRow> = {
      renderBatch: (offset, rows) => painted.push({ offset, rows }),
      clear: () => painted.splice(0)
    };
    const controller = new RowWindowController<MockRow>({ provider, renderSink: sink, viewportHeight: 320, logger: silentLogger });

    controller.loadTable("demo", 100);
    await controller.whenIdle();

    expect(provider.calls).toEqual([{ tableId: "demo", startIndex: 0, count: 20 }]);
    expect(painted).toHaveLength(1);
    expect(painted[0]?.rows[0]).toEqual([1, "Row 1", true]);
    expect(controller.getStatus().state).toBe("ready");
  });

  it("serves rows appended by a progressive import", async () => {
    const provider = new MockTableProvider({ tables: { demo: 100 }, colCount: 3 });
    const painted: Array<{ offset: number; rows: RowBatch<MockRow> }> = [];
    const sink: RenderSink<MockRow> = {
      renderBatch: (offset, rows) => painted.push({ offset, rows }),
      clear: () => painted.splice(0)
    };
    const controller = new RowWindowController<MockRow>({ provider, renderSink: sink, viewportHeight: 320, logger: silentLogger });
    controller.loadTable("demo", 100);
    await controller.whenIdle();

    provider.setRowCount("demo", 250);
    controller.updateTotalRows(250);
    controller.scrollToRow(240);
    await controller.whenIdle();

    expect(controller.getActiveSession()).toEqual({ id: "demo", generation: 0, totalRows: 250 });
    expect(provider.calls.at(-1)).toEqual({ tableId: "demo", startIndex: 230, count: 20 });
    expect(painted.at(-1)?.offset).toBe(7360);
    expect(painted.at(-1)?.rows[0]).toEqual([231, "Row 231", true]);
    expect(controller.getStatus()).toEqual({ state: "ready", generation: 0, window: { startIndex: 230, count: 20 } });
  });
});
