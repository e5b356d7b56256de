import { describe, expect, it } from "vitest";
import { EngineTableProvider, InMemoryTableEngine } from "../src/index.js";
import { SALES_COLUMNS, salesRows } from "./fixtures.js";

function setup() {
  const engine = new InMemoryTableEngine();
  engine.createTable("sales", SALES_COLUMNS, salesRows());
  return { engine, provider: new EngineTableProvider(engine) };
}

describe("EngineTableProvider", () => {
  it("serves windows through queryRows", async () => {
    const { provider } = setup();
    await expect(provider.fetchWindow("sales", 3, 10)).resolves.toEqual({
      rows: [
        [4, "east", 200, false],
        [5, "south", 120, true]
      ],
      totalRows: 5
    });
  });

  it("shares one column lookup between concurrent callers and caches it", async () => {
    const { engine, provider } = setup();

    const [first, second] = await Promise.all([provider.getColumns("sales"), provider.getColumns("sales")]);
    expect(first).toBe(second);
    await provider.getColumns("sales");

    expect(engine.calls.filter((call) => call.method === "getColumns")).toHaveLength(1);
  });

  it("forgets cached columns when the table is dropped", async () => {
    const { engine, provider } = setup();
    await provider.getColumns("sales");
    await provider.dropTable("sales");

    expect(engine.hasTable("sales")).toBe(false);
    await expect(provider.getColumns("sales")).rejects.toThrow("Table not found: sales");
  });

  it("surfaces engine failures to the caller", async () => {
    const { provider } = setup();
    await expect(provider.fetchWindow("missing", 0, 10)).rejects.toThrow("Table not found: missing");
  });
});
