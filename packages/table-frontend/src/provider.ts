import type { FetchWindowResult, TableProvider } from "@rowscope/grid";
import type { ColumnInfo, TableEngine, TableRow } from "./engine";

/**
 * Serves row windows straight from a {@link TableEngine}. Column metadata is cached per table and
 * concurrent lookups share one engine call.
 */
export class EngineTableProvider implements TableProvider<TableRow> {
  readonly engine: TableEngine;

  private readonly columns = new Map<string, ColumnInfo[]>();
  private readonly inflightColumns = new Map<string, Promise<ColumnInfo[]>>();

  constructor(engine: TableEngine) {
    this.engine = engine;
  }

  async fetchWindow(tableId: string, startIndex: number, count: number): Promise<FetchWindowResult<TableRow>> {
    const { rows, totalRows } = await this.engine.queryRows(tableId, startIndex, count);
    return { rows, totalRows };
  }

  async dropTable(tableId: string): Promise<void> {
    this.invalidateColumns(tableId);
    await this.engine.dropTable(tableId);
  }

  async getColumns(tableId: string): Promise<ColumnInfo[]> {
    const cached = this.columns.get(tableId);
    if (cached) return cached;

    const existing = this.inflightColumns.get(tableId);
    if (existing) return existing;

    const task = this.engine.getColumns(tableId);
    this.inflightColumns.set(tableId, task);
    try {
      const columns = await task;
      // A drop while the lookup was running wins.
      if (this.inflightColumns.get(tableId) === task) this.columns.set(tableId, columns);
      return columns;
    } finally {
      if (this.inflightColumns.get(tableId) === task) this.inflightColumns.delete(tableId);
    }
  }

  invalidateColumns(tableId?: string): void {
    if (tableId === undefined) {
      this.columns.clear();
      this.inflightColumns.clear();
      return;
    }
    this.columns.delete(tableId);
    this.inflightColumns.delete(tableId);
  }
}
