import type { FetchWindowResult, TableProvider } from "./TableProvider";

export type MockCellValue = string | number | boolean | null;
export type MockRow = readonly MockCellValue[];

export interface MockTableProviderOptions {
  /** Row counts keyed by table id. */
  tables?: Record<string, number>;
  colCount?: number;
  /** Artificial latency per fetch; 0 resolves on the next microtask. */
  latencyMs?: number;
}

/**
 * Synthetic, deterministic rows for any number of tables. Useful for demos and perf harnesses
 * where the values themselves don't matter.
 */
export class MockTableProvider implements TableProvider<MockRow> {
  readonly calls: Array<{ tableId: string; startIndex: number; count: number }> = [];
  readonly dropped: string[] = [];

  private readonly tables = new Map<string, number>();
  private readonly colCount: number;
  private readonly latencyMs: number;

  constructor(options: MockTableProviderOptions = {}) {
    for (const [tableId, rowCount] of Object.entries(options.tables ?? {})) {
      this.tables.set(tableId, rowCount);
    }
    this.colCount = options.colCount ?? 4;
    this.latencyMs = options.latencyMs ?? 0;
  }

  setRowCount(tableId: string, rowCount: number): void {
    this.tables.set(tableId, rowCount);
  }

  getRowCount(tableId: string): number | undefined {
    return this.tables.get(tableId);
  }

  static cellValue(row: number, col: number): MockCellValue {
    if (col === 0) return row + 1;
    if (col === 1) return `Row ${row + 1}`;
    if (col === 2) return row % 2 === 0;
    return row % 7 === 0 ? null : `${row},${col}`;
  }

  async fetchWindow(tableId: string, startIndex: number, count: number): Promise<FetchWindowResult<MockRow>> {
    this.calls.push({ tableId, startIndex, count });
    if (this.latencyMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
    }

    const totalRows = this.tables.get(tableId);
    if (totalRows === undefined) {
      throw new Error(`Unknown table: ${tableId}`);
    }

    const end = Math.min(totalRows, startIndex + count);
    const rows: MockRow[] = [];
    for (let row = Math.max(0, startIndex); row < end; row++) {
      const values: MockCellValue[] = [];
      for (let col = 0; col < this.colCount; col++) values.push(MockTableProvider.cellValue(row, col));
      rows.push(values);
    }
    return { rows, totalRows };
  }

  async dropTable(tableId: string): Promise<void> {
    this.dropped.push(tableId);
    this.tables.delete(tableId);
  }
}
