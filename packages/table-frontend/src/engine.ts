import type { FilterCondition } from "./filters";

export type CellScalar = string | number | boolean | null;
export type TableRow = readonly CellScalar[];

export type ColumnType = "number" | "string" | "boolean" | "unknown";

export interface ColumnInfo {
  name: string;
  type: ColumnType;
}

export interface SortColumn {
  column: string;
  direction: "asc" | "desc";
}

export interface QueryRowsResult {
  rows: TableRow[];
  /** Row count of the whole table at query time, not of this page. */
  totalRows: number;
}

export interface FilterViewResult {
  tableId: string;
  totalRows: number;
}

/**
 * The analytical engine the table frontend talks to. Implementations may be remote (IPC, HTTP) or
 * in process; every method may reject.
 */
export interface TableEngine {
  queryRows(tableId: string, offset: number, limit: number): Promise<QueryRowsResult>;
  countRows(tableId: string): Promise<number>;
  getColumns(tableId: string): Promise<ColumnInfo[]>;
  /** Rewrites `tableId` in sorted order under the same name. */
  sortTable(tableId: string, columns: readonly SortColumn[]): Promise<void>;
  /** Materializes the matching rows of `tableId` as a new table and returns its id. */
  createFilterView(tableId: string, conditions: readonly FilterCondition[]): Promise<FilterViewResult>;
  dropTable(tableId: string): Promise<void>;
}
