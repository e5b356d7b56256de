import type {
  CellScalar,
  ColumnInfo,
  ColumnType,
  FilterViewResult,
  QueryRowsResult,
  SortColumn,
  TableEngine,
  TableRow
} from "./engine";
import { UnknownColumnError, UnknownTableError } from "./errors";
import type { FilterCondition, FilterScalar } from "./filters";

interface StoredTable {
  columns: ColumnInfo[];
  rows: TableRow[];
}

export interface InMemoryTableEngineOptions {
  /** Delay applied to every call; 0 settles on the next microtask. */
  latencyMs?: number;
}

function inferColumnType(rows: readonly TableRow[], index: number): ColumnType {
  for (const row of rows) {
    const value = row[index];
    if (value === null || value === undefined) continue;
    if (typeof value === "number") return "number";
    if (typeof value === "boolean") return "boolean";
    return "string";
  }
  return "unknown";
}

/** Orders two non-null scalars; values of different types order by type. */
export function compareScalars(a: FilterScalar, b: FilterScalar): number {
  if (typeof a === "number" && typeof b === "number") return a === b ? 0 : a < b ? -1 : 1;
  if (typeof a === "string" && typeof b === "string") return a === b ? 0 : a < b ? -1 : 1;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  return typeRank(a) - typeRank(b);
}

function typeRank(value: FilterScalar): number {
  if (typeof value === "number") return 0;
  if (typeof value === "string") return 1;
  return 2;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** SQL LIKE: `%` is any run of characters, `_` exactly one. Case-sensitive. */
export function likePatternToRegExp(pattern: string): RegExp {
  let source = "";
  for (const ch of pattern) {
    if (ch === "%") source += ".*";
    else if (ch === "_") source += ".";
    else source += escapeRegExp(ch);
  }
  return new RegExp(`^${source}$`, "s");
}

function looselyEqual(cell: FilterScalar, value: FilterScalar): boolean {
  if (typeof cell === typeof value) return cell === value;
  return String(cell) === String(value);
}

function looselyCompare(cell: FilterScalar, value: FilterScalar): number {
  if (typeof cell === typeof value) return compareScalars(cell, value);
  const left = String(cell);
  const right = String(value);
  return left === right ? 0 : left < right ? -1 : 1;
}

export function matchesCondition(cell: CellScalar | undefined, condition: FilterCondition): boolean {
  if (cell === null || cell === undefined) return false;
  const { operator, value } = condition;

  if (Array.isArray(value)) {
    return operator === "IN" && value.some((candidate) => looselyEqual(cell, candidate));
  }

  switch (operator) {
    case "=":
      return looselyEqual(cell, value);
    case "!=":
      return !looselyEqual(cell, value);
    case ">":
      return looselyCompare(cell, value) > 0;
    case "<":
      return looselyCompare(cell, value) < 0;
    case ">=":
      return looselyCompare(cell, value) >= 0;
    case "<=":
      return looselyCompare(cell, value) <= 0;
    case "LIKE":
      return likePatternToRegExp(String(value)).test(String(cell));
    case "IN":
      return looselyEqual(cell, value);
  }
}

/**
 * {@link TableEngine} over plain arrays. Tables are copied on the way in and out, so callers can't
 * mutate stored rows.
 */
export class InMemoryTableEngine implements TableEngine {
  readonly calls: Array<{ method: keyof TableEngine; tableId: string }> = [];

  private readonly tables = new Map<string, StoredTable>();
  private readonly latencyMs: number;
  private viewCounter = 0;

  constructor(options: InMemoryTableEngineOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
  }

  createTable(tableId: string, columns: readonly string[], rows: readonly TableRow[]): void {
    const copied = rows.map((row) => [...row]);
    this.tables.set(tableId, {
      columns: columns.map((name, index) => ({ name, type: inferColumnType(copied, index) })),
      rows: copied
    });
  }

  hasTable(tableId: string): boolean {
    return this.tables.has(tableId);
  }

  tableIds(): string[] {
    return [...this.tables.keys()];
  }

  async queryRows(tableId: string, offset: number, limit: number): Promise<QueryRowsResult> {
    const table = await this.enter("queryRows", tableId);
    const start = Math.max(0, Math.floor(offset));
    const end = Math.min(table.rows.length, start + Math.max(0, Math.floor(limit)));
    return { rows: table.rows.slice(start, end).map((row) => [...row]), totalRows: table.rows.length };
  }

  async countRows(tableId: string): Promise<number> {
    const table = await this.enter("countRows", tableId);
    return table.rows.length;
  }

  async getColumns(tableId: string): Promise<ColumnInfo[]> {
    const table = await this.enter("getColumns", tableId);
    return table.columns.map((column) => ({ ...column }));
  }

  async sortTable(tableId: string, columns: readonly SortColumn[]): Promise<void> {
    const table = await this.enter("sortTable", tableId);
    const keys = columns.map((sort) => ({
      index: this.columnIndex(tableId, table, sort.column),
      sign: sort.direction === "desc" ? -1 : 1
    }));

    // Array#sort is stable, so ties keep their current order.
    const sorted = [...table.rows].sort((left, right) => {
      for (const { index, sign } of keys) {
        const a = left[index] ?? null;
        const b = right[index] ?? null;
        if (a === null && b === null) continue;
        // Nulls last in both directions.
        if (a === null) return 1;
        if (b === null) return -1;
        const order = compareScalars(a, b);
        if (order !== 0) return order * sign;
      }
      return 0;
    });
    this.tables.set(tableId, { columns: table.columns, rows: sorted });
  }

  async createFilterView(tableId: string, conditions: readonly FilterCondition[]): Promise<FilterViewResult> {
    const table = await this.enter("createFilterView", tableId);
    const predicates = conditions.map((condition) => ({
      index: this.columnIndex(tableId, table, condition.column),
      condition
    }));

    const rows = table.rows.filter((row) => predicates.every(({ index, condition }) => matchesCondition(row[index], condition)));

    this.viewCounter += 1;
    const viewId = `${tableId}_view_${this.viewCounter}`;
    this.tables.set(viewId, { columns: table.columns.map((column) => ({ ...column })), rows });
    return { tableId: viewId, totalRows: rows.length };
  }

  async dropTable(tableId: string): Promise<void> {
    await this.enter("dropTable", tableId);
    this.tables.delete(tableId);
  }

  private async enter(method: keyof TableEngine, tableId: string): Promise<StoredTable> {
    this.calls.push({ method, tableId });
    if (this.latencyMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
    }
    const table = this.tables.get(tableId);
    if (!table) throw new UnknownTableError(tableId);
    return table;
  }

  private columnIndex(tableId: string, table: StoredTable, column: string): number {
    const index = table.columns.findIndex((info) => info.name === column);
    if (index < 0) throw new UnknownColumnError(tableId, column);
    return index;
  }
}
