import { createGridLogger, type Logger, type RowWindowController } from "@rowscope/grid";
import type { SortColumn, TableEngine, TableRow } from "./engine";
import { TableOperationError, type TableOperation } from "./errors";
import { parseFilterConditions, type FilterCondition } from "./filters";

/** The slice of the row window controller the workbench drives. */
export type RowWindowTarget = Pick<RowWindowController<TableRow>, "loadTable" | "replaceTable">;

export interface TableWorkbenchState {
  /** The imported table; sorts rewrite it in place. */
  baseTable: string | null;
  baseRowCount: number;
  /** What the row window shows: the base table or the current filter view. */
  activeTable: string | null;
  activeRowCount: number;
  filterView: string | null;
  filters: readonly FilterCondition[];
  sort: readonly SortColumn[];
  message: string;
}

export interface TableWorkbenchOptions {
  engine: TableEngine;
  rowWindow: RowWindowTarget;
  logger?: Logger;
}

const INITIAL_STATE: TableWorkbenchState = Object.freeze({
  baseTable: null,
  baseRowCount: 0,
  activeTable: null,
  activeRowCount: 0,
  filterView: null,
  filters: [],
  sort: [],
  message: "No table loaded"
});

const OPERATION_LABEL: Record<TableOperation, string> = {
  open: "Import",
  sort: "Sort",
  filter: "Filter",
  reset: "Reset"
};

export function formatRowCount(count: number): string {
  return count.toLocaleString("en-US");
}

function describeSort(columns: readonly SortColumn[]): string {
  return columns.map((sort) => `${sort.column} (${sort.direction === "asc" ? "ascending" : "descending"})`).join(", ");
}

/**
 * Import/sort/filter/reset on top of a {@link TableEngine}. Every operation that changes which
 * rows are visible hands the new identity and row count to the row window.
 *
 * Operations run one at a time in call order.
 */
export class TableWorkbench {
  private readonly engine: TableEngine;
  private readonly rowWindow: RowWindowTarget;
  private readonly logger: Logger;

  private state: TableWorkbenchState = INITIAL_STATE;
  private readonly listeners = new Set<(state: TableWorkbenchState) => void>();
  private tail: Promise<void> = Promise.resolve();

  constructor(options: TableWorkbenchOptions) {
    this.engine = options.engine;
    this.rowWindow = options.rowWindow;
    this.logger = (options.logger ?? createGridLogger()).child({ module: "table-workbench" });
  }

  getState(): TableWorkbenchState {
    return this.state;
  }

  subscribe(listener: (state: TableWorkbenchState) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Import completed: show `tableId` from the top with no sort or filter. */
  openTable(tableId: string): Promise<void> {
    return this.run("open", async () => {
      const totalRows = await this.engine.countRows(tableId);
      const previousView = this.state.filterView;

      this.rowWindow.loadTable(tableId, totalRows, { dropPrevious: previousView !== null });
      this.update({
        baseTable: tableId,
        baseRowCount: totalRows,
        activeTable: tableId,
        activeRowCount: totalRows,
        filterView: null,
        filters: [],
        sort: [],
        message: `Loaded ${tableId}: ${formatRowCount(totalRows)} rows`
      });
    });
  }

  /** Sorts whatever is on screen (the filter view while one is active). */
  sort(columns: readonly SortColumn[]): Promise<void> {
    return this.run("sort", async () => {
      if (columns.length === 0) {
        throw new TableOperationError("sort", "Select at least one column to sort by");
      }
      const target = this.requireActiveTable("sort");

      await this.engine.sortTable(target, columns);
      const totalRows = await this.engine.countRows(target);

      this.rowWindow.replaceTable("sort", totalRows);
      const isBase = target === this.state.baseTable;
      this.update({
        activeRowCount: totalRows,
        baseRowCount: isBase ? totalRows : this.state.baseRowCount,
        sort: [...columns],
        message: `Sorted by ${describeSort(columns)}`
      });
    });
  }

  /**
   * Filters the base table into a new view. A previous view is dropped once the new one is on
   * screen.
   */
  applyFilter(input: unknown): Promise<void> {
    return this.run("filter", async () => {
      let conditions: FilterCondition[];
      try {
        conditions = parseFilterConditions(input);
      } catch (err) {
        throw new TableOperationError("filter", err instanceof Error ? err.message : String(err), { cause: err });
      }
      const base = this.requireBaseTable("filter");

      const view = await this.engine.createFilterView(base, conditions);
      const previousView = this.state.filterView;

      this.rowWindow.replaceTable("filter", view.totalRows, { tableId: view.tableId, dropPrevious: previousView !== null });
      this.update({
        activeTable: view.tableId,
        activeRowCount: view.totalRows,
        filterView: view.tableId,
        filters: conditions,
        message: `Filtered: ${formatRowCount(view.totalRows)} of ${formatRowCount(this.state.baseRowCount)} rows (${conditions.length} filter(s))`
      });
    });
  }

  /** Back to the base table; the filter view, if any, is dropped. Sorts are not undone. */
  reset(): Promise<void> {
    return this.run("reset", async () => {
      const base = this.requireBaseTable("reset");
      const totalRows = await this.engine.countRows(base);
      const previousView = this.state.filterView;

      this.rowWindow.replaceTable("reset", totalRows, { tableId: base, dropPrevious: previousView !== null });
      this.update({
        baseRowCount: totalRows,
        activeTable: base,
        activeRowCount: totalRows,
        filterView: null,
        filters: [],
        message: `Showing original dataset: ${formatRowCount(totalRows)} rows`
      });
    });
  }

  /** Resolves once every queued operation has settled. */
  async whenIdle(): Promise<void> {
    await this.tail;
  }

  private run(operation: TableOperation, task: () => Promise<void>): Promise<void> {
    const result = this.tail.then(async () => {
      try {
        await task();
      } catch (err) {
        const error =
          err instanceof TableOperationError
            ? err
            : new TableOperationError(
                operation,
                `${OPERATION_LABEL[operation]} failed: ${err instanceof Error ? err.message : String(err)}`,
                { cause: err }
              );
        this.logger.error({ err: error, operation }, "table operation failed");
        this.update({ message: error.message });
        throw error;
      }
    });
    // Keep the queue going after a failure; the caller still sees the rejection.
    this.tail = result.catch(() => undefined);
    return result;
  }

  private requireBaseTable(operation: TableOperation): string {
    const base = this.state.baseTable;
    if (base === null) throw new TableOperationError(operation, "No table is loaded");
    return base;
  }

  private requireActiveTable(operation: TableOperation): string {
    const active = this.state.activeTable;
    if (active === null) throw new TableOperationError(operation, "No table is loaded");
    return active;
  }

  private update(patch: Partial<TableWorkbenchState>): void {
    this.state = Object.freeze({ ...this.state, ...patch });
    for (const listener of this.listeners) listener(this.state);
  }
}
