import type { RowWindowError } from "../errors";

/** A contiguous run of rows, in logical order, starting at the requested index. */
export type RowBatch<Row> = readonly Row[];

export interface FetchWindowResult<Row> {
  rows: RowBatch<Row>;
  /**
   * Row count of the table as observed by this fetch.
   *
   * Providers may report a different value on every call (e.g. while a progressive import is still
   * appending rows); the controller treats a mismatch as a row-count update for the same table.
   */
  totalRows: number;
}

/**
 * Backing store for row data. Implementations are free to be slow; the grid never blocks on them.
 *
 * There is no cancellation contract: the grid drops results it no longer needs when they arrive.
 * Timeouts are the provider's own concern and should surface as a rejected promise.
 */
export interface TableProvider<Row> {
  fetchWindow(tableId: string, startIndex: number, count: number): Promise<FetchWindowResult<Row>>;
  /** Called once a table is permanently unreferenced by the grid. */
  dropTable(tableId: string): Promise<void>;
}

/**
 * Paint target for row batches. Coordinates are physical (already divided by the scale factor).
 */
export interface RenderSink<Row> {
  renderBatch(physicalOffset: number, rows: RowBatch<Row>): void;
  /** Invoked on table-identity replacement, before the first batch of the new table is painted. */
  clear(): void;
  /** Height of the scroll spacer element; always `<= maxPhysicalExtent`. */
  setSpacerExtent?(extent: number): void;
  /** Programmatic scroll of the host element (table swaps reset to the top, `scrollToRow`). */
  setScrollOffset?(offset: number): void;
  /** Error state for the current window; cleared by the next `renderBatch` or `clear`. */
  renderError?(error: RowWindowError): void;
}
