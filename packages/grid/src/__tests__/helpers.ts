import type { DestinationStream } from "pino";
import type { RowWindowError } from "../errors";
import { createGridLogger } from "../logger";
import type { FetchWindowResult, RenderSink, RowBatch, TableProvider } from "../model/TableProvider";

export type TestRow = { id: number; label: string };

export function makeRows(startIndex: number, count: number, label = "row"): TestRow[] {
  return Array.from({ length: count }, (_, i) => ({ id: startIndex + i, label: `${label}-${startIndex + i}` }));
}

/** Lets queued microtasks (drains, settled fetches) run. */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

export const silentLogger = createGridLogger({ level: "silent" });

export function captureLogger(level = "debug") {
  const lines: Array<Record<string, unknown>> = [];
  const destination: DestinationStream = {
    write(msg: string) {
      lines.push(JSON.parse(msg) as Record<string, unknown>);
    }
  };
  return { logger: createGridLogger({ level, destination }), lines };
}

export interface PendingFetch {
  tableId: string;
  startIndex: number;
  count: number;
  resolve: (result: FetchWindowResult<TestRow>) => void;
  reject: (err: unknown) => void;
}

/** Provider whose fetches settle only when the test says so. */
export class DeferredTableProvider implements TableProvider<TestRow> {
  readonly calls: PendingFetch[] = [];
  readonly dropped: string[] = [];
  dropError: Error | null = null;

  fetchWindow(tableId: string, startIndex: number, count: number): Promise<FetchWindowResult<TestRow>> {
    return new Promise((resolve, reject) => {
      this.calls.push({ tableId, startIndex, count, resolve, reject });
    });
  }

  async dropTable(tableId: string): Promise<void> {
    if (this.dropError) throw this.dropError;
    this.dropped.push(tableId);
  }

  /** Resolves call `index` with generated rows for exactly the requested window. */
  respond(index: number, totalRows: number, label = "row"): void {
    const call = this.calls[index];
    if (!call) throw new Error(`No fetch #${index} (have ${this.calls.length})`);
    call.resolve({ rows: makeRows(call.startIndex, call.count, label), totalRows });
  }

  fail(index: number, err: unknown): void {
    const call = this.calls[index];
    if (!call) throw new Error(`No fetch #${index} (have ${this.calls.length})`);
    call.reject(err);
  }
}

export type SinkEvent =
  | { type: "batch"; offset: number; rows: RowBatch<TestRow> }
  | { type: "clear" }
  | { type: "spacer"; extent: number }
  | { type: "scroll"; offset: number }
  | { type: "error"; error: RowWindowError };

export class RecordingSink implements RenderSink<TestRow> {
  readonly events: SinkEvent[] = [];
  throwOnBatch: Error | null = null;

  renderBatch(physicalOffset: number, rows: RowBatch<TestRow>): void {
    if (this.throwOnBatch) throw this.throwOnBatch;
    this.events.push({ type: "batch", offset: physicalOffset, rows });
  }

  clear(): void {
    this.events.push({ type: "clear" });
  }

  setSpacerExtent(extent: number): void {
    this.events.push({ type: "spacer", extent });
  }

  setScrollOffset(offset: number): void {
    this.events.push({ type: "scroll", offset });
  }

  renderError(error: RowWindowError): void {
    this.events.push({ type: "error", error });
  }

  batches(): Array<{ offset: number; rows: RowBatch<TestRow> }> {
    const out: Array<{ offset: number; rows: RowBatch<TestRow> }> = [];
    for (const event of this.events) {
      if (event.type === "batch") out.push({ offset: event.offset, rows: event.rows });
    }
    return out;
  }
}
