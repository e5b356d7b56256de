import { resolveRowWindowConfig, type RowWindowConfig, type RowWindowConfigInput } from "../config";
import { ProviderFetchError, RenderSinkError, describeError, type RowWindowError } from "../errors";
import { FetchOrchestrator, type FetchDiscardReason, type FetchRequest } from "../fetch/FetchOrchestrator";
import { createGridLogger, type Logger } from "../logger";
import type { FetchWindowResult, RenderSink, TableProvider } from "../model/TableProvider";
import { TableSessionRegistry, type TableSession } from "../session/TableSessionRegistry";
import { ScaleMapper, type ScaleMapping } from "../virtualization/ScaleMapper";
import { computeScrollbarThumb, type ScrollbarThumb } from "../virtualization/scrollbarMath";
import { computeWindow, EMPTY_WINDOW, windowsEqual, type RowWindow, type Viewport } from "../virtualization/windowMath";
import type { RowWindowEvent, RowWindowStatus, TableReplaceReason } from "./events";

export interface RowWindowControllerOptions<Row> extends RowWindowConfigInput {
  provider: TableProvider<Row>;
  renderSink: RenderSink<Row>;
  viewportHeight?: number;
  logger?: Logger;
  now?: () => number;
  onDiscard?: (request: FetchRequest, reason: FetchDiscardReason) => void;
}

export interface RowWindowSnapshot {
  session: TableSession | null;
  mapping: ScaleMapping;
  viewport: Readonly<Viewport>;
  window: RowWindow;
  status: RowWindowStatus;
}

type SinkOperation = RenderSinkError["operation"];

/**
 * Scroll/render glue: turns viewport and table-identity events into windowed fetches and paints
 * accepted batches into the render sink.
 *
 * All state lives on this instance; nothing is shared between controllers.
 */
export class RowWindowController<Row> {
  readonly config: RowWindowConfig;

  private readonly provider: TableProvider<Row>;
  private readonly sink: RenderSink<Row>;
  private readonly logger: Logger;
  private readonly scale: ScaleMapper;
  private readonly registry: TableSessionRegistry;
  private readonly orchestrator: FetchOrchestrator<Row>;

  private readonly viewport: Viewport;
  private window: RowWindow = EMPTY_WINDOW;
  private status: RowWindowStatus = { state: "idle" };
  private readonly statusListeners = new Set<(status: RowWindowStatus) => void>();
  private readonly pendingDrops = new Set<Promise<void>>();
  private disposed = false;

  constructor(options: RowWindowControllerOptions<Row>) {
    this.config = resolveRowWindowConfig({
      rowHeight: options.rowHeight,
      bufferSize: options.bufferSize,
      maxPhysicalExtent: options.maxPhysicalExtent,
      strictInvariants: options.strictInvariants
    });
    this.provider = options.provider;
    this.sink = options.renderSink;

    const logger = options.logger ?? createGridLogger();
    this.logger = logger.child({ module: "row-window-controller" });

    this.scale = new ScaleMapper({
      rowHeight: this.config.rowHeight,
      maxPhysicalExtent: this.config.maxPhysicalExtent,
      strictInvariants: this.config.strictInvariants,
      logger: logger.child({ module: "scale-mapper" })
    });
    this.registry = new TableSessionRegistry({
      strictInvariants: this.config.strictInvariants,
      logger: logger.child({ module: "session-registry" })
    });
    this.orchestrator = new FetchOrchestrator<Row>({
      provider: this.provider,
      registry: this.registry,
      now: options.now,
      logger,
      onResult: (request, result) => this.handleResult(request, result),
      onFailure: (error) => this.handleFailure(error),
      onDiscard: options.onDiscard
    });

    const height = options.viewportHeight ?? 0;
    this.viewport = { physicalScrollOffset: 0, physicalHeight: Number.isFinite(height) ? Math.max(0, height) : 0 };
  }

  dispatch(event: RowWindowEvent): void {
    if (this.disposed) {
      this.logger.debug({ event: event.type }, "ignoring event after dispose");
      return;
    }

    switch (event.type) {
      case "scroll":
        this.viewport.physicalScrollOffset = this.clampScrollOffset(event.offset);
        this.evaluate();
        return;
      case "resize":
        this.viewport.physicalHeight = Number.isFinite(event.height) ? Math.max(0, event.height) : 0;
        this.viewport.physicalScrollOffset = this.clampScrollOffset(this.viewport.physicalScrollOffset);
        this.evaluate();
        return;
      case "rowHeight":
        this.applyRowHeight(event.rowHeight);
        return;
      case "scrollToRow":
        this.applyScrollToRow(event.index);
        return;
      case "tableLoaded": {
        const previous = this.registry.getActiveSession();
        const session = this.registry.createSession({ tableId: event.tableId, totalRows: event.totalRows });
        this.applyIdentityChange(session, previous, "import", event.dropPrevious ?? false);
        return;
      }
      case "tableReplaced": {
        const previous = this.registry.getActiveSession();
        const session = this.registry.replaceSession({ tableId: event.tableId, totalRows: event.totalRows });
        this.applyIdentityChange(session, previous, event.reason, event.dropPrevious ?? false);
        return;
      }
      case "rowCountChanged":
        if (!this.registry.getActiveSession()) {
          this.logger.warn({ totalRows: event.totalRows }, "row count update before any table was loaded");
          return;
        }
        this.applyRowCount(event.totalRows);
        this.evaluate();
        return;
    }
  }

  setScrollOffset(offset: number): void {
    this.dispatch({ type: "scroll", offset });
  }

  setViewportHeight(height: number): void {
    this.dispatch({ type: "resize", height });
  }

  setRowHeight(rowHeight: number): void {
    this.dispatch({ type: "rowHeight", rowHeight });
  }

  scrollToRow(index: number): void {
    this.dispatch({ type: "scrollToRow", index });
  }

  loadTable(tableId: string, totalRows: number, options: { dropPrevious?: boolean } = {}): void {
    this.dispatch({ type: "tableLoaded", tableId, totalRows, dropPrevious: options.dropPrevious });
  }

  replaceTable(
    reason: TableReplaceReason,
    totalRows: number,
    options: { tableId?: string; dropPrevious?: boolean } = {}
  ): void {
    this.dispatch({ type: "tableReplaced", reason, totalRows, tableId: options.tableId, dropPrevious: options.dropPrevious });
  }

  updateTotalRows(totalRows: number): void {
    this.dispatch({ type: "rowCountChanged", totalRows });
  }

  getStatus(): RowWindowStatus {
    return this.status;
  }

  subscribeStatus(listener: (status: RowWindowStatus) => void): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  getSnapshot(): RowWindowSnapshot {
    return {
      session: this.registry.getActiveSession(),
      mapping: this.scale.getMapping(),
      viewport: { ...this.viewport },
      window: this.window,
      status: this.status
    };
  }

  getActiveSession(): TableSession | null {
    return this.registry.getActiveSession();
  }

  getScrollbarThumb(trackSize: number, minThumbSize?: number): ScrollbarThumb {
    return computeScrollbarThumb({
      scrollOffset: this.viewport.physicalScrollOffset,
      viewportHeight: this.viewport.physicalHeight,
      spacerExtent: this.scale.getSpacerExtent(),
      trackSize,
      minThumbSize
    });
  }

  /** Resolves once no fetch is queued or in flight and retired tables have been dropped. */
  async whenIdle(): Promise<void> {
    while (this.orchestrator.hasPendingWork() || this.pendingDrops.size > 0) {
      await this.orchestrator.whenIdle();
      await Promise.all(this.pendingDrops);
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.orchestrator.cancelPending();
    this.statusListeners.clear();
  }

  private evaluate(): void {
    const session = this.registry.getActiveSession();
    if (!session) return;

    const window = computeWindow(this.viewport, this.scale.getMapping(), this.config.bufferSize);
    this.window = window;

    if (window.count === 0) {
      this.setStatus({ state: "idle" });
    } else if (this.orchestrator.isApplied(session.generation, window)) {
      if (this.status.state !== "ready" || !this.isShowing(session.generation, window)) {
        this.setStatus({ state: "ready", generation: session.generation, window });
      }
    } else if (!this.isShowing(session.generation, window)) {
      this.setStatus({ state: "loading", generation: session.generation, window });
    }

    this.orchestrator.request(session, window);
  }

  private isShowing(generation: number, window: RowWindow): boolean {
    const status = this.status;
    return (
      (status.state === "ready" || status.state === "loading") &&
      status.generation === generation &&
      windowsEqual(status.window, window)
    );
  }

  private applyIdentityChange(
    session: TableSession,
    previous: TableSession | null,
    reason: TableReplaceReason | "import",
    dropPrevious: boolean
  ): void {
    this.scale.setTotalRows(session.totalRows);
    this.logger.info(
      { reason, tableId: session.id, generation: session.generation, totalRows: session.totalRows, scaleFactor: this.scale.getScaleFactor() },
      "table session replaced"
    );

    this.callSink("clear", () => this.sink.clear());
    this.viewport.physicalScrollOffset = 0;
    this.window = EMPTY_WINDOW;
    this.callSink("setSpacerExtent", () => this.sink.setSpacerExtent?.(this.scale.getSpacerExtent()));
    this.callSink("setScrollOffset", () => this.sink.setScrollOffset?.(0));
    this.setStatus({ state: "idle" });

    this.evaluate();

    if (dropPrevious && previous && previous.id !== session.id) {
      this.retireTable(previous.id);
    }
  }

  /** Returns true when the mapping changed. */
  private applyRowCount(totalRows: number): boolean {
    const session = this.registry.updateTotalRows(totalRows);
    if (!this.scale.setTotalRows(session.totalRows)) return false;

    this.callSink("setSpacerExtent", () => this.sink.setSpacerExtent?.(this.scale.getSpacerExtent()));
    const clamped = this.clampScrollOffset(this.viewport.physicalScrollOffset);
    if (clamped !== this.viewport.physicalScrollOffset) {
      this.viewport.physicalScrollOffset = clamped;
      this.callSink("setScrollOffset", () => this.sink.setScrollOffset?.(clamped));
    }
    return true;
  }

  private applyRowHeight(rowHeight: number): void {
    if (!this.scale.setRowHeight(rowHeight)) return;

    this.callSink("setSpacerExtent", () => this.sink.setSpacerExtent?.(this.scale.getSpacerExtent()));
    this.viewport.physicalScrollOffset = this.clampScrollOffset(this.viewport.physicalScrollOffset);
    // Same rows, new paint offsets.
    this.orchestrator.invalidateApplied();
    this.setStatus({ state: "idle" });
    this.evaluate();
  }

  private applyScrollToRow(index: number): void {
    const totalRows = this.scale.getTotalRows();
    if (!this.registry.getActiveSession() || totalRows === 0 || !Number.isFinite(index)) return;

    const row = Math.min(Math.max(0, Math.floor(index)), totalRows - 1);
    const offset = this.clampScrollOffset(this.scale.logicalToPhysical(row));
    this.viewport.physicalScrollOffset = offset;
    this.callSink("setScrollOffset", () => this.sink.setScrollOffset?.(offset));
    this.evaluate();
  }

  private handleResult(request: FetchRequest, result: FetchWindowResult<Row>): void {
    if (this.disposed) return;

    let rowCountChanged = false;
    if (result.totalRows !== this.registry.getActiveSession()?.totalRows) {
      this.logger.debug({ tableId: request.tableId, totalRows: result.totalRows }, "provider reported a new row count");
      try {
        rowCountChanged = this.applyRowCount(result.totalRows);
      } catch (err) {
        const error = new ProviderFetchError(
          `Provider reported an invalid row count for ${request.tableId}: ${describeError(err)}`,
          { tableId: request.tableId, generation: request.generation, window: request.window, cause: err }
        );
        this.logger.error({ err: error }, "rejected provider row count");
        this.orchestrator.invalidateApplied();
        this.reportError(error);
        return;
      }
    }

    const offset = this.scale.logicalToPhysical(request.window.startIndex);
    const painted = this.callSink("renderBatch", () => this.sink.renderBatch(offset, result.rows));
    if (!painted) {
      this.orchestrator.invalidateApplied();
    } else if (windowsEqual(request.window, this.window)) {
      this.setStatus({ state: "ready", generation: request.generation, window: request.window });
    } else if (this.window.count > 0) {
      // The viewport moved on while this fetch was in flight; its window is still queued.
      this.setStatus({ state: "loading", generation: request.generation, window: this.window });
    } else {
      this.setStatus({ state: "idle" });
    }

    if (rowCountChanged) this.evaluate();
  }

  private handleFailure(error: ProviderFetchError): void {
    if (this.disposed) return;
    this.orchestrator.invalidateApplied();
    this.reportError(error);
  }

  private reportError(error: RowWindowError): void {
    this.setStatus({ state: "error", error });
    try {
      this.sink.renderError?.(error);
    } catch (err) {
      this.logger.error({ err }, "render sink failed to show error state");
    }
  }

  /** Returns false when the sink threw; the failure becomes the current status. */
  private callSink(operation: SinkOperation, fn: () => void): boolean {
    try {
      fn();
      return true;
    } catch (err) {
      const error = new RenderSinkError(operation, err);
      this.logger.error({ err: error }, "render sink failed");
      this.reportError(error);
      return false;
    }
  }

  private retireTable(tableId: string): void {
    const task: Promise<void> = Promise.resolve()
      .then(() => this.provider.dropTable(tableId))
      .then(
        () => {
          this.logger.debug({ tableId }, "dropped retired table");
        },
        (err: unknown) => {
          this.logger.warn({ err, tableId }, "failed to drop retired table");
        }
      )
      .finally(() => {
        this.pendingDrops.delete(task);
      });
    this.pendingDrops.add(task);
  }

  private clampScrollOffset(offset: number): number {
    if (!Number.isFinite(offset)) return 0;
    return Math.min(Math.max(0, offset), this.scale.getMaxScrollOffset(this.viewport.physicalHeight));
  }

  private setStatus(status: RowWindowStatus): void {
    if (status.state === "idle" && this.status.state === "idle") return;
    this.status = status;
    for (const listener of this.statusListeners) listener(status);
  }
}
