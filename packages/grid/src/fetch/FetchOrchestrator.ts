import { ProviderFetchError, describeError } from "../errors";
import { createGridLogger, type Logger } from "../logger";
import type { FetchWindowResult, TableProvider } from "../model/TableProvider";
import type { TableSession, TableSessionRegistry } from "../session/TableSessionRegistry";
import { windowEnd, windowsEqual, type RowWindow } from "../virtualization/windowMath";

export interface FetchRequest {
  /** Orchestrator-local sequence number; higher means issued later. */
  readonly id: number;
  readonly tableId: string;
  readonly generation: number;
  readonly window: RowWindow;
  readonly issuedAt: number;
}

export type FetchDiscardReason = "superseded" | "stale-generation";

export interface FetchOrchestratorOptions<Row> {
  provider: TableProvider<Row>;
  registry: TableSessionRegistry;
  onResult: (request: FetchRequest, result: FetchWindowResult<Row>) => void;
  onFailure?: (error: ProviderFetchError, request: FetchRequest) => void;
  onDiscard?: (request: FetchRequest, reason: FetchDiscardReason) => void;
  now?: () => number;
  logger?: Logger;
}

interface PendingRequest {
  session: TableSession;
  window: RowWindow;
}

/**
 * Issues windowed fetches against the active table session and decides which results are still
 * worth painting.
 *
 * - Requests are coalesced: a newer `request()` replaces the queued one before it reaches the
 *   provider. While a fetch for the current generation is in flight, at most one more request waits.
 * - A fetch for a retired generation never blocks the queue; its result is dropped on arrival.
 * - Only the most recently issued request for the current generation is forwarded. Everything else
 *   is discarded silently (no error, no retry).
 */
export class FetchOrchestrator<Row> {
  private readonly provider: TableProvider<Row>;
  private readonly registry: TableSessionRegistry;
  private readonly onResult: FetchOrchestratorOptions<Row>["onResult"];
  private readonly onFailure: FetchOrchestratorOptions<Row>["onFailure"];
  private readonly onDiscard: FetchOrchestratorOptions<Row>["onDiscard"];
  private readonly now: () => number;
  private readonly logger: Logger;

  private pending: PendingRequest | null = null;
  private inflight: FetchRequest | null = null;
  private latest: FetchRequest | null = null;
  private lastApplied: { generation: number; window: RowWindow } | null = null;
  private readonly running = new Set<Promise<void>>();
  private drainScheduled = false;
  private nextRequestId = 1;

  constructor(options: FetchOrchestratorOptions<Row>) {
    this.provider = options.provider;
    this.registry = options.registry;
    this.onResult = options.onResult;
    this.onFailure = options.onFailure;
    this.onDiscard = options.onDiscard;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createGridLogger()).child({ module: "fetch-orchestrator" });
  }

  request(session: TableSession, window: RowWindow): void {
    this.pending = { session, window };
    this.scheduleDrain();
  }

  /** The most recently issued request, whether or not it has settled. */
  getLatestRequest(): FetchRequest | null {
    return this.latest;
  }

  hasPendingWork(): boolean {
    return this.drainScheduled || this.pending !== null || this.running.size > 0;
  }

  isApplied(generation: number, window: RowWindow): boolean {
    const applied = this.lastApplied;
    return applied !== null && applied.generation === generation && windowsEqual(applied.window, window);
  }

  /**
   * Forgets the last applied window so the next identical request reaches the provider again
   * (used after a failed paint or fetch).
   */
  invalidateApplied(): void {
    this.lastApplied = null;
  }

  /** Drops the queued request and marks the in-flight one as discardable. */
  cancelPending(): void {
    this.pending = null;
    this.inflight = null;
    this.latest = null;
  }

  async whenIdle(): Promise<void> {
    for (;;) {
      if (this.running.size > 0) {
        await Promise.all(this.running);
        continue;
      }
      if (this.drainScheduled || this.pending) {
        await new Promise<void>((resolve) => queueMicrotask(resolve));
        continue;
      }
      return;
    }
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    queueMicrotask(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    const pending = this.pending;
    if (!pending) return;

    const { session, window } = pending;
    if (!this.registry.isCurrent(session.generation)) {
      this.pending = null;
      this.logger.debug({ generation: session.generation }, "dropping queued request for retired generation");
      return;
    }

    const inflight = this.inflight;
    if (inflight && this.registry.isCurrent(inflight.generation)) {
      if (inflight.generation === session.generation && windowsEqual(inflight.window, window)) {
        this.pending = null;
        this.logger.debug({ window }, "request already in flight");
      }
      // Otherwise wait in the slot; settle() drains again.
      return;
    }

    this.pending = null;
    if (window.count === 0) return;

    if (this.isApplied(session.generation, window)) {
      this.logger.debug({ window }, "window already applied");
      return;
    }

    this.dispatch(session, window);
  }

  private dispatch(session: TableSession, window: RowWindow): void {
    const request: FetchRequest = Object.freeze({
      id: this.nextRequestId++,
      tableId: session.id,
      generation: session.generation,
      window,
      issuedAt: this.now()
    });
    this.latest = request;
    this.inflight = request;

    this.logger.debug(
      { requestId: request.id, tableId: request.tableId, generation: request.generation, window },
      "fetching window"
    );

    const task: Promise<void> = this.run(request).finally(() => {
      this.running.delete(task);
    });
    this.running.add(task);
  }

  private async run(request: FetchRequest): Promise<void> {
    const { startIndex, count } = request.window;

    let result: FetchWindowResult<Row>;
    try {
      result = await this.provider.fetchWindow(request.tableId, startIndex, count);
    } catch (err) {
      this.settle(request);
      const reason = this.discardReason(request);
      if (reason) {
        this.discard(request, reason);
        return;
      }

      const error = new ProviderFetchError(
        `Failed to fetch rows ${startIndex}..${windowEnd(request.window)} of ${request.tableId}: ${describeError(err)}`,
        { tableId: request.tableId, generation: request.generation, window: request.window, cause: err }
      );
      this.logger.error({ err: error, requestId: request.id }, "window fetch failed");
      this.notify(() => this.onFailure?.(error, request));
      return;
    }

    this.settle(request);
    const reason = this.discardReason(request);
    if (reason) {
      this.discard(request, reason);
      return;
    }

    this.lastApplied = { generation: request.generation, window: request.window };
    this.notify(() => this.onResult(request, result));
  }

  private settle(request: FetchRequest): void {
    if (this.inflight?.id === request.id) {
      this.inflight = null;
    }
    if (this.pending) {
      this.scheduleDrain();
    }
  }

  private discardReason(request: FetchRequest): FetchDiscardReason | null {
    if (!this.registry.isCurrent(request.generation)) return "stale-generation";
    if (this.latest?.id !== request.id) return "superseded";
    return null;
  }

  private discard(request: FetchRequest, reason: FetchDiscardReason): void {
    this.logger.debug({ requestId: request.id, generation: request.generation, reason }, "discarding fetch result");
    this.notify(() => this.onDiscard?.(request, reason));
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (err) {
      this.logger.error({ err }, "fetch listener threw");
    }
  }
}
