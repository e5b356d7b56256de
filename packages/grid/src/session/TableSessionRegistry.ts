import { InvariantViolationError, SessionStateError } from "../errors";
import type { Logger } from "../logger";

export interface TableSession {
  readonly id: string;
  /** Table-identity epoch. The only thing staleness checks compare. */
  readonly generation: number;
  readonly totalRows: number;
}

export type TableSessionRegistryState =
  | { status: "uninitialized" }
  | { status: "active"; session: TableSession };

export type TableSessionChange =
  | { type: "created"; session: TableSession; previous: TableSession | null }
  | { type: "replaced"; session: TableSession; previous: TableSession }
  | { type: "rowCount"; session: TableSession; previous: TableSession };

export interface TableSessionRegistryOptions {
  strictInvariants?: boolean;
  logger?: Logger;
}

/**
 * Single writer for "which backing table is active".
 *
 * Sessions are immutable: every change, including a plain row-count update, produces a new frozen
 * object. Replaced sessions stay readable by whoever still holds them (in-flight fetches), they just
 * stop being current.
 */
export class TableSessionRegistry {
  private readonly strictInvariants: boolean;
  private readonly logger: Logger | undefined;
  private readonly listeners = new Set<(change: TableSessionChange) => void>();

  private active: TableSession | null = null;
  private nextGeneration = 0;

  constructor(options: TableSessionRegistryOptions = {}) {
    this.strictInvariants = options.strictInvariants ?? false;
    this.logger = options.logger;
  }

  getState(): TableSessionRegistryState {
    return this.active ? { status: "active", session: this.active } : { status: "uninitialized" };
  }

  getActiveSession(): TableSession | null {
    return this.active;
  }

  /** `-1` until the first session exists. */
  get currentGeneration(): number {
    return this.active?.generation ?? -1;
  }

  isCurrent(generation: number): boolean {
    return this.active !== null && this.active.generation === generation;
  }

  /**
   * Starts a session for a freshly imported table. The first session gets generation 0; later ones
   * continue the registry-wide counter so generations never repeat.
   */
  createSession(params: { tableId: string; totalRows: number }): TableSession {
    const previous = this.active;
    const totalRows = this.sanitizeTotalRows(params.totalRows);
    const session = this.makeSession(params.tableId, this.takeGeneration(), totalRows);
    this.active = session;
    this.emit({ type: "created", session, previous });
    return session;
  }

  /**
   * New table identity (sort, filter view, reset). `tableId` defaults to the current id for
   * operations that rewrite a table under the same name.
   */
  replaceSession(params: { totalRows: number; tableId?: string }): TableSession {
    const previous = this.active;
    if (!previous) {
      throw new SessionStateError("Cannot replace a table session before one has been created");
    }
    const totalRows = this.sanitizeTotalRows(params.totalRows);
    const session = this.makeSession(params.tableId ?? previous.id, this.takeGeneration(), totalRows);
    this.active = session;
    this.emit({ type: "replaced", session, previous });
    return session;
  }

  /**
   * Row count changed for the same table (e.g. a progressive import finished). Generation is kept:
   * rows already fetched stay valid at their logical index.
   */
  updateTotalRows(totalRows: number): TableSession {
    const previous = this.active;
    if (!previous) {
      throw new SessionStateError("Cannot update row count before a table session has been created");
    }
    const sanitized = this.sanitizeTotalRows(totalRows);
    if (sanitized === previous.totalRows) return previous;
    const session = this.makeSession(previous.id, previous.generation, sanitized);
    this.active = session;
    this.emit({ type: "rowCount", session, previous });
    return session;
  }

  subscribe(listener: (change: TableSessionChange) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private takeGeneration(): number {
    const generation = this.nextGeneration;
    this.nextGeneration += 1;
    return generation;
  }

  private makeSession(id: string, generation: number, totalRows: number): TableSession {
    return Object.freeze({ id, generation, totalRows });
  }

  private sanitizeTotalRows(totalRows: number): number {
    if (Number.isSafeInteger(totalRows) && totalRows >= 0) return totalRows;
    const message = `totalRows must be a non-negative safe integer, got ${totalRows}`;
    if (this.strictInvariants) {
      throw new InvariantViolationError("totalRows", message);
    }
    this.logger?.warn({ invariant: "totalRows" }, message);
    return Number.isFinite(totalRows) && totalRows > 0 ? Math.floor(totalRows) : 0;
  }

  private emit(change: TableSessionChange): void {
    for (const listener of this.listeners) listener(change);
  }
}
