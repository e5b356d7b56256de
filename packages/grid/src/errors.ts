import type { RowWindow } from "./virtualization/windowMath";

/**
 * A windowed fetch failed inside the table provider (engine unreachable, table dropped mid-flight,
 * provider-side timeout, ...).
 *
 * Recoverable: the controller surfaces it as an error status and the next scroll tick may
 * re-issue the same window.
 */
export class ProviderFetchError extends Error {
  readonly tableId: string;
  readonly generation: number;
  readonly window: RowWindow;

  constructor(
    message: string,
    params: { tableId: string; generation: number; window: RowWindow; cause?: unknown }
  ) {
    super(message, { cause: params.cause });
    this.name = "ProviderFetchError";
    this.tableId = params.tableId;
    this.generation = params.generation;
    this.window = params.window;
  }
}

/**
 * Programming fault in row/extent bookkeeping (negative row counts, spacer over the ceiling, ...).
 *
 * Thrown only when `strictInvariants` is enabled; otherwise the offending value is clamped.
 */
export class InvariantViolationError extends Error {
  readonly invariant: string;

  constructor(invariant: string, message: string) {
    super(message);
    this.name = "InvariantViolationError";
    this.invariant = invariant;
  }
}

export class RenderSinkError extends Error {
  readonly operation: "renderBatch" | "clear" | "setSpacerExtent" | "setScrollOffset";

  constructor(operation: RenderSinkError["operation"], cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Render sink ${operation} failed: ${detail}`, { cause });
    this.name = "RenderSinkError";
    this.operation = operation;
  }
}

export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionStateError";
  }
}

export type RowWindowError = ProviderFetchError | RenderSinkError;

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
