import { DEFAULT_MAX_PHYSICAL_EXTENT, DEFAULT_ROW_HEIGHT } from "../config";
import { InvariantViolationError } from "../errors";
import type { Logger } from "../logger";

export interface ScaleMapping {
  readonly rowHeight: number;
  readonly totalRows: number;
  /** Always >= 1. Logical pixels per physical pixel. */
  readonly scaleFactor: number;
  readonly maxPhysicalExtent: number;
}

/**
 * Ratio that compresses `totalRows * rowHeight` logical pixels into at most `maxExtent`
 * physical pixels.
 *
 * A plain `full / maxExtent` can leave `full / factor` one ulp above `maxExtent`, so the factor is
 * nudged upward until the spacer extent computed from it respects the ceiling exactly.
 */
export function computeScaleFactor(totalRows: number, rowHeight: number, maxExtent: number): number {
  const fullExtent = totalRows * rowHeight;
  if (!(fullExtent > maxExtent)) return 1;

  let factor = fullExtent / maxExtent;
  while (fullExtent / factor > maxExtent) {
    factor *= 1 + Number.EPSILON;
  }
  return factor;
}

export function spacerExtent(totalRows: number, rowHeight: number, scaleFactor: number): number {
  return (totalRows * rowHeight) / scaleFactor;
}

export interface ScaleMapperOptions {
  rowHeight?: number;
  maxPhysicalExtent?: number;
  totalRows?: number;
  strictInvariants?: boolean;
  logger?: Logger;
}

/**
 * Bidirectional mapping between logical row positions and the bounded physical scroll space of the
 * host surface.
 */
export class ScaleMapper {
  private readonly maxPhysicalExtent: number;
  private readonly strictInvariants: boolean;
  private readonly logger: Logger | undefined;

  private rowHeight: number;
  private totalRows = 0;
  private scaleFactor = 1;
  private mapping: ScaleMapping;

  constructor(options: ScaleMapperOptions = {}) {
    const rowHeight = options.rowHeight ?? DEFAULT_ROW_HEIGHT;
    const maxPhysicalExtent = options.maxPhysicalExtent ?? DEFAULT_MAX_PHYSICAL_EXTENT;
    if (!Number.isFinite(rowHeight) || rowHeight <= 0) {
      throw new InvariantViolationError("rowHeight", `rowHeight must be a positive finite number, got ${rowHeight}`);
    }
    if (!Number.isFinite(maxPhysicalExtent) || maxPhysicalExtent <= 0) {
      throw new InvariantViolationError("maxPhysicalExtent", `maxPhysicalExtent must be a positive finite number, got ${maxPhysicalExtent}`);
    }

    this.rowHeight = rowHeight;
    this.maxPhysicalExtent = maxPhysicalExtent;
    this.strictInvariants = options.strictInvariants ?? false;
    this.logger = options.logger;
    this.totalRows = this.sanitizeTotalRows(options.totalRows ?? 0);
    this.scaleFactor = computeScaleFactor(this.totalRows, this.rowHeight, this.maxPhysicalExtent);
    this.mapping = this.snapshot();
  }

  getMapping(): ScaleMapping {
    return this.mapping;
  }

  getTotalRows(): number {
    return this.totalRows;
  }

  getRowHeight(): number {
    return this.rowHeight;
  }

  getScaleFactor(): number {
    return this.scaleFactor;
  }

  /**
   * Returns true when the mapping changed. Callers must then re-evaluate their row window: the
   * physical scroll offset is still valid but now points at different logical rows.
   */
  setTotalRows(totalRows: number): boolean {
    const next = this.sanitizeTotalRows(totalRows);
    if (next === this.totalRows) return false;
    this.totalRows = next;
    this.recompute();
    return true;
  }

  setRowHeight(rowHeight: number): boolean {
    if (!Number.isFinite(rowHeight) || rowHeight <= 0) {
      this.violation("rowHeight", `rowHeight must be a positive finite number, got ${rowHeight}`);
      return false;
    }
    if (rowHeight === this.rowHeight) return false;
    this.rowHeight = rowHeight;
    this.recompute();
    return true;
  }

  logicalToPhysical(index: number): number {
    return (index * this.rowHeight) / this.scaleFactor;
  }

  /** Fractional logical row position; floor/ceil at the call site. */
  physicalToLogical(offset: number): number {
    return (offset * this.scaleFactor) / this.rowHeight;
  }

  getSpacerExtent(): number {
    return spacerExtent(this.totalRows, this.rowHeight, this.scaleFactor);
  }

  getMaxScrollOffset(viewportHeight: number): number {
    return Math.max(0, this.getSpacerExtent() - Math.max(0, viewportHeight));
  }

  private recompute(): void {
    this.scaleFactor = computeScaleFactor(this.totalRows, this.rowHeight, this.maxPhysicalExtent);
    const extent = this.getSpacerExtent();
    if (extent > this.maxPhysicalExtent) {
      this.violation("spacerExtent", `spacer extent ${extent} exceeds ceiling ${this.maxPhysicalExtent}`);
    }
    this.mapping = this.snapshot();
  }

  private snapshot(): ScaleMapping {
    return Object.freeze({
      rowHeight: this.rowHeight,
      totalRows: this.totalRows,
      scaleFactor: this.scaleFactor,
      maxPhysicalExtent: this.maxPhysicalExtent
    });
  }

  private sanitizeTotalRows(totalRows: number): number {
    if (Number.isSafeInteger(totalRows) && totalRows >= 0) return totalRows;
    this.violation("totalRows", `totalRows must be a non-negative safe integer, got ${totalRows}`);
    if (!Number.isFinite(totalRows) || totalRows < 0) return 0;
    return Math.min(Math.floor(totalRows), Number.MAX_SAFE_INTEGER);
  }

  private violation(invariant: string, message: string): void {
    if (this.strictInvariants) {
      throw new InvariantViolationError(invariant, message);
    }
    this.logger?.warn({ invariant }, message);
  }
}
