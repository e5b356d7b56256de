import type { ScaleMapping } from "./ScaleMapper";

/** Half-open logical row range `[startIndex, startIndex + count)`. */
export interface RowWindow {
  readonly startIndex: number;
  readonly count: number;
}

export interface Viewport {
  physicalScrollOffset: number;
  physicalHeight: number;
}

/** Unbuffered visible rows, `end` exclusive. */
export interface VisibleRange {
  start: number;
  end: number;
}

export const EMPTY_WINDOW: RowWindow = Object.freeze({ startIndex: 0, count: 0 });

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function toLogical(offset: number, mapping: ScaleMapping): number {
  return (offset * mapping.scaleFactor) / mapping.rowHeight;
}

export function computeVisibleRange(viewport: Viewport, mapping: ScaleMapping): VisibleRange {
  const offset = Math.max(0, viewport.physicalScrollOffset);
  const height = Math.max(0, viewport.physicalHeight);
  return {
    start: Math.floor(toLogical(offset, mapping)),
    end: Math.ceil(toLogical(offset + height, mapping))
  };
}

/**
 * Buffered row window for the viewport, clamped to `[0, totalRows]`.
 */
export function computeWindow(viewport: Viewport, mapping: ScaleMapping, bufferSize: number): RowWindow {
  const totalRows = mapping.totalRows;
  if (totalRows <= 0) return EMPTY_WINDOW;

  const buffer = Math.max(0, Math.floor(bufferSize));
  const visible = computeVisibleRange(viewport, mapping);

  const startIndex = clamp(visible.start - buffer, 0, totalRows);
  const endIndex = clamp(visible.end + buffer, 0, totalRows);
  return { startIndex, count: Math.max(0, endIndex - startIndex) };
}

export function windowEnd(window: RowWindow): number {
  return window.startIndex + window.count;
}

export function windowsEqual(a: RowWindow, b: RowWindow): boolean {
  return a.startIndex === b.startIndex && a.count === b.count;
}

export function windowContains(outer: RowWindow, inner: RowWindow): boolean {
  if (inner.count === 0) return true;
  return outer.startIndex <= inner.startIndex && windowEnd(inner) <= windowEnd(outer);
}
