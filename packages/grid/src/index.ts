export type { FetchWindowResult, RenderSink, RowBatch, TableProvider } from "./model/TableProvider";
export { MockTableProvider } from "./model/MockTableProvider";
export type { MockCellValue, MockRow, MockTableProviderOptions } from "./model/MockTableProvider";

export {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_MAX_PHYSICAL_EXTENT,
  DEFAULT_ROW_HEIGHT,
  RowWindowConfigError,
  defaultStrictInvariants,
  resolveRowWindowConfig,
  rowWindowConfigSchema
} from "./config";
export type { RowWindowConfig, RowWindowConfigInput } from "./config";

export { createGridLogger } from "./logger";
export type { CreateGridLoggerOptions, Logger } from "./logger";

export {
  InvariantViolationError,
  ProviderFetchError,
  RenderSinkError,
  SessionStateError,
  describeError
} from "./errors";
export type { RowWindowError } from "./errors";

export { ScaleMapper, computeScaleFactor, spacerExtent } from "./virtualization/ScaleMapper";
export type { ScaleMapperOptions, ScaleMapping } from "./virtualization/ScaleMapper";
export {
  EMPTY_WINDOW,
  computeVisibleRange,
  computeWindow,
  windowContains,
  windowEnd,
  windowsEqual
} from "./virtualization/windowMath";
export type { RowWindow, Viewport, VisibleRange } from "./virtualization/windowMath";
export { computeScrollbarThumb } from "./virtualization/scrollbarMath";
export type { ScrollbarThumb } from "./virtualization/scrollbarMath";

export { TableSessionRegistry } from "./session/TableSessionRegistry";
export type {
  TableSession,
  TableSessionChange,
  TableSessionRegistryOptions,
  TableSessionRegistryState
} from "./session/TableSessionRegistry";

export { FetchOrchestrator } from "./fetch/FetchOrchestrator";
export type { FetchDiscardReason, FetchOrchestratorOptions, FetchRequest } from "./fetch/FetchOrchestrator";

export { RowWindowController } from "./controller/RowWindowController";
export type { RowWindowControllerOptions, RowWindowSnapshot } from "./controller/RowWindowController";
export type { RowWindowEvent, RowWindowStatus, TableReplaceReason } from "./controller/events";
