import type { RowWindowError } from "../errors";
import type { RowWindow } from "../virtualization/windowMath";

export type TableReplaceReason = "sort" | "filter" | "reset";

export type RowWindowEvent =
  | { type: "scroll"; offset: number }
  | { type: "resize"; height: number }
  | { type: "rowHeight"; rowHeight: number }
  | { type: "scrollToRow"; index: number }
  /** Import completed: a brand new table identity. */
  | { type: "tableLoaded"; tableId: string; totalRows: number; dropPrevious?: boolean }
  /**
   * Sort applied, filter view created or reset to the original table. `tableId` defaults to the
   * current one (sorts rewrite the table under the same name).
   */
  | {
      type: "tableReplaced";
      reason: TableReplaceReason;
      totalRows: number;
      tableId?: string;
      dropPrevious?: boolean;
    }
  /** Same table, different row count (progressive import). */
  | { type: "rowCountChanged"; totalRows: number };

export type RowWindowStatus =
  | { state: "idle" }
  | { state: "loading"; generation: number; window: RowWindow }
  | { state: "ready"; generation: number; window: RowWindow }
  | { state: "error"; error: RowWindowError };
