import type { z } from "zod";

export type TableOperation = "open" | "sort" | "filter" | "reset";

/**
 * A workbench operation (import, sort, filter, reset) could not be completed. The workbench state
 * and the row window are left as they were before the call.
 */
export class TableOperationError extends Error {
  readonly operation: TableOperation;

  constructor(operation: TableOperation, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TableOperationError";
    this.operation = operation;
  }
}

export class InvalidFilterError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    const summary = issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    super(`Invalid filter: ${summary}`);
    this.name = "InvalidFilterError";
    this.issues = issues;
  }
}

export class UnknownTableError extends Error {
  readonly tableId: string;

  constructor(tableId: string) {
    super(`Table not found: ${tableId}`);
    this.name = "UnknownTableError";
    this.tableId = tableId;
  }
}

export class UnknownColumnError extends Error {
  readonly tableId: string;
  readonly column: string;

  constructor(tableId: string, column: string) {
    super(`Column "${column}" does not exist in ${tableId}`);
    this.name = "UnknownColumnError";
    this.tableId = tableId;
    this.column = column;
  }
}
