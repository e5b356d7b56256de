import { z } from "zod";

/**
 * Browsers stop honoring element heights somewhere around 2^25 px (33,554,432). Stay safely below.
 */
export const DEFAULT_MAX_PHYSICAL_EXTENT = 33_000_000;
export const DEFAULT_ROW_HEIGHT = 32;
export const DEFAULT_BUFFER_SIZE = 10;

export const rowWindowConfigSchema = z.object({
  rowHeight: z.number().finite().positive().default(DEFAULT_ROW_HEIGHT),
  bufferSize: z.number().int().nonnegative().default(DEFAULT_BUFFER_SIZE),
  maxPhysicalExtent: z.number().finite().positive().default(DEFAULT_MAX_PHYSICAL_EXTENT),
  /**
   * When true, invariant violations (negative row counts, extents over the ceiling) throw.
   * When false they are clamped and logged.
   */
  strictInvariants: z.boolean().optional()
});

export type RowWindowConfigInput = z.input<typeof rowWindowConfigSchema>;

export interface RowWindowConfig {
  rowHeight: number;
  bufferSize: number;
  maxPhysicalExtent: number;
  strictInvariants: boolean;
}

export class RowWindowConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    const summary = issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    super(`Invalid row window config: ${summary}`);
    this.name = "RowWindowConfigError";
    this.issues = issues;
  }
}

export function defaultStrictInvariants(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV !== "production";
}

export function resolveRowWindowConfig(input: RowWindowConfigInput = {}): RowWindowConfig {
  const parsed = rowWindowConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new RowWindowConfigError(parsed.error.issues);
  }
  return {
    rowHeight: parsed.data.rowHeight,
    bufferSize: parsed.data.bufferSize,
    maxPhysicalExtent: parsed.data.maxPhysicalExtent,
    strictInvariants: parsed.data.strictInvariants ?? defaultStrictInvariants()
  };
}
