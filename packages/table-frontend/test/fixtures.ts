import type { CellScalar } from "../src/index.js";

export const SALES_COLUMNS = ["id", "region", "amount", "active"] as const;

export function salesRows(): CellScalar[][] {
  return [
    [1, "north", 120, true],
    [2, "south", 80, false],
    [3, "north", null, true],
    [4, "east", 200, false],
    [5, "south", 120, true]
  ];
}
