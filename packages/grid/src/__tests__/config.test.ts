import { describe, expect, it } from "vitest";
import {
  DEFAULT_MAX_PHYSICAL_EXTENT,
  RowWindowConfigError,
  defaultStrictInvariants,
  resolveRowWindowConfig
} from "../config";

describe("resolveRowWindowConfig", () => {
  it("fills in defaults", () => {
    expect(resolveRowWindowConfig()).toEqual({
      rowHeight: 32,
      bufferSize: 10,
      maxPhysicalExtent: DEFAULT_MAX_PHYSICAL_EXTENT,
      strictInvariants: true
    });
  });

  it("keeps explicit values", () => {
    expect(
      resolveRowWindowConfig({ rowHeight: 24, bufferSize: 0, maxPhysicalExtent: 1_000_000, strictInvariants: false })
    ).toEqual({ rowHeight: 24, bufferSize: 0, maxPhysicalExtent: 1_000_000, strictInvariants: false });
  });

  it("rejects non-positive row heights", () => {
    expect(() => resolveRowWindowConfig({ rowHeight: 0 })).toThrow(RowWindowConfigError);
    expect(() => resolveRowWindowConfig({ rowHeight: -4 })).toThrow(
      "Invalid row window config: rowHeight: Number must be greater than 0"
    );
  });

  it("lists every invalid field", () => {
    try {
      resolveRowWindowConfig({ bufferSize: -1, maxPhysicalExtent: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RowWindowConfigError);
      if (!(err instanceof RowWindowConfigError)) return;
      expect(err.issues.map((issue) => issue.path.join("."))).toEqual(["bufferSize", "maxPhysicalExtent"]);
    }
  });
});

describe("defaultStrictInvariants", () => {
  it("is relaxed only in production", () => {
    expect(defaultStrictInvariants({ NODE_ENV: "production" })).toBe(false);
    expect(defaultStrictInvariants({ NODE_ENV: "development" })).toBe(true);
    expect(defaultStrictInvariants({})).toBe(true);
  });
});
