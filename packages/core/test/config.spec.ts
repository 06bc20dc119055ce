import { describe, it, expect } from "vitest";
import { parseInferenceConfig, resolveOptions } from "../src/config";
import { catchTagSqlError, errorCodeOf } from "./helpers";

describe("resolveOptions", () => {
  it("defaults to DDL output with the default finalization", () => {
    expect(resolveOptions({})).toEqual({
      finalization: { kind: "default" },
      skipColumns: false,
      output: "ddl",
      annotateRelations: false,
    });
  });

  it("selects duplicate-keys mode", () => {
    expect(resolveOptions({ duplicateKeys: true }).finalization).toEqual({ kind: "duplicate-keys" });
  });

  it("selects max-columns mode with its threshold", () => {
    expect(resolveOptions({ duplicateKeys: false, maxColumnsThreshold: 3 }).finalization).toEqual({
      kind: "max-columns",
      threshold: 3,
    });
  });

  it("maps the remaining flags", () => {
    expect(
      resolveOptions({ skipColumns: true, header: "x", relationReport: true, annotateRelations: true }),
    ).toEqual({
      finalization: { kind: "default" },
      skipColumns: true,
      header: "x",
      output: "relations",
      annotateRelations: true,
    });
  });

  it("rejects duplicate keys together with a threshold", () => {
    const err = catchTagSqlError(() => resolveOptions({ duplicateKeys: true, maxColumnsThreshold: 0 }));

    expect(err.code).toBe("CONFIGURATION_CONFLICT");
    expect(err.message).toContain('"duplicateKeys" and "maxColumnsThreshold"');
  });

  it("rejects negative or fractional thresholds", () => {
    expect(errorCodeOf(() => resolveOptions({ maxColumnsThreshold: -1 }))).toBe("INVALID_CONFIGURATION");
    expect(errorCodeOf(() => resolveOptions({ maxColumnsThreshold: 1.5 }))).toBe("INVALID_CONFIGURATION");
  });
});

describe("parseInferenceConfig", () => {
  it("rejects unknown keys and wrong types", () => {
    expect(errorCodeOf(() => parseInferenceConfig({ etc: 2 }))).toBe("INVALID_CONFIGURATION");
    expect(errorCodeOf(() => parseInferenceConfig({ header: 5 }))).toBe("INVALID_CONFIGURATION");
    expect(errorCodeOf(() => parseInferenceConfig("nope"))).toBe("INVALID_CONFIGURATION");
  });

  it("names the offending field", () => {
    const err = catchTagSqlError(() => parseInferenceConfig({ skipColumns: "yes" }));
    expect(err.message).toContain("skipColumns:");
  });
});
