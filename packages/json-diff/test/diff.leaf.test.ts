import { describe, expect, it } from "vitest";

import {
  createConfig,
  diff,
  floatEpsilon,
  formatPath,
  parseJson as j,
  withFloatCompareMode,
  withNumericMode,
} from "../src/index.js";

const inclusive = createConfig("inclusive");
const assumeFloat = withNumericMode(inclusive, "assumeFloat");
const assumeFloatEpsilon = withFloatCompareMode(assumeFloat, floatEpsilon(0.2));

describe("diff (leaf values)", () => {
  it("compares null, booleans and strings directly", () => {
    expect(diff(j("null"), j("null"), inclusive)).toEqual([]);
    expect(diff(j("false"), j("false"), inclusive)).toEqual([]);
    expect(diff(j("true"), j("true"), inclusive)).toEqual([]);
    expect(diff(j("false"), j("true"), inclusive)).toHaveLength(1);
    expect(diff(j("true"), j("false"), inclusive)).toHaveLength(1);
    expect(diff(j('"a"'), j('"b"'), inclusive)).toHaveLength(1);
  });

  it("reports a type mismatch as one difference at the current path", () => {
    const diffs = diff(j('"1"'), j("1"), inclusive);
    expect(diffs).toHaveLength(1);
    expect(formatPath(diffs[0]!.path)).toBe("(root)");
    expect(diffs[0]!.lhs).toEqual({ kind: "string", value: "1" });
    expect(diffs[0]!.rhs).toEqual({ kind: "number", value: { kind: "int", value: 1n } });

    expect(diff(j("null"), j("false"), inclusive)).toHaveLength(1);
    expect(diff(j("1"), j('"1"'), inclusive)).toHaveLength(1);
  });

  it("compares ints and floats by representation in strict numeric mode", () => {
    expect(diff(j("1"), j("1"), inclusive)).toEqual([]);
    expect(diff(j("2"), j("1"), inclusive)).toHaveLength(1);
    expect(diff(j("1"), j("2"), inclusive)).toHaveLength(1);
    expect(diff(j("1.0"), j("1.0"), inclusive)).toEqual([]);
    expect(diff(j("1"), j("1.0"), inclusive)).toHaveLength(1);
    expect(diff(j("1.0"), j("1"), inclusive)).toHaveLength(1);
  });

  it("treats every number as a float in assumeFloat mode", () => {
    expect(diff(j("1"), j("1.0"), assumeFloat)).toEqual([]);
    expect(diff(j("1.0"), j("1"), assumeFloat)).toEqual([]);
  });

  it("applies the epsilon margin to floats", () => {
    expect(diff(j("1.15"), j("1"), assumeFloatEpsilon)).toEqual([]);
    expect(diff(j("1.25"), j("1"), assumeFloatEpsilon)).toHaveLength(1);

    const strictNumbers = withFloatCompareMode(inclusive, floatEpsilon(0.1));
    expect(diff(j("1.0"), j("1.05"), strictNumbers)).toEqual([]);
  });

  it("does not apply the epsilon to ints in strict numeric mode", () => {
    const config = withFloatCompareMode(inclusive, floatEpsilon(2.0));
    expect(diff(j("2"), j("1"), config)).toHaveLength(1);
  });

  it("falls back to representation equality for ints beyond the float-safe range", () => {
    expect(diff(j("9007199254740993"), j("9007199254740993"), assumeFloat)).toEqual([]);
    expect(diff(j("9007199254740993"), j("9007199254740992.0"), assumeFloat)).toHaveLength(1);
  });
});
