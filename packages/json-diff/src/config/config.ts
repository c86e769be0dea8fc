import type { ArraySortingMode, CompareMode, Config, FloatCompareMode, NumericMode } from "./types.js";

export const FLOAT_EXACT: FloatCompareMode = Object.freeze({ kind: "exact" });

export function floatEpsilon(epsilon: number): FloatCompareMode {
  return Object.freeze({ kind: "epsilon", epsilon });
}

/** Exact array order, strict numbers, exact floats. */
export function createConfig(compareMode: CompareMode): Config {
  return Object.freeze({
    compareMode,
    arraySortingMode: "exact",
    numericMode: "strict",
    floatCompareMode: FLOAT_EXACT,
  });
}

export function withCompareMode(config: Config, compareMode: CompareMode): Config {
  return Object.freeze({ ...config, compareMode });
}

export function withArraySortingMode(config: Config, arraySortingMode: ArraySortingMode): Config {
  return Object.freeze({ ...config, arraySortingMode });
}

export function withNumericMode(config: Config, numericMode: NumericMode): Config {
  return Object.freeze({ ...config, numericMode });
}

export function withFloatCompareMode(config: Config, floatCompareMode: FloatCompareMode): Config {
  return Object.freeze({ ...config, floatCompareMode });
}
