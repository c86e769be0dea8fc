export * from "./value/index.js";

export type { ArraySortingMode, CompareMode, Config, FloatCompareMode, NumericMode } from "./config/types.js";
export {
  FLOAT_EXACT,
  createConfig,
  floatEpsilon,
  withArraySortingMode,
  withCompareMode,
  withFloatCompareMode,
  withNumericMode,
} from "./config/config.js";

export type { Path, PathKey } from "./diff/path.js";
export { ROOT_PATH, appendPath, fieldKey, formatPath, formatPathKey, idxKey, pathKeys } from "./diff/path.js";
export type { Difference, DifferenceKind, DifferenceSides } from "./diff/difference.js";
export { differenceKind, formatDifference, formatDifferences } from "./diff/difference.js";
export { diff, matches } from "./diff/diff.js";
export { approxEqual, ulpsBetween } from "./diff/float.js";

export type { MatchResult } from "./assert/assert.js";
export {
  JsonMismatchError,
  assertJsonEq,
  assertJsonInclude,
  assertJsonMatches,
  matchJson,
  matchJsonValues,
} from "./assert/assert.js";
