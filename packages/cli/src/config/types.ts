import type { ArraySortingMode, CompareMode, FloatCompareMode, NumericMode } from "@jsonassay/json-diff";

/**
 * Comparison settings that may come from the config file or from flags.
 * Anything left unset falls back to the library defaults.
 */
export interface ComparisonSettings {
  compareMode?: CompareMode;
  arraySortingMode?: ArraySortingMode;
  numericMode?: NumericMode;
  floatCompareMode?: FloatCompareMode;
}

export interface JsonAssayConfig {
  schemaVersion: 1;
  settings: ComparisonSettings;
}

export const KNOWN_CONFIG_KEYS = [
  "schemaVersion",
  "compareMode",
  "arraySortingMode",
  "numericMode",
  "floatCompareMode"
] as const;

export type KnownConfigKey = (typeof KNOWN_CONFIG_KEYS)[number];

export const DEFAULT_CONFIG_PATH = "jsonassay.yml";
