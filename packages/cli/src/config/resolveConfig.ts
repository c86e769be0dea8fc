import {
  createConfig,
  withArraySortingMode,
  withFloatCompareMode,
  withNumericMode,
  type Config
} from "@jsonassay/json-diff";

import type { ComparisonSettings } from "./types.js";

/**
 * Merge settings (later layers win) into a comparison config.
 *
 * Without an explicit compare mode the CLI compares strictly.
 */
export function resolveConfig(...layers: ComparisonSettings[]): Config {
  const merged = layers.reduce<ComparisonSettings>((acc, layer) => ({ ...acc, ...layer }), {});

  let config = createConfig(merged.compareMode ?? "strict");
  if (merged.arraySortingMode) config = withArraySortingMode(config, merged.arraySortingMode);
  if (merged.numericMode) config = withNumericMode(config, merged.numericMode);
  if (merged.floatCompareMode) config = withFloatCompareMode(config, merged.floatCompareMode);
  return config;
}
