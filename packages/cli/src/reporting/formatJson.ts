import {
  differenceKind,
  formatDifference,
  formatPath,
  renderJson,
  type JsonValue
} from "@jsonassay/json-diff";

import type { DiffReport } from "./types.js";

// Compact JSON text keeps ints beyond 2^53 and the int/float distinction.
function valueText(value: JsonValue | undefined): string | null {
  return value === undefined ? null : renderJson(value, { pretty: false });
}

/** Format a diff report as deterministic pretty-printed JSON. */
export function formatJsonReport(report: DiffReport): string {
  return JSON.stringify(
    {
      lhsPath: report.lhsPath,
      rhsPath: report.rhsPath,
      config: report.config,
      differenceCount: report.differences.length,
      differences: report.differences.map((d) => ({
        path: formatPath(d.path),
        kind: differenceKind(d),
        lhs: valueText(d.lhs),
        rhs: valueText(d.rhs),
        message: formatDifference(d)
      }))
    },
    null,
    2
  );
}
