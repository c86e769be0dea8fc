import { formatDifference } from "@jsonassay/json-diff";

import type { DiffReport } from "./types.js";

/** Format a diff report as a human-friendly plain-text summary. */
export function formatPrettyReport(report: DiffReport): string {
  const count = report.differences.length;
  const mode = report.config.compareMode;

  const lines: string[] = [];
  lines.push(
    count === 0
      ? `jsonassay: no differences (compareMode: ${mode})`
      : `jsonassay: ${count} difference(s) (compareMode: ${mode})`
  );
  lines.push(`lhs: ${report.lhsPath}`);
  lines.push(`rhs: ${report.rhsPath}`);

  for (const d of report.differences) {
    lines.push("");
    lines.push(formatDifference(d));
  }

  return lines.join("\n");
}
