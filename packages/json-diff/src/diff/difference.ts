import { assertNever, invariant } from "@jsonassay/core";

import type { Config } from "../config/types.js";
import { renderJson } from "../value/render.js";
import type { JsonValue } from "../value/types.js";
import { formatPath, type Path } from "./path.js";

/** At least one side is always present. */
export type DifferenceSides =
  | { readonly lhs: JsonValue; readonly rhs: JsonValue }
  | { readonly lhs: undefined; readonly rhs: JsonValue }
  | { readonly lhs: JsonValue; readonly rhs: undefined };

/**
 * One located disagreement between the two documents.
 *
 * `config` is the configuration that produced it; the display wording
 * depends on its compare mode.
 */
export type Difference = DifferenceSides & {
  readonly path: Path;
  readonly config: Config;
};

export type DifferenceKind = "notEqual" | "missingFromActual" | "missingFromLhs" | "missingFromRhs";

export function differenceKind(d: Difference): DifferenceKind {
  const { lhs, rhs } = d;
  const mode = d.config.compareMode;

  invariant(lhs !== undefined || rhs !== undefined, "difference has neither an lhs nor an rhs value");
  if (lhs !== undefined && rhs !== undefined) return "notEqual";

  switch (mode) {
    case "inclusive":
      invariant(lhs === undefined, "inclusive comparisons never report a value missing from expected");
      return "missingFromActual";
    case "strict":
      return lhs === undefined ? "missingFromLhs" : "missingFromRhs";
    default:
      return assertNever(mode, "Unknown compare mode");
  }
}

function indent(text: string, spaces: number): string {
  const pad = " ".repeat(spaces);
  return text
    .split("\n")
    .map((line) => pad + line)
    .join("\n");
}

function pretty(value: JsonValue | undefined): string {
  invariant(value !== undefined, "cannot render an absent side of a difference");
  return indent(renderJson(value), 8);
}

/**
 * Human-readable message for one difference.
 *
 * The wording, line breaks and indentation are stable output.
 */
export function formatDifference(d: Difference): string {
  const path = formatPath(d.path);
  const kind = differenceKind(d);

  switch (kind) {
    case "notEqual": {
      const [firstLabel, first, secondLabel, second] =
        d.config.compareMode === "inclusive"
          ? (["expected", d.rhs, "actual", d.lhs] as const)
          : (["lhs", d.lhs, "rhs", d.rhs] as const);
      return [
        `json atoms at path "${path}" are not equal:`,
        `    ${firstLabel}:`,
        pretty(first),
        `    ${secondLabel}:`,
        pretty(second),
      ].join("\n");
    }
    case "missingFromActual":
      return `json atom at path "${path}" is missing from actual`;
    case "missingFromLhs":
      return `json atom at path "${path}" is missing from lhs`;
    case "missingFromRhs":
      return `json atom at path "${path}" is missing from rhs`;
    default:
      return assertNever(kind, "Unknown difference kind");
  }
}

/** All messages, separated by a blank line. */
export function formatDifferences(differences: readonly Difference[]): string {
  return differences.map(formatDifference).join("\n\n");
}
