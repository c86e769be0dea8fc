export type SourcePathSegment = string | number;

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Format a JSONPath-like pointer (e.g. `$.foo[0].bar`) for conversion errors. */
export function formatSourcePath(path: readonly SourcePathSegment[]): string {
  let out = "$";

  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
      continue;
    }

    if (IDENTIFIER_RE.test(segment)) {
      out += `.${segment}`;
      continue;
    }

    out += `[${JSON.stringify(segment)}]`;
  }

  return out;
}
