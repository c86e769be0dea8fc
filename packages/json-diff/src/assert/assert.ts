import { createConfig } from "../config/config.js";
import type { Config } from "../config/types.js";
import { diff } from "../diff/diff.js";
import { formatDifferences, type Difference } from "../diff/difference.js";
import { fromJs } from "../value/build.js";
import type { JsonValue } from "../value/types.js";

export type MatchResult =
  | { ok: true }
  | {
      ok: false;
      differences: Difference[];
      /** {@link formatDifferences} of `differences`. */
      message: string;
    };

/** Thrown by the `assertJson*` helpers; the message lists every difference. */
export class JsonMismatchError extends Error {
  override readonly name = "JsonMismatchError";
  readonly differences: readonly Difference[];

  constructor(differences: readonly Difference[]) {
    super(formatDifferences(differences));
    this.differences = differences;
  }
}

export function matchJsonValues(lhs: JsonValue, rhs: JsonValue, config: Config): MatchResult {
  const differences = diff(lhs, rhs, config);
  if (differences.length === 0) return { ok: true };
  return { ok: false, differences, message: formatDifferences(differences) };
}

/**
 * Compare two plain JS values (converted with `fromJs`) without throwing.
 *
 * Throws `JsonValueError` only when an input has no JSON form.
 */
export function matchJson(lhs: unknown, rhs: unknown, config: Config): MatchResult {
  return matchJsonValues(fromJs(lhs), fromJs(rhs), config);
}

export function assertJsonMatches(lhs: unknown, rhs: unknown, config: Config): void {
  const result = matchJson(lhs, rhs, config);
  if (!result.ok) {
    throw new JsonMismatchError(result.differences);
  }
}

/** `actual` must contain everything in `expected`; extra data in `actual` is fine. */
export function assertJsonInclude(args: { actual: unknown; expected: unknown }): void {
  assertJsonMatches(args.actual, args.expected, createConfig("inclusive"));
}

/** Both values must be equal. */
export function assertJsonEq(lhs: unknown, rhs: unknown): void {
  assertJsonMatches(lhs, rhs, createConfig("strict"));
}
