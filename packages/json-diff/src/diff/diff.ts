import { assertNever, invariant } from "@jsonassay/core";

import type { Config } from "../config/types.js";
import { sortedKeys } from "../value/build.js";
import { isFloat, numberToFloat, numbersEqual } from "../value/number.js";
import type {
  JsonArray,
  JsonBool,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
  JsonValue,
} from "../value/types.js";
import type { Difference } from "./difference.js";
import { floatsMatch } from "./float.js";
import { ROOT_PATH, appendPath, fieldKey, idxKey, type Path } from "./path.js";

/**
 * Compare `lhs` against `rhs` and list every place they disagree.
 *
 * In `inclusive` mode `lhs` is the actual value and `rhs` the expected
 * subset. Differences come out depth-first, visiting array indices in
 * ascending order and object keys in sorted order.
 *
 * Recursion follows the nesting of the inputs, so documents nested deeper
 * than the JS call stack allows (several thousand levels) overflow it.
 * With `arraySortingMode: "ignore"` each array pair costs O(n·m) nested
 * comparisons.
 */
export function diff(lhs: JsonValue, rhs: JsonValue, config: Config): Difference[] {
  const acc: Difference[] = [];
  diffAt(lhs, rhs, config, ROOT_PATH, acc);
  return acc;
}

/** True when {@link diff} would report nothing. */
export function matches(lhs: JsonValue, rhs: JsonValue, config: Config): boolean {
  return diff(lhs, rhs, config).length === 0;
}

function diffAt(lhs: JsonValue, rhs: JsonValue, config: Config, path: Path, acc: Difference[]): void {
  switch (lhs.kind) {
    case "null":
    case "bool":
    case "string":
      if (!atomsEqual(lhs, rhs)) acc.push({ path, config, lhs, rhs });
      return;
    case "number":
      if (!numbersMatch(lhs.value, rhs, config)) acc.push({ path, config, lhs, rhs });
      return;
    case "array":
      if (config.arraySortingMode === "ignore") {
        diffArrayContains(lhs, rhs, config, path, acc);
      } else {
        diffArray(lhs, rhs, config, path, acc);
      }
      return;
    case "object":
      diffObject(lhs, rhs, config, path, acc);
      return;
    default:
      assertNever(lhs, "Unknown JSON value");
  }
}

function atomsEqual(lhs: JsonNull | JsonBool | JsonString, rhs: JsonValue): boolean {
  switch (lhs.kind) {
    case "null":
      return rhs.kind === "null";
    case "bool":
      return rhs.kind === "bool" && rhs.value === lhs.value;
    case "string":
      return rhs.kind === "string" && rhs.value === lhs.value;
  }
}

function numbersMatch(lhs: JsonNumber, rhs: JsonValue, config: Config): boolean {
  if (rhs.kind !== "number") return false;
  const other = rhs.value;

  switch (config.numericMode) {
    case "strict":
      if (isFloat(lhs) && isFloat(other)) {
        return floatsMatch(lhs.value, other.value, config.floatCompareMode);
      }
      return numbersEqual(lhs, other);
    case "assumeFloat": {
      const a = numberToFloat(lhs);
      const b = numberToFloat(other);
      if (a === undefined || b === undefined) return numbersEqual(lhs, other);
      return floatsMatch(a, b, config.floatCompareMode);
    }
    default:
      return assertNever(config.numericMode, "Unknown numeric mode");
  }
}

/** Recurse when both sides have the child, otherwise record the one-sided gap. */
function diffChild(
  lhs: JsonValue | undefined,
  rhs: JsonValue | undefined,
  config: Config,
  path: Path,
  acc: Difference[],
): void {
  if (lhs !== undefined && rhs !== undefined) {
    diffAt(lhs, rhs, config, path, acc);
  } else if (rhs !== undefined) {
    acc.push({ path, config, lhs: undefined, rhs });
  } else {
    invariant(lhs !== undefined, "at least one side should have the key");
    acc.push({ path, config, lhs, rhs: undefined });
  }
}

function diffArray(lhs: JsonArray, rhs: JsonValue, config: Config, path: Path, acc: Difference[]): void {
  if (rhs.kind !== "array") {
    acc.push({ path, config, lhs, rhs });
    return;
  }

  // Inclusive: only indices the expected array has. Strict: the union of both.
  const length =
    config.compareMode === "inclusive" ? rhs.items.length : Math.max(lhs.items.length, rhs.items.length);

  for (let index = 0; index < length; index++) {
    diffChild(lhs.items[index], rhs.items[index], config, appendPath(path, idxKey(index)), acc);
  }
}

function countMatching(items: readonly JsonValue[], predicate: (item: JsonValue) => boolean, limit: number): number {
  let count = 0;
  for (const item of items) {
    if (count >= limit) break;
    if (predicate(item)) count++;
  }
  return count;
}

/**
 * Order-ignoring comparison: every rhs item, counted with its duplicates,
 * must match at least as many lhs items. The first shortfall reports the
 * whole array once.
 */
function diffArrayContains(
  lhs: JsonArray,
  rhs: JsonValue,
  config: Config,
  path: Path,
  acc: Difference[],
): void {
  if (rhs.kind !== "array") {
    acc.push({ path, config, lhs, rhs });
    return;
  }

  if (config.compareMode === "strict" && lhs.items.length !== rhs.items.length) {
    acc.push({ path, config, lhs, rhs });
    return;
  }

  for (const expected of rhs.items) {
    const need = countMatching(rhs.items, (item) => matches(expected, item, config), Infinity);
    const have = countMatching(lhs.items, (item) => matches(item, expected, config), need);

    if (have < need) {
      acc.push({ path, config, lhs, rhs });
      return;
    }
  }
}

function diffObject(lhs: JsonObject, rhs: JsonValue, config: Config, path: Path, acc: Difference[]): void {
  if (rhs.kind !== "object") {
    acc.push({ path, config, lhs, rhs });
    return;
  }

  let keys: string[];
  switch (config.compareMode) {
    case "inclusive":
      keys = sortedKeys(rhs.entries);
      break;
    case "strict":
      keys = [...new Set([...rhs.entries.keys(), ...lhs.entries.keys()])].sort();
      break;
    default:
      return assertNever(config.compareMode, "Unknown compare mode");
  }

  for (const key of keys) {
    diffChild(lhs.entries.get(key), rhs.entries.get(key), config, appendPath(path, fieldKey(key)), acc);
  }
}
