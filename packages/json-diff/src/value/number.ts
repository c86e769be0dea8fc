import type { JsonFloat, JsonNumber } from "./types.js";

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

export function isFloat(n: JsonNumber): n is JsonFloat {
  return n.kind === "float";
}

/** Representation equality: an int never equals a float. */
export function numbersEqual(a: JsonNumber, b: JsonNumber): boolean {
  if (a.kind === "int" && b.kind === "int") return a.value === b.value;
  if (a.kind === "float" && b.kind === "float") return a.value === b.value;
  return false;
}

/**
 * Best-effort conversion to a double.
 *
 * Ints outside the safe-integer range return `undefined`: they would lose
 * precision, so they are not interchangeable with floats.
 */
export function numberToFloat(n: JsonNumber): number | undefined {
  if (n.kind === "float") return n.value;
  if (!isSafeIntegerBigInt(n.value)) return undefined;
  return Number(n.value);
}

export function isSafeIntegerBigInt(value: bigint): boolean {
  return value <= MAX_SAFE && value >= MIN_SAFE;
}
