import type { FloatCompareMode } from "../config/types.js";

/** ULP margin applied alongside an absolute epsilon. */
export const DEFAULT_ULPS = 4n;

const scratch = new DataView(new ArrayBuffer(8));

function bits(x: number): bigint {
  scratch.setFloat64(0, x);
  return scratch.getBigInt64(0);
}

/** Distance between two doubles in units of least precision. */
export function ulpsBetween(a: number, b: number): bigint {
  const d = BigInt.asIntN(64, bits(a) - bits(b));
  return d < 0n ? -d : d;
}

/** `a === b`, or within `epsilon` absolutely, or within `ulps` ULPs. */
export function approxEqual(a: number, b: number, epsilon: number, ulps: bigint = DEFAULT_ULPS): boolean {
  if (a === b) return true;
  if (Math.abs(a - b) <= epsilon) return true;
  return ulpsBetween(a, b) <= ulps;
}

export function floatsMatch(a: number, b: number, mode: FloatCompareMode): boolean {
  return mode.kind === "epsilon" ? approxEqual(a, b, mode.epsilon) : a === b;
}
