/**
 * - `inclusive`: the rhs is the expected subset; keys and indices only
 *   present on the lhs (the actual value) are ignored.
 * - `strict`: both sides must match exactly.
 */
export type CompareMode = "inclusive" | "strict";

/** `ignore` compares arrays as multisets under the same diff relation. */
export type ArraySortingMode = "exact" | "ignore";

/**
 * - `strict`: ints and floats are different values (`1` vs `1.0`).
 * - `assumeFloat`: every number is compared as a double.
 */
export type NumericMode = "strict" | "assumeFloat";

/**
 * Applies only when both numbers are compared as doubles.
 *
 * `epsilon` is an absolute margin, combined with a 4-ULP relative margin.
 * It is not validated: a negative epsilon simply never widens the match.
 */
export type FloatCompareMode =
  | { readonly kind: "exact" }
  | { readonly kind: "epsilon"; readonly epsilon: number };

export interface Config {
  readonly compareMode: CompareMode;
  readonly arraySortingMode: ArraySortingMode;
  readonly numericMode: NumericMode;
  readonly floatCompareMode: FloatCompareMode;
}
