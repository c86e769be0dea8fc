import type { Config, Difference } from "@jsonassay/json-diff";

/** Outcome of diffing two documents from disk. */
export interface DiffReport {
  lhsPath: string;
  rhsPath: string;
  config: Config;
  differences: Difference[];
}
