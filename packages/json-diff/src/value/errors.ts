/** Raised when a JS value has no JSON counterpart (functions, cycles, NaN, ...). */
export class JsonValueError extends Error {
  override readonly name = "JsonValueError";
}

/** Raised when JSON or YAML text cannot be read as a single document. */
export class JsonParseError extends Error {
  override readonly name = "JsonParseError";
}
