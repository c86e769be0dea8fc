/**
 * Thrown when traversal or formatting code reaches a state its own
 * bookkeeping rules out. Seeing one means a bug in jsonassay, not bad input.
 */
export class InvariantError extends Error {
  override readonly name = "InvariantError";
}

/**
* Assert that a condition is truthy.
*
* Throws {@link InvariantError} when the assertion fails.
*/
export function invariant(condition: unknown, message = "Invariant violation"): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
* Exhaustiveness helper for `switch` statements over tagged unions.
*
* Throws {@link InvariantError} if called.
*/
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new InvariantError(`${message}: ${describeUnexpected(value)}`);
}

function describeUnexpected(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value) {
    return `kind=${String(value.kind)}`;
  }
  return String(value);
}
