export type PathKey =
  | { readonly kind: "idx"; readonly index: number }
  | { readonly kind: "field"; readonly name: string };

/**
 * Location of a value inside the root document.
 *
 * Paths are persistent: {@link appendPath} links a new node to its parent, so
 * sibling branches extend one shared prefix without copying it.
 */
export type Path =
  | { readonly kind: "root" }
  | { readonly kind: "keys"; readonly parent: Path; readonly key: PathKey };

export const ROOT_PATH: Path = Object.freeze({ kind: "root" });

export function idxKey(index: number): PathKey {
  return { kind: "idx", index };
}

export function fieldKey(name: string): PathKey {
  return { kind: "field", name };
}

export function appendPath(path: Path, key: PathKey): Path {
  return Object.freeze({ kind: "keys", parent: path, key });
}

/** Keys from the root down. */
export function pathKeys(path: Path): PathKey[] {
  const keys: PathKey[] = [];
  let node = path;
  while (node.kind === "keys") {
    keys.push(node.key);
    node = node.parent;
  }
  return keys.reverse();
}

export function formatPathKey(key: PathKey): string {
  return key.kind === "idx" ? `[${key.index}]` : `.${key.name}`;
}

/** `(root)`, or keys rendered as `[0]` / `.name` in order, e.g. `.items[2].id`. */
export function formatPath(path: Path): string {
  if (path.kind === "root") return "(root)";
  return pathKeys(path).map(formatPathKey).join("");
}
