import fs from "node:fs/promises";
import path from "node:path";

import { JsonParseError, parseJson, parseYaml, type JsonValue } from "@jsonassay/json-diff";

import { InputError } from "../util/errors.js";

export type DocumentFormat = "json" | "yaml";

/** `.json` files are read as JSON; everything else as YAML (a JSON superset). */
export function documentFormatForPath(filePath: string): DocumentFormat {
  return path.extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
}

export async function readDocument(cwd: string, filePath: string): Promise<JsonValue> {
  const absPath = path.resolve(cwd, filePath);

  let text: string;
  try {
    text = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "ENOENT") {
      throw new InputError(`input not found: ${filePath}`);
    }
    const msg = err instanceof Error ? err.message : String(err);
    throw new InputError(`failed to read ${filePath}: ${msg}`);
  }

  try {
    return documentFormatForPath(filePath) === "json"
      ? parseJson(text, { sourceName: filePath })
      : parseYaml(text, { sourceName: filePath });
  } catch (err) {
    if (err instanceof JsonParseError) {
      throw new InputError(err.message);
    }
    throw err;
  }
}
