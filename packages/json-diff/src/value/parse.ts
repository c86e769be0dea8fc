import { parseDocument } from "yaml";

import { jsonArray, jsonBool, jsonFloat, jsonInt, jsonNull, jsonString } from "./build.js";
import { JsonParseError } from "./errors.js";
import { formatSourcePath, type SourcePathSegment } from "./sourcePath.js";
import type { JsonValue } from "./types.js";

type SourceSchema = "json" | "core";

function objectKey(key: unknown, path: readonly SourcePathSegment[]): string {
  if (typeof key === "string") return key;
  if (key === null || typeof key === "boolean" || typeof key === "number" || typeof key === "bigint") {
    return String(key);
  }
  throw new JsonParseError(`${formatSourcePath(path)}: object keys must be scalars`);
}

function fromParsed(value: unknown, path: SourcePathSegment[]): JsonValue {
  if (value === null) return jsonNull;
  if (typeof value === "boolean") return jsonBool(value);
  if (typeof value === "string") return jsonString(value);

  // With `intAsBigInt`, integer literals arrive as bigint and every other
  // number literal (`1.0`, `1e3`) as a double.
  if (typeof value === "bigint") return jsonInt(value);
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new JsonParseError(`${formatSourcePath(path)}: number out of range (${value})`);
    }
    return jsonFloat(value);
  }

  if (Array.isArray(value)) {
    return jsonArray(value.map((item: unknown, index) => fromParsed(item, [...path, index])));
  }

  if (value instanceof Map) {
    const entries = new Map<string, JsonValue>();
    for (const [rawKey, child] of value) {
      const key = objectKey(rawKey, path);
      entries.set(key, fromParsed(child, [...path, key]));
    }
    return { kind: "object", entries };
  }

  const tag = Object.prototype.toString.call(value);
  throw new JsonParseError(`${formatSourcePath(path)}: unsupported value ${tag}`);
}

function parseWith(text: string, schema: SourceSchema, sourceName: string | undefined): JsonValue {
  const label = schema === "json" ? "JSON" : "YAML";
  const prefix = sourceName ? `${sourceName}: ` : "";

  const doc = parseDocument(text, { schema, intAsBigInt: true, uniqueKeys: true });

  const [first] = doc.errors;
  if (first) {
    throw new JsonParseError(`${prefix}invalid ${label}: ${first.message}`);
  }

  if (doc.contents === null) {
    throw new JsonParseError(`${prefix}invalid ${label}: empty document`);
  }

  try {
    return fromParsed(doc.toJS({ mapAsMap: true }), []);
  } catch (err) {
    if (err instanceof JsonParseError && prefix) {
      throw new JsonParseError(`${prefix}${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse JSON text, keeping int and float literals apart (`1` vs `1.0`).
 *
 * Duplicate object keys are rejected.
 */
export function parseJson(text: string, options?: { sourceName?: string }): JsonValue {
  return parseWith(text, "json", options?.sourceName);
}

/** Parse a single YAML document (YAML 1.2 core schema) into a {@link JsonValue}. */
export function parseYaml(text: string, options?: { sourceName?: string }): JsonValue {
  return parseWith(text, "core", options?.sourceName);
}
