import { JsonValueError } from "./errors.js";
import { isSafeIntegerBigInt } from "./number.js";
import { formatSourcePath, type SourcePathSegment } from "./sourcePath.js";
import type {
  JsonArray,
  JsonBool,
  JsonNull,
  JsonNumberValue,
  JsonObject,
  JsonString,
  JsonValue,
} from "./types.js";

export const jsonNull: JsonNull = Object.freeze({ kind: "null" });

export function jsonBool(value: boolean): JsonBool {
  return { kind: "bool", value };
}

/** Integer number. A JS `number` must be a safe integer. */
export function jsonInt(value: bigint | number): JsonNumberValue {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new JsonValueError(`not a safe integer: ${value}`);
  }
  return { kind: "number", value: { kind: "int", value: BigInt(value) } };
}

export function jsonFloat(value: number): JsonNumberValue {
  if (!Number.isFinite(value)) {
    throw new JsonValueError(`JSON numbers must be finite (got ${value})`);
  }
  return { kind: "number", value: { kind: "float", value } };
}

export function jsonString(value: string): JsonString {
  return { kind: "string", value };
}

export function jsonArray(items: readonly JsonValue[]): JsonArray {
  return { kind: "array", items };
}

export function jsonObject(fields: Readonly<Record<string, JsonValue>>): JsonObject {
  return { kind: "object", entries: new Map(Object.entries(fields)) };
}

/** Object keys in the order comparison and rendering visit them. */
export function sortedKeys(entries: ReadonlyMap<string, JsonValue>): string[] {
  return [...entries.keys()].sort();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  if (Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function convert(value: unknown, path: SourcePathSegment[], seen: Set<object>): JsonValue {
  if (value === null) return jsonNull;
  if (typeof value === "boolean") return jsonBool(value);
  if (typeof value === "string") return jsonString(value);
  if (typeof value === "bigint") return jsonInt(value);

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new JsonValueError(`${formatSourcePath(path)}: JSON numbers must be finite (got ${value})`);
    }
    return Number.isSafeInteger(value) ? jsonInt(value) : jsonFloat(value);
  }

  if (typeof value !== "object") {
    throw new JsonValueError(`${formatSourcePath(path)}: unsupported value of type ${typeof value}`);
  }

  if (seen.has(value)) {
    throw new JsonValueError(`${formatSourcePath(path)}: cyclic reference`);
  }

  if (Array.isArray(value)) {
    seen.add(value);
    const items = value.map((item: unknown, index) => convert(item, [...path, index], seen));
    seen.delete(value);
    return jsonArray(items);
  }

  if (!isPlainObject(value)) {
    const tag = Object.prototype.toString.call(value);
    throw new JsonValueError(`${formatSourcePath(path)}: unsupported object ${tag}`);
  }

  seen.add(value);
  const entries = new Map<string, JsonValue>();
  for (const [key, child] of Object.entries(value)) {
    entries.set(key, convert(child, [...path, key], seen));
  }
  seen.delete(value);
  return { kind: "object", entries };
}

/**
 * Convert plain JS data into a {@link JsonValue}.
 *
 * `bigint`s and safe-integer `number`s become ints, any other finite number a
 * float. Use {@link jsonFloat} to build an integral float such as `1.0`.
 */
export function fromJs(value: unknown): JsonValue {
  return convert(value, [], new Set());
}

export type JsJson = null | boolean | number | bigint | string | JsJson[] | { [key: string]: JsJson };

/** Inverse of {@link fromJs}; ints outside the safe range stay `bigint`. */
export function toJs(value: JsonValue): JsJson {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "string":
      return value.value;
    case "number": {
      const n = value.value;
      if (n.kind === "float") return n.value;
      return isSafeIntegerBigInt(n.value) ? Number(n.value) : n.value;
    }
    case "array":
      return value.items.map(toJs);
    case "object": {
      const out: { [key: string]: JsJson } = {};
      for (const key of sortedKeys(value.entries)) {
        const child = value.entries.get(key);
        if (child !== undefined) {
          Object.defineProperty(out, key, { value: toJs(child), enumerable: true, writable: true, configurable: true });
        }
      }
      return out;
    }
  }
}
