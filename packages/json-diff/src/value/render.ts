import { sortedKeys } from "./build.js";
import type { JsonNumber, JsonValue } from "./types.js";

export interface RenderOptions {
  /** Two-space indented multi-line output (default: true). */
  pretty?: boolean;
}

/**
 * Shortest round-trip digits of a float, laid out as `123.0`, `0.0012` or
 * `1.5e16`. Decimal form is used while the decimal exponent stays in
 * (-5, 16]; floats always carry a fraction or exponent so they never read
 * as ints.
 */
function renderFloat(x: number): string {
  if (x === 0) return Object.is(x, -0) ? "-0.0" : "0.0";

  const sign = x < 0 ? "-" : "";
  const [mantissa = "", exponent = "0"] = Math.abs(x).toExponential().split("e");
  const digits = mantissa.replace(".", "");
  // Position of the decimal point relative to the first digit.
  const point = Number(exponent) + 1;
  const trailingZeros = point - digits.length;

  if (trailingZeros >= 0 && point <= 16) return `${sign}${digits}${"0".repeat(trailingZeros)}.0`;
  if (point > 0 && point <= 16) return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
  if (point > -5 && point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;

  const fraction = digits.length > 1 ? `.${digits.slice(1)}` : "";
  return `${sign}${digits.slice(0, 1)}${fraction}e${point - 1}`;
}

function renderNumber(n: JsonNumber): string {
  return n.kind === "int" ? n.value.toString() : renderFloat(n.value);
}

function renderInto(value: JsonValue, pretty: boolean, indent: string): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "number":
      return renderNumber(value.value);
    case "string":
      return JSON.stringify(value.value);
    case "array": {
      if (value.items.length === 0) return "[]";
      const inner = indent + "  ";
      const parts = value.items.map((item) => renderInto(item, pretty, inner));
      return pretty ? `[\n${inner}${parts.join(`,\n${inner}`)}\n${indent}]` : `[${parts.join(",")}]`;
    }
    case "object": {
      if (value.entries.size === 0) return "{}";
      const inner = indent + "  ";
      const parts: string[] = [];
      for (const key of sortedKeys(value.entries)) {
        const child = value.entries.get(key);
        if (child === undefined) continue;
        const sep = pretty ? ": " : ":";
        parts.push(`${JSON.stringify(key)}${sep}${renderInto(child, pretty, inner)}`);
      }
      return pretty ? `{\n${inner}${parts.join(`,\n${inner}`)}\n${indent}}` : `{${parts.join(",")}}`;
    }
  }
}

/**
 * Canonical text form of a value, used when displaying differences.
 *
 * Object keys are written in sorted order.
 */
export function renderJson(value: JsonValue, options: RenderOptions = {}): string {
  return renderInto(value, options.pretty ?? true, "");
}
