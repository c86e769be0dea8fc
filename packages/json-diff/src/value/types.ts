/**
 * Numbers keep the representation they were written in: `1` is an `int`,
 * `1.0` is a `float`. Strict numeric comparison relies on the distinction.
 */
export type JsonNumber =
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "float"; readonly value: number };

export type JsonFloat = Extract<JsonNumber, { kind: "float" }>;

export type JsonNull = { readonly kind: "null" };
export type JsonBool = { readonly kind: "bool"; readonly value: boolean };
export type JsonNumberValue = { readonly kind: "number"; readonly value: JsonNumber };
export type JsonString = { readonly kind: "string"; readonly value: string };
export type JsonArray = { readonly kind: "array"; readonly items: readonly JsonValue[] };

/** Object keys are unique; insertion order carries no meaning. */
export type JsonObject = {
  readonly kind: "object";
  readonly entries: ReadonlyMap<string, JsonValue>;
};

export type JsonValue = JsonNull | JsonBool | JsonNumberValue | JsonString | JsonArray | JsonObject;

