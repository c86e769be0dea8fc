export type {
  JsonArray,
  JsonBool,
  JsonFloat,
  JsonNull,
  JsonNumber,
  JsonNumberValue,
  JsonObject,
  JsonString,
  JsonValue,
} from "./types.js";
export { JsonParseError, JsonValueError } from "./errors.js";
export { isFloat, numberToFloat, numbersEqual } from "./number.js";
export type { JsJson } from "./build.js";
export {
  fromJs,
  jsonArray,
  jsonBool,
  jsonFloat,
  jsonInt,
  jsonNull,
  jsonObject,
  jsonString,
  sortedKeys,
  toJs,
} from "./build.js";
export { parseJson, parseYaml } from "./parse.js";
export type { RenderOptions } from "./render.js";
export { renderJson } from "./render.js";
