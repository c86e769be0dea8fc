import { describe, expect, it } from "vitest";

import { jsonObject, jsonInt, jsonFloat } from "@jsonassay/json-diff";

import { documentFormatForPath, readDocument } from "../src/input/readDocument.js";
import { InputError } from "../src/util/errors.js";
import { tempDirWith } from "./helpers.js";

describe("documentFormatForPath", () => {
  it("reads .json as JSON and everything else as YAML", () => {
    expect(documentFormatForPath("a.json")).toBe("json");
    expect(documentFormatForPath("dir/B.JSON")).toBe("json");
    expect(documentFormatForPath("a.yml")).toBe("yaml");
    expect(documentFormatForPath("a")).toBe("yaml");
  });
});

describe("readDocument", () => {
  it("parses YAML documents", async () => {
    const dir = await tempDirWith({ "doc.yaml": "n: 1\nf: 1.5\n" });

    await expect(readDocument(dir, "doc.yaml")).resolves.toEqual(
      jsonObject({ n: jsonInt(1), f: jsonFloat(1.5) })
    );
  });

  it("wraps parse failures as input errors", async () => {
    const dir = await tempDirWith({ "dup.json": '{"a": 1, "a": 2}' });

    await expect(readDocument(dir, "dup.json")).rejects.toBeInstanceOf(InputError);
    await expect(readDocument(dir, "dup.json")).rejects.toThrow(/^dup\.json: invalid JSON: /);
  });

  it("reports missing files", async () => {
    const dir = await tempDirWith({});

    await expect(readDocument(dir, "nope.json")).rejects.toThrow("input not found: nope.json");
  });
});
