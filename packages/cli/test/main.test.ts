import { describe, expect, it } from "vitest";

import { main, usage } from "../src/cli.js";
import { captureWriter, tempDirWith } from "./helpers.js";

async function run(argv: string[], cwd: string): Promise<{ code: number; stdout: string; stderr: string }> {
  const stdout = captureWriter();
  const stderr = captureWriter();
  const code = await main(argv, { cwd, stdout: stdout.writer, stderr: stderr.writer });
  return { code, stdout: stdout.text(), stderr: stderr.text() };
}

describe("main", () => {
  it("exits 0 when the documents match", async () => {
    const dir = await tempDirWith({
      "a.json": '{"a": 1, "b": [1, 2]}',
      "b.json": '{"b": [1, 2], "a": 1}'
    });

    const result = await run(["a.json", "b.json"], dir);

    expect(result.code).toBe(0);
    expect(result.stdout).toBe("jsonassay: no differences (compareMode: strict)\nlhs: a.json\nrhs: b.json\n");
    expect(result.stderr).toBe("");
  });

  it("reports keys missing on either side in strict mode", async () => {
    const dir = await tempDirWith({ "a.json": '{"a": 1}', "b.json": '{"b": 1}' });

    const result = await run(["a.json", "b.json"], dir);

    expect(result.code).toBe(1);
    expect(result.stdout).toBe(
      [
        "jsonassay: 2 difference(s) (compareMode: strict)",
        "lhs: a.json",
        "rhs: b.json",
        "",
        'json atom at path ".a" is missing from rhs',
        "",
        'json atom at path ".b" is missing from lhs',
        ""
      ].join("\n")
    );
  });

  it("compares a YAML expectation inclusively", async () => {
    const dir = await tempDirWith({
      "actual.json": '{"a": 1, "extra": true}',
      "expected.yml": "a: 2\n"
    });

    const result = await run(["--mode", "inclusive", "actual.json", "expected.yml"], dir);

    expect(result.code).toBe(1);
    expect(result.stdout).toBe(
      [
        "jsonassay: 1 difference(s) (compareMode: inclusive)",
        "lhs: actual.json",
        "rhs: expected.yml",
        "",
        'json atoms at path ".a" are not equal:',
        "    expected:",
        "        2",
        "    actual:",
        "        1",
        ""
      ].join("\n")
    );
  });

  it("picks up jsonassay.yml from the working directory", async () => {
    const dir = await tempDirWith({
      "jsonassay.yml": "schemaVersion: 1\ncompareMode: inclusive\n",
      "a.json": '{"a": 1, "extra": true}',
      "b.json": '{"a": 1}'
    });

    const result = await run(["a.json", "b.json"], dir);

    expect(result.code).toBe(0);
    expect(result.stdout.split("\n")[0]).toBe("jsonassay: no differences (compareMode: inclusive)");
  });

  it("lets flags override the config file", async () => {
    const dir = await tempDirWith({
      "jsonassay.yml": "schemaVersion: 1\ncompareMode: inclusive\n",
      "a.json": '{"a": 1, "extra": true}',
      "b.json": '{"a": 1}'
    });

    const result = await run(["--mode", "strict", "a.json", "b.json"], dir);

    expect(result.code).toBe(1);
    expect(result.stdout).toContain('json atom at path ".extra" is missing from rhs');
  });

  it("writes a JSON report", async () => {
    const dir = await tempDirWith({ "a.json": "[1]", "b.json": "[1, 2.0]" });

    const result = await run(["--format", "json", "a.json", "b.json"], dir);

    expect(result.code).toBe(1);
    expect(JSON.parse(result.stdout)).toEqual({
      lhsPath: "a.json",
      rhsPath: "b.json",
      config: {
        compareMode: "strict",
        arraySortingMode: "exact",
        numericMode: "strict",
        floatCompareMode: { kind: "exact" }
      },
      differenceCount: 1,
      differences: [
        {
          path: "[1]",
          kind: "missingFromLhs",
          lhs: null,
          rhs: "2.0",
          message: 'json atom at path "[1]" is missing from lhs'
        }
      ]
    });
  });

  it("applies --numeric and --epsilon", async () => {
    const dir = await tempDirWith({ "a.json": '{"x": 1, "y": 0.1}', "b.json": '{"x": 1.0, "y": 0.12}' });

    const exact = await run(["a.json", "b.json"], dir);
    const loose = await run(["--numeric", "assume-float", "--epsilon", "0.05", "a.json", "b.json"], dir);

    expect(exact.code).toBe(1);
    expect(loose.code).toBe(0);
  });

  it("exits 2 on unparseable input", async () => {
    const dir = await tempDirWith({ "a.json": "{", "b.json": "{}" });

    const result = await run(["a.json", "b.json"], dir);

    expect(result.code).toBe(2);
    expect(result.stdout).toBe("");
    expect(result.stderr.startsWith("error: a.json: invalid JSON: ")).toBe(true);
  });

  it("exits 2 on a missing input", async () => {
    const dir = await tempDirWith({ "b.json": "{}" });

    const result = await run(["missing.json", "b.json"], dir);

    expect(result.code).toBe(2);
    expect(result.stderr).toBe("error: input not found: missing.json\n");
  });

  it("exits 2 with usage on bad arguments", async () => {
    const dir = await tempDirWith({});

    const result = await run([], dir);

    expect(result.code).toBe(2);
    expect(result.stderr).toBe(`error: expected exactly two files <lhs> <rhs> (got 0)\n\n${usage()}\n`);
  });

  it("prints usage for --help", async () => {
    const dir = await tempDirWith({});

    const result = await run(["--help"], dir);

    expect(result.code).toBe(0);
    expect(result.stdout).toBe(`${usage()}\n`);
  });
});
