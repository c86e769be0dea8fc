#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { diff, floatEpsilon } from "@jsonassay/json-diff";

import { loadConfig } from "./config/loadConfig.js";
import { resolveConfig } from "./config/resolveConfig.js";
import { DEFAULT_CONFIG_PATH, type ComparisonSettings } from "./config/types.js";
import { readDocument } from "./input/readDocument.js";
import { formatJsonReport } from "./reporting/formatJson.js";
import { formatPrettyReport } from "./reporting/formatPretty.js";
import type { DiffReport } from "./reporting/types.js";
import { ConfigError, InputError, UsageError } from "./util/errors.js";
import type { MainIo } from "./util/io.js";

type OutputFormat = "pretty" | "json";

/** Options parsed from CLI flags (after validation). */
export interface CliOptions {
  lhsPath: string;
  rhsPath: string;
  format: OutputFormat;
  configPath?: string;
  settings: ComparisonSettings;
}

export type ParseResult =
  | {
      kind: "help";
    }
  | {
      kind: "run";
      options: CliOptions;
    };

/**
 * Returns a help/usage string for the `jsonassay` CLI.
 */
export function usage(): string {
  return [
    "jsonassay: structural diff of two JSON/YAML documents",
    "",
    "Usage:",
    "  jsonassay [flags] <lhs> <rhs>",
    "",
    "In inclusive mode <lhs> is the actual document and <rhs> the expected subset.",
    "Files ending in .json are parsed as JSON, anything else as YAML.",
    "",
    "Flags:",
    `  --config <path>                  Config file (default: ${DEFAULT_CONFIG_PATH} when present)`,
    "  --mode inclusive|strict          Compare mode (default: strict)",
    "  --array-order exact|ignore       Whether array order matters (default: exact)",
    "  --numeric strict|assume-float    Keep ints and floats apart, or compare all as floats",
    "  --epsilon <number>               Absolute margin for float comparison",
    "  --format pretty|json             Output format (default: pretty)",
    "",
    "Exit codes:",
    "  0 = no differences",
    "  1 = differences found",
    "  2 = config/usage/input error"
  ].join("\n");
}

function flagValue(argv: string[], i: number, flag: string, placeholder: string): string {
  const next = argv[i + 1];
  if (!next || next.startsWith("--")) {
    throw new UsageError(`${flag} requires a ${placeholder}`);
  }
  return next;
}

/**
 * Parses raw CLI argv into a strongly-typed run or help request.
 */
export function parseCliArgs(rawArgv: string[]): ParseResult {
  const argv: string[] = [];
  const positionals: string[] = [];
  let parsingFlags = true;

  for (const arg of rawArgv) {
    if (parsingFlags && arg === "--") {
      parsingFlags = false;
      continue;
    }

    if (parsingFlags) {
      argv.push(arg);
    } else {
      positionals.push(arg);
    }
  }

  let configPath: string | undefined;
  let format: OutputFormat = "pretty";
  const settings: ComparisonSettings = {};
  const flagPositionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;

    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }

    if (arg === "--config") {
      configPath = flagValue(argv, i, "--config", "<path>");
      i++;
      continue;
    }

    if (arg === "--format") {
      const next = argv[i + 1];
      if (next !== "pretty" && next !== "json") {
        throw new UsageError("--format must be one of: pretty, json");
      }
      format = next;
      i++;
      continue;
    }

    if (arg === "--mode") {
      const next = argv[i + 1];
      if (next !== "inclusive" && next !== "strict") {
        throw new UsageError("--mode must be one of: inclusive, strict");
      }
      settings.compareMode = next;
      i++;
      continue;
    }

    if (arg === "--array-order") {
      const next = argv[i + 1];
      if (next !== "exact" && next !== "ignore") {
        throw new UsageError("--array-order must be one of: exact, ignore");
      }
      settings.arraySortingMode = next;
      i++;
      continue;
    }

    if (arg === "--numeric") {
      const next = argv[i + 1];
      if (next !== "strict" && next !== "assume-float") {
        throw new UsageError("--numeric must be one of: strict, assume-float");
      }
      settings.numericMode = next === "assume-float" ? "assumeFloat" : "strict";
      i++;
      continue;
    }

    if (arg === "--epsilon") {
      const raw = flagValue(argv, i, "--epsilon", "<number>");
      const epsilon = Number(raw);
      if (raw.trim() === "" || !Number.isFinite(epsilon)) {
        throw new UsageError(`--epsilon must be a finite number (got ${raw})`);
      }
      settings.floatCompareMode = floatEpsilon(epsilon);
      i++;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`unknown flag: ${arg}`);
    }

    flagPositionals.push(arg);
  }

  const files = [...flagPositionals, ...positionals];
  const [lhsPath, rhsPath] = files;
  if (files.length !== 2 || lhsPath === undefined || rhsPath === undefined) {
    throw new UsageError(`expected exactly two files <lhs> <rhs> (got ${files.length})`);
  }

  return {
    kind: "run",
    options: {
      lhsPath,
      rhsPath,
      format,
      ...(configPath ? { configPath } : {}),
      settings
    }
  };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function resolveConfigPath(options: CliOptions, cwd: string): Promise<string | undefined> {
  if (options.configPath) return options.configPath;
  return (await fileExists(path.resolve(cwd, DEFAULT_CONFIG_PATH))) ? DEFAULT_CONFIG_PATH : undefined;
}

/**
 * CLI entrypoint: loads config, diffs both documents, and writes a formatted report.
 */
export async function main(rawArgv: string[], io: MainIo): Promise<number> {
  try {
    const parsed = parseCliArgs(rawArgv);

    if (parsed.kind === "help") {
      io.stdout.write(`${usage()}\n`);
      return 0;
    }

    const { options } = parsed;

    const configPath = await resolveConfigPath(options, io.cwd);
    const fileSettings = configPath
      ? (await loadConfig({ cwd: io.cwd, configPath, stderr: io.stderr })).config.settings
      : {};

    const config = resolveConfig(fileSettings, options.settings);

    const [lhs, rhs] = await Promise.all([
      readDocument(io.cwd, options.lhsPath),
      readDocument(io.cwd, options.rhsPath)
    ]);

    const report: DiffReport = {
      lhsPath: options.lhsPath,
      rhsPath: options.rhsPath,
      config,
      differences: diff(lhs, rhs, config)
    };

    const out = options.format === "json" ? formatJsonReport(report) : formatPrettyReport(report);

    io.stdout.write(`${out}\n`);

    return report.differences.length > 0 ? 1 : 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);

    if (err instanceof UsageError) {
      io.stderr.write(`error: ${message}\n\n${usage()}\n`);
      return 2;
    }

    if (err instanceof ConfigError || err instanceof InputError) {
      io.stderr.write(`error: ${message}\n`);
      return 2;
    }

    io.stderr.write(`error: ${err instanceof Error ? `${err.name}: ${message}` : message}\n`);
    return 2;
  }
}

const isMain =
  process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isMain) {
  void main(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: process.stdout,
    stderr: process.stderr
  }).then((code) => {
    process.exitCode = code;
  });
}
