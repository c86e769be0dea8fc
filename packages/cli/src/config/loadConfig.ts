import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";

import YAML from "yaml";

import { floatEpsilon, FLOAT_EXACT, type FloatCompareMode } from "@jsonassay/json-diff";

import { ConfigError } from "../util/errors.js";
import type { TextWriter } from "../util/io.js";
import { KNOWN_CONFIG_KEYS, type ComparisonSettings, type JsonAssayConfig, type KnownConfigKey } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isKnownConfigKey(key: string): key is KnownConfigKey {
  return KNOWN_CONFIG_KEYS.some((known) => known === key);
}

function assertOneOf<T extends string>(key: string, value: unknown, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(`${key} must be one of: ${allowed.join(", ")} (got ${JSON.stringify(value)})`);
  }
  return match;
}

function assertFloatCompareMode(value: unknown): FloatCompareMode {
  if (value === "exact") return FLOAT_EXACT;

  if (isRecord(value)) {
    const epsilon = value.epsilon;
    if (typeof epsilon === "number" && Number.isFinite(epsilon)) {
      return floatEpsilon(epsilon);
    }
    throw new ConfigError("floatCompareMode.epsilon must be a finite number");
  }

  throw new ConfigError('floatCompareMode must be "exact" or { epsilon: <number> }');
}

/** Validate a parsed config document. Unknown keys are reported through `onUnknownKeys`. */
export function parseConfigObject(
  parsed: unknown,
  onUnknownKeys: (keys: string[]) => void = () => {}
): JsonAssayConfig {
  if (!isRecord(parsed)) {
    throw new ConfigError("config root must be an object");
  }

  const schemaVersion = parsed.schemaVersion;
  if (schemaVersion !== 1) {
    throw new ConfigError(`schemaVersion must be 1 (got ${String(schemaVersion)})`);
  }

  const unknownKeys = Object.keys(parsed).filter((key) => !isKnownConfigKey(key));
  if (unknownKeys.length > 0) {
    onUnknownKeys(unknownKeys.sort());
  }

  const settings: ComparisonSettings = {};

  if (parsed.compareMode !== undefined) {
    settings.compareMode = assertOneOf("compareMode", parsed.compareMode, ["inclusive", "strict"]);
  }
  if (parsed.arraySortingMode !== undefined) {
    settings.arraySortingMode = assertOneOf("arraySortingMode", parsed.arraySortingMode, ["exact", "ignore"]);
  }
  if (parsed.numericMode !== undefined) {
    settings.numericMode = assertOneOf("numericMode", parsed.numericMode, ["strict", "assumeFloat"]);
  }
  if (parsed.floatCompareMode !== undefined) {
    settings.floatCompareMode = assertFloatCompareMode(parsed.floatCompareMode);
  }

  return { schemaVersion: 1, settings };
}

export interface LoadConfigOptions {
  cwd: string;
  configPath: string;
  stderr?: TextWriter;
}

export async function loadConfig(
  opts: LoadConfigOptions
): Promise<{ configPath: string; config: JsonAssayConfig }> {
  const absPath = path.resolve(opts.cwd, opts.configPath);
  const stderr = opts.stderr ?? process.stderr;

  let raw: string;
  try {
    raw = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;

    if (code === "ENOENT") {
      throw new ConfigError(`config not found: ${opts.configPath}`);
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new ConfigError(`cannot read config (permission denied): ${opts.configPath}`);
    }

    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to read config ${opts.configPath}: ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid YAML in ${opts.configPath}: ${msg}`);
  }

  const config = parseConfigObject(parsed, (keys) => {
    stderr.write(`warning: unknown key(s) in ${opts.configPath}: ${keys.join(", ")} (ignoring)\n`);
  });

  return { configPath: opts.configPath, config };
}
