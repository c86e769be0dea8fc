export { main, parseCliArgs, usage } from "./cli.js";
export type { CliOptions, ParseResult } from "./cli.js";
export { loadConfig, parseConfigObject } from "./config/loadConfig.js";
export { resolveConfig } from "./config/resolveConfig.js";
export { documentFormatForPath, readDocument } from "./input/readDocument.js";
export { formatJsonReport } from "./reporting/formatJson.js";
export { formatPrettyReport } from "./reporting/formatPretty.js";
export { ConfigError, InputError, UsageError } from "./util/errors.js";
export type { ComparisonSettings, JsonAssayConfig } from "./config/types.js";
export type { DocumentFormat } from "./input/readDocument.js";
export type { DiffReport } from "./reporting/types.js";
export type { MainIo, TextWriter } from "./util/io.js";
