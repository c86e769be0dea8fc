/** Error used for invalid CLI usage / flag combinations. */
export class UsageError extends Error {
  override name = "UsageError";
}

/** Error used for an invalid or unreadable jsonassay configuration file. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/** Error used when an input document cannot be read or parsed. */
export class InputError extends Error {
  override name = "InputError";
}
