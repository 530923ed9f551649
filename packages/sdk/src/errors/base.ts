/**
 * Error hierarchy for verb dispatch.
 *
 * Recoverable dispatch failures are reported as negative errno results, not
 * exceptions. These classes cover programming errors (malformed tables, a bad
 * argument cursor), configuration failures, and probe diagnostics.
 */

export class VerbgateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "VerbgateError";
  }
}

/**
 * An environment probe could not decide. Carried inside an indeterminate
 * ProbeResult and logged at debug level; never thrown by the probes.
 */
export class ProbeError extends VerbgateError {
  public readonly errno: number;

  constructor(
    public readonly probe: string,
    message: string,
    options: { errno: number; cause?: Error },
  ) {
    super(`${probe}: ${message}`, "PROBE_INDETERMINATE", { cause: options.cause });
    this.name = "ProbeError";
    this.errno = options.errno;
  }
}

export class VerbTableError extends VerbgateError {
  constructor(message: string) {
    super(message, "VERB_TABLE_INVALID");
    this.name = "VerbTableError";
  }
}

export class ArgumentCursorError extends VerbgateError {
  constructor(
    public readonly cursor: number,
    public readonly argc: number,
  ) {
    super(`Argument cursor ${cursor} is outside [0, ${argc}]`, "ARGUMENT_CURSOR_OUT_OF_RANGE");
    this.name = "ArgumentCursorError";
  }
}

export class ConfigError extends VerbgateError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}
