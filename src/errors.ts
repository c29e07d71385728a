/**
 * Fatal errors. Any of these aborts a run before a report is printed;
 * step failures and undefined steps are results, not errors.
 */
export type StepshellErrorCode = "PARSE" | "CATALOG_COMPILE" | "LAUNCH" | "CONFIG" | "USAGE";

export class StepshellError extends Error {
  override readonly name: string = "StepshellError";

  constructor(
    readonly code: StepshellErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Malformed feature or implementation document. */
export class ParseError extends StepshellError {
  override readonly name = "ParseError";

  constructor(
    readonly uri: string,
    readonly line: number,
    readonly reason: string,
  ) {
    super("PARSE", `${uri}:${line}: ${reason}`);
  }
}

export class CatalogCompileError extends StepshellError {
  override readonly name = "CatalogCompileError";

  constructor(
    readonly source: string,
    readonly line: number,
    readonly pattern: string,
    reason: string,
  ) {
    super("CATALOG_COMPILE", `${source}:${line}: invalid step pattern "${pattern}": ${reason}`);
  }
}

/** The command interpreter could not be found or started. */
export class LaunchError extends StepshellError {
  override readonly name = "LaunchError";

  constructor(
    readonly interpreter: string | null,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("LAUNCH", message, options);
  }
}

export class ConfigError extends StepshellError {
  override readonly name = "ConfigError";

  constructor(message: string) {
    super("CONFIG", message);
  }
}

/** Bad command line, or nothing to run. */
export class UsageError extends StepshellError {
  override readonly name = "UsageError";

  constructor(message: string) {
    super("USAGE", message);
  }
}

export function isStepshellError(error: unknown): error is StepshellError {
  return error instanceof StepshellError;
}
