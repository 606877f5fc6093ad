/**
 * Error taxonomy shared by every plugin.
 *
 * Each class carries a stable `code` that the API error handler maps to an
 * HTTP status and that front ends can switch on without instanceof checks.
 */

import type { ValidationIssue } from "../../../src/utils/validate.js";

export type RollcallErrorCode =
  | "CONFIG_LOAD"
  | "CONFIG_PARSE"
  | "CONFIG_VALIDATION"
  | "CONFIG_NOT_FOUND"
  | "NO_STAGED_CONFIG"
  | "STATE_SAVE"
  | "STATE_LOAD"
  | "DISCORD_API";

export class RollcallError extends Error {
  constructor(
    readonly code: RollcallErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A config file exists but could not be read */
export class ConfigLoadError extends RollcallError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super("CONFIG_LOAD", `Failed to read ${path}: ${describeError(cause)}`, { cause });
  }
}

/** A config payload is not valid JSON */
export class ConfigParseError extends RollcallError {
  constructor(
    readonly source: string,
    cause: unknown,
  ) {
    super("CONFIG_PARSE", `Invalid JSON in ${source}: ${describeError(cause)}`, { cause });
  }
}

/** A config payload is JSON of the wrong shape */
export class ConfigValidationError extends RollcallError {
  constructor(
    readonly source: string,
    readonly issues: ValidationIssue[],
  ) {
    super("CONFIG_VALIDATION", `Invalid ${source}: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ")}`);
  }
}

export class ConfigNotFoundError extends RollcallError {
  constructor(readonly what: string) {
    super("CONFIG_NOT_FOUND", `${what} not found`);
  }
}

export class NoStagedConfigError extends RollcallError {
  constructor() {
    super("NO_STAGED_CONFIG", "No staged configuration to commit");
  }
}

export class StateSaveError extends RollcallError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super("STATE_SAVE", `Failed to save state to ${path}: ${describeError(cause)}`, { cause });
  }
}

export class StateLoadError extends RollcallError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super("STATE_LOAD", `Failed to load state from ${path}: ${describeError(cause)}`, { cause });
  }
}

export class DiscordApiError extends RollcallError {
  constructor(message: string, cause?: unknown) {
    super("DISCORD_API", cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
  }
}

export function isRollcallError(error: unknown): error is RollcallError {
  return error instanceof RollcallError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP status for an error surfaced through the admin API
 */
export function httpStatusFor(error: unknown): number {
  if (!isRollcallError(error)) return 500;
  switch (error.code) {
    case "CONFIG_PARSE":
    case "CONFIG_VALIDATION":
      return 400;
    case "CONFIG_NOT_FOUND":
      return 404;
    case "NO_STAGED_CONFIG":
      return 409;
    case "DISCORD_API":
      return 502;
    default:
      return 500;
  }
}
