import { Result } from "better-result";
import { ValidationError } from "@lxconf/errors";
import { isLogLevel, type LogLevel } from "@lxconf/logger";

export interface CliConfig {
  logLevel: LogLevel;
  legacyNumbers: boolean;
}

const DEFAULT_LOG_LEVEL: LogLevel = "info";

export function parseLogLevel(value: string | undefined): Result<LogLevel, ValidationError> {
  if (!value) {
    return Result.ok(DEFAULT_LOG_LEVEL);
  }

  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    return Result.err(
      new ValidationError({ message: "LXCONF_LOG_LEVEL must be one of debug, info, warn, error" })
    );
  }

  return Result.ok(level);
}

export function parseFlag(name: string, value: string | undefined): Result<boolean, ValidationError> {
  switch (value?.toLowerCase()) {
    case undefined:
    case "":
    case "0":
    case "false":
      return Result.ok(false);
    case "1":
    case "true":
      return Result.ok(true);
    default:
      return Result.err(new ValidationError({ message: `${name} must be 1, true, 0 or false` }));
  }
}

/**
 * Read command configuration from the environment
 */
export function loadCliConfig(
  env: Record<string, string | undefined>
): Result<CliConfig, ValidationError> {
  const logLevel = parseLogLevel(env.LXCONF_LOG_LEVEL);
  if (logLevel.isErr()) {
    return Result.err(logLevel.error);
  }

  const legacyNumbers = parseFlag("LXCONF_LEGACY_NUMBERS", env.LXCONF_LEGACY_NUMBERS);
  if (legacyNumbers.isErr()) {
    return Result.err(legacyNumbers.error);
  }

  return Result.ok({
    logLevel: logLevel.unwrap(),
    legacyNumbers: legacyNumbers.unwrap(),
  });
}
