import { Result } from "better-result";
import {
  InvalidValueError,
  NameTooLongError,
  PathTooLongError,
} from "@lxconf/errors";
import type { Directive, HandlerOptions, LxcConf } from "../types.js";

const STRICT_COUNT = /^[0-9]+$/;
const LEGACY_COUNT = /^[ \t\n\v\f\r]*([+-]?[0-9]+)/;

/**
 * Read a pty/tty count
 *
 * Strict mode wants a plain non-negative decimal. Legacy mode mirrors
 * atoi(3): leading digits after optional blanks and sign, otherwise 0.
 */
export function parseCount(
  { key, value }: Directive,
  options: HandlerOptions
): Result<number, InvalidValueError> {
  if (options.legacyNumbers) {
    const match = LEGACY_COUNT.exec(value);
    return Result.ok(match ? parseInt(match[1], 10) : 0);
  }

  const count = Number(value);
  if (!STRICT_COUNT.test(value) || !Number.isSafeInteger(count)) {
    return Result.err(
      new InvalidValueError({
        message: "expected a non-negative integer",
        key,
        value,
      })
    );
  }
  return Result.ok(count);
}

export function checkPath(
  { key, value }: Directive,
  options: HandlerOptions,
  what: string
): Result<string, PathTooLongError> {
  // Limits are byte counts of the UTF-8 encoding
  if (Buffer.byteLength(value, "utf8") >= options.limits.maxPath) {
    return Result.err(
      new PathTooLongError({
        message: `${what} path is too long`,
        key,
        value,
        limit: options.limits.maxPath,
      })
    );
  }
  return Result.ok(value);
}

export function configPts(
  directive: Directive,
  conf: LxcConf,
  options: HandlerOptions
): Result<void, InvalidValueError> {
  const count = parseCount(directive, options);
  if (count.isErr()) {
    return Result.err(count.error);
  }
  conf.pts = count.unwrap();
  return Result.ok(undefined);
}

export function configTty(
  directive: Directive,
  conf: LxcConf,
  options: HandlerOptions
): Result<void, InvalidValueError> {
  const count = parseCount(directive, options);
  if (count.isErr()) {
    return Result.err(count.error);
  }
  conf.tty = count.unwrap();
  return Result.ok(undefined);
}

export function configRootfs(
  directive: Directive,
  conf: LxcConf,
  options: HandlerOptions
): Result<void, PathTooLongError> {
  const path = checkPath(directive, options, "rootfs");
  if (path.isErr()) {
    return Result.err(path.error);
  }
  conf.rootfs = path.unwrap();
  return Result.ok(undefined);
}

export function configPivotdir(
  directive: Directive,
  conf: LxcConf,
  options: HandlerOptions
): Result<void, PathTooLongError> {
  const path = checkPath(directive, options, "pivotdir");
  if (path.isErr()) {
    return Result.err(path.error);
  }
  conf.pivotdir = path.unwrap();
  return Result.ok(undefined);
}

export function configUtsname(
  { key, value }: Directive,
  conf: LxcConf,
  options: HandlerOptions
): Result<void, NameTooLongError> {
  // Field size includes the terminating NUL
  if (Buffer.byteLength(value, "utf8") >= options.limits.hostNameSize) {
    return Result.err(
      new NameTooLongError({
        message: "node name is too long",
        key,
        value,
        limit: options.limits.hostNameSize,
      })
    );
  }

  conf.utsname = { nodename: value };
  return Result.ok(undefined);
}
