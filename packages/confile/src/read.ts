/**
 * Configuration read loop
 *
 * Feeds every line through the directive parser and the dispatch table.
 * The first failure stops the read and is returned as-is; the aggregate
 * then holds whatever the preceding lines produced.
 */

import { readFileSync } from "node:fs";
import { Result } from "better-result";
import { SourceReadError, type ConfigError } from "@lxconf/errors";
import { parseDirective } from "./directive.js";
import { createDefaultTable } from "./table.js";
import {
  createConf,
  resolveHandlerOptions,
  type LxcConf,
  type ReadOptions,
} from "./types.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

const defaultTable = createDefaultTable();

/**
 * Apply configuration lines to an aggregate, stopping at the first failure
 */
export function parseConfigLines(
  lines: Iterable<string>,
  conf: LxcConf,
  options: ReadOptions = {}
): Result<void, ConfigError> {
  const handlerOptions = resolveHandlerOptions(options);
  const logger = options.logger;
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;

    const parsed = parseDirective(line);
    if (parsed.isErr()) {
      logger?.error("Invalid configuration line", {
        line: lineNumber,
        tag: parsed.error._tag,
        text: parsed.error.key,
      });
      return Result.err(parsed.error);
    }

    const parsedLine = parsed.unwrap();
    if (parsedLine.kind === "skip") {
      continue;
    }

    const { directive } = parsedLine;
    const applied = defaultTable.dispatch(directive, conf, handlerOptions);
    if (applied.isErr()) {
      logger?.error(applied.error.message, {
        line: lineNumber,
        tag: applied.error._tag,
        key: directive.key,
        value: directive.value,
      });
      return Result.err(applied.error);
    }

    logger?.debug("Directive applied", { line: lineNumber, key: directive.key });
  }

  return Result.ok(undefined);
}

/**
 * Apply configuration text to an aggregate
 */
export function parseConfig(
  text: string,
  conf: LxcConf,
  options: ReadOptions = {}
): Result<void, ConfigError> {
  return parseConfigLines(text.split(/\r?\n/), conf, options);
}

function readText(file: string): Result<string, SourceReadError> {
  const bytes = Result.try({
    try: () => readFileSync(file),
    catch: (cause) =>
      new SourceReadError({
        message: "failed to read configuration",
        path: file,
        cause,
      }),
  });
  if (bytes.isErr()) {
    return Result.err(bytes.error);
  }

  // Malformed UTF-8 is refused rather than replaced with U+FFFD
  return Result.try({
    try: () => utf8.decode(bytes.unwrap()),
    catch: (cause) =>
      new SourceReadError({
        message: "configuration is not valid UTF-8",
        path: file,
        cause,
      }),
  });
}

/**
 * Read a configuration file into a caller-supplied aggregate
 *
 * @example
 * ```ts
 * const conf = createConf();
 * const result = readConfig("/var/lib/lxc/web/config", conf);
 * if (result.isErr()) {
 *   console.error(describeError(result.error));
 * }
 * ```
 */
export function readConfig(
  file: string,
  conf: LxcConf,
  options: ReadOptions = {}
): Result<void, ConfigError | SourceReadError> {
  const logger = options.logger?.child({ file });

  const text = readText(file);
  if (text.isErr()) {
    logger?.error(text.error.message, {
      tag: text.error._tag,
      cause: text.error.cause instanceof Error ? text.error.cause.message : String(text.error.cause),
    });
    return Result.err(text.error);
  }

  const parsed = parseConfig(text.unwrap(), conf, { ...options, logger });
  if (parsed.isErr()) {
    return Result.err(parsed.error);
  }

  logger?.info("Configuration read", {
    network: conf.network.length,
    cgroup: conf.cgroup.length,
    mounts: conf.mountList.length,
  });
  return Result.ok(undefined);
}

/**
 * Read a configuration file into a new aggregate
 */
export function loadConfig(
  file: string,
  options: ReadOptions = {}
): Result<LxcConf, ConfigError | SourceReadError> {
  const conf = createConf();
  const result = readConfig(file, conf, options);
  if (result.isErr()) {
    return Result.err(result.error);
  }
  return Result.ok(conf);
}
