import { Result } from "better-result";
import { InvalidDirectiveError } from "@lxconf/errors";
import type { Directive } from "./types.js";

export type ParsedLine =
  | { kind: "skip" }
  | { kind: "directive"; directive: Directive };

const SKIP: ParsedLine = { kind: "skip" };

const LEADING_BLANKS = /^[ \t\r\n\v\f]+/;
const TRAILING_BLANKS = /[ \t\r\n\v\f]+$/;

export function trimLeft(text: string): string {
  return text.replace(LEADING_BLANKS, "");
}

export function trimRight(text: string): string {
  return text.replace(TRAILING_BLANKS, "");
}

export function trim(text: string): string {
  return trimRight(trimLeft(text));
}

/**
 * Split one raw configuration line into key and value
 *
 * Blank lines and comments are skipped. Only the first "=" separates,
 * so values may contain "=" themselves.
 */
export function parseDirective(line: string): Result<ParsedLine, InvalidDirectiveError> {
  const text = trimLeft(line);
  if (text === "" || text.startsWith("#")) {
    return Result.ok(SKIP);
  }

  const separator = text.indexOf("=");
  if (separator === -1) {
    return Result.err(
      new InvalidDirectiveError({
        message: "invalid configuration line",
        key: trimRight(text),
      })
    );
  }

  const parsed: ParsedLine = {
    kind: "directive",
    directive: {
      key: trim(text.slice(0, separator)),
      value: trim(text.slice(separator + 1)),
    },
  };
  return Result.ok(parsed);
}
