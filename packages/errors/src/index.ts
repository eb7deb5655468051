/* eslint-disable no-redeclare */
import { TaggedError } from "better-result";

// Line without a separator, or a directive whose subkey is malformed
export const InvalidDirectiveError = TaggedError("InvalidDirectiveError")<{
  message: string;
  key: string;
  value?: string;
}>();

export type InvalidDirectiveError = InstanceType<typeof InvalidDirectiveError>;

// No dispatch table entry matches the key
export const UnknownDirectiveError = TaggedError("UnknownDirectiveError")<{
  message: string;
  key: string;
  value: string;
}>();

export type UnknownDirectiveError = InstanceType<typeof UnknownDirectiveError>;

// Value outside the accepted set or shape
export const InvalidValueError = TaggedError("InvalidValueError")<{
  message: string;
  key: string;
  value: string;
}>();

export type InvalidValueError = InstanceType<typeof InvalidValueError>;

// Malformed IPv4/IPv6 literal or prefix
export const InvalidAddressError = TaggedError("InvalidAddressError")<{
  message: string;
  key: string;
  value: string;
}>();

export type InvalidAddressError = InstanceType<typeof InvalidAddressError>;

// Network device sub-field declared before any device
export const MissingContextError = TaggedError("MissingContextError")<{
  message: string;
  key: string;
  value: string;
}>();

export type MissingContextError = InstanceType<typeof MissingContextError>;

// Length ceiling errors
export const PathTooLongError = TaggedError("PathTooLongError")<{
  message: string;
  key: string;
  value: string;
  limit: number;
}>();

export type PathTooLongError = InstanceType<typeof PathTooLongError>;

export const NameTooLongError = TaggedError("NameTooLongError")<{
  message: string;
  key: string;
  value: string;
  limit: number;
}>();

export type NameTooLongError = InstanceType<typeof NameTooLongError>;

// Configuration source could not be read
export const SourceReadError = TaggedError("SourceReadError")<{
  message: string;
  path: string;
  cause?: unknown;
}>();

export type SourceReadError = InstanceType<typeof SourceReadError>;

// Invalid process configuration (environment, arguments)
export const ValidationError = TaggedError("ValidationError")<{
  message: string;
}>();

export type ValidationError = InstanceType<typeof ValidationError>;

// Every failure a single directive can produce
export type ConfigError =
  | InvalidDirectiveError
  | UnknownDirectiveError
  | InvalidValueError
  | InvalidAddressError
  | MissingContextError
  | PathTooLongError
  | NameTooLongError;

export type LxconfError = ConfigError | SourceReadError | ValidationError;

/**
 * sysexits(3) codes used by the command line
 */
export const EXIT_USAGE = 64;
export const EXIT_DATAERR = 65;
export const EXIT_NOINPUT = 66;

/**
 * Get the process exit code for an error
 */
export function exitCodeFor(error: LxconfError): number {
  switch (error._tag) {
    case "ValidationError":
      return EXIT_USAGE;
    case "SourceReadError":
      return EXIT_NOINPUT;
    case "InvalidDirectiveError":
    case "UnknownDirectiveError":
    case "InvalidValueError":
    case "InvalidAddressError":
    case "MissingContextError":
    case "PathTooLongError":
    case "NameTooLongError":
    default:
      return EXIT_DATAERR;
  }
}

/**
 * Render an error as a one-line diagnostic naming the offending directive
 */
export function describeError(error: LxconfError): string {
  switch (error._tag) {
    case "ValidationError":
      return error.message;
    case "SourceReadError":
      return `${error.message}: ${error.path}`;
    case "InvalidDirectiveError":
      return error.value === undefined
        ? `${error.message}: '${error.key}'`
        : `${error.message}: '${error.key}' = '${error.value}'`;
    default:
      return `${error.message}: '${error.key}' = '${error.value}'`;
  }
}
