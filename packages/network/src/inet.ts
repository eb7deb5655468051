/**
 * Internet address literals
 *
 * Strict parsers for the textual forms accepted by inet_pton(3):
 * - IPv4 dotted-quad (four decimal octets, no leading zeros)
 * - IPv6 (RFC 4291 section 2.2, including "::" and a dotted-quad tail)
 *
 * Addresses are returned as network-order byte arrays.
 */

import { Result } from "better-result";

export class AddressParseError extends Error {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message);
    this.name = "AddressParseError";
  }

  static is(error: unknown): error is AddressParseError {
    return error instanceof AddressParseError;
  }
}

const OCTET_PATTERN = /^(0|[1-9][0-9]{0,2})$/;
const HEXTET_PATTERN = /^[0-9a-fA-F]{1,4}$/;
const PREFIX_PATTERN = /^[0-9]{1,3}$/;

/**
 * Parse an IPv4 address string to a 4-byte array
 */
export function parseIPv4(ip: string): Result<Uint8Array, AddressParseError> {
  const parts = ip.split(".");
  if (parts.length !== 4) {
    return Result.err(new AddressParseError(`Invalid IPv4 address: ${ip}`, ip));
  }

  const bytes = new Uint8Array(4);
  for (let i = 0; i < 4; i++) {
    const part = parts[i];
    if (!OCTET_PATTERN.test(part)) {
      return Result.err(new AddressParseError(`Invalid IPv4 address: ${ip}`, ip));
    }
    const octet = parseInt(part, 10);
    if (octet > 255) {
      return Result.err(new AddressParseError(`Invalid IPv4 address: ${ip}`, ip));
    }
    bytes[i] = octet;
  }

  return Result.ok(bytes);
}

/**
 * Format a 4-byte array as an IPv4 address string
 */
export function formatIPv4(bytes: Uint8Array): string {
  return Array.from(bytes).join(".");
}

/**
 * Convert a 4-byte array to a 32-bit number
 */
export function ipv4ToNum(bytes: Uint8Array): number {
  return ((bytes[0] << 24) | (bytes[1] << 16) | (bytes[2] << 8) | bytes[3]) >>> 0;
}

/**
 * Default prefix length implied by the historical address class
 *
 * Class A (0xxx) -> 8, class B (10xx) -> 16, class C (110x) -> 24,
 * classes D and E -> 0.
 */
export function classfulPrefix(bytes: Uint8Array): number {
  const num = ipv4ToNum(bytes);
  if ((num & 0x80000000) === 0) {
    return 8;
  }
  if (((num & 0xc0000000) >>> 0) === 0x80000000) {
    return 16;
  }
  if (((num & 0xe0000000) >>> 0) === 0xc0000000) {
    return 24;
  }
  return 0;
}

/**
 * Parse a decimal prefix length in the range 0..max
 */
export function parsePrefixLength(
  text: string,
  max: number
): Result<number, AddressParseError> {
  if (!PREFIX_PATTERN.test(text)) {
    return Result.err(new AddressParseError(`Invalid prefix length: ${text}`, text));
  }
  const prefix = parseInt(text, 10);
  if (prefix > max) {
    return Result.err(new AddressParseError(`Prefix length out of range: ${text}`, text));
  }
  return Result.ok(prefix);
}

function parseHextets(
  text: string,
  allowIPv4Tail: boolean,
  ip: string
): Result<number[], AddressParseError> {
  if (text === "") {
    return Result.ok([]);
  }

  const groups = text.split(":");
  const hextets: number[] = [];

  for (let i = 0; i < groups.length; i++) {
    const group = groups[i];
    const last = i === groups.length - 1;

    if (last && allowIPv4Tail && group.includes(".")) {
      const tail = parseIPv4(group);
      if (tail.isErr()) {
        return Result.err(new AddressParseError(`Invalid IPv6 address: ${ip}`, ip));
      }
      const bytes = tail.unwrap();
      hextets.push((bytes[0] << 8) | bytes[1], (bytes[2] << 8) | bytes[3]);
      continue;
    }

    if (!HEXTET_PATTERN.test(group)) {
      return Result.err(new AddressParseError(`Invalid IPv6 address: ${ip}`, ip));
    }
    hextets.push(parseInt(group, 16));
  }

  return Result.ok(hextets);
}

/**
 * Parse an IPv6 address string to a 16-byte array
 */
export function parseIPv6(ip: string): Result<Uint8Array, AddressParseError> {
  const halves = ip.split("::");
  if (halves.length > 2) {
    return Result.err(new AddressParseError(`Invalid IPv6 address: ${ip}`, ip));
  }

  const compressed = halves.length === 2;
  const head = parseHextets(halves[0], !compressed, ip);
  if (head.isErr()) {
    return Result.err(head.error);
  }
  const tail = parseHextets(compressed ? halves[1] : "", true, ip);
  if (tail.isErr()) {
    return Result.err(tail.error);
  }

  const headGroups = head.unwrap();
  const tailGroups = tail.unwrap();
  const explicit = headGroups.length + tailGroups.length;

  if (compressed ? explicit > 7 : explicit !== 8) {
    return Result.err(new AddressParseError(`Invalid IPv6 address: ${ip}`, ip));
  }

  const hextets = [
    ...headGroups,
    ...new Array<number>(8 - explicit).fill(0),
    ...tailGroups,
  ];

  const bytes = new Uint8Array(16);
  hextets.forEach((value, i) => {
    bytes[i * 2] = value >>> 8;
    bytes[i * 2 + 1] = value & 0xff;
  });

  return Result.ok(bytes);
}

/**
 * Format a 16-byte array as an IPv6 address string (RFC 5952 form)
 */
export function formatIPv6(bytes: Uint8Array): string {
  // IPv4-mapped addresses keep the dotted-quad tail (RFC 5952 section 5)
  if (bytes.subarray(0, 10).every((b) => b === 0) && bytes[10] === 0xff && bytes[11] === 0xff) {
    return `::ffff:${formatIPv4(bytes.subarray(12))}`;
  }

  const hextets: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    hextets.push((bytes[i] << 8) | bytes[i + 1]);
  }

  // Longest run of two or more zero groups, leftmost on ties
  let bestStart = -1;
  let bestLength = 1;
  let runStart = -1;
  for (let i = 0; i <= 8; i++) {
    if (i < 8 && hextets[i] === 0) {
      if (runStart === -1) {
        runStart = i;
      }
      continue;
    }
    if (runStart !== -1) {
      const length = i - runStart;
      if (length > bestLength) {
        bestStart = runStart;
        bestLength = length;
      }
      runStart = -1;
    }
  }

  const hex = (values: number[]) => values.map((v) => v.toString(16)).join(":");

  if (bestStart === -1) {
    return hex(hextets);
  }
  return `${hex(hextets.slice(0, bestStart))}::${hex(hextets.slice(bestStart + bestLength))}`;
}
