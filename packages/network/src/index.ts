/**
 * @lxconf/network
 *
 * Address literals and link-level constants used when describing
 * container network devices.
 *
 * @example
 * ```typescript
 * import { parseIPv4, classfulPrefix, formatIPv4 } from "@lxconf/network";
 *
 * const result = parseIPv4("172.16.0.5");
 * if (result.isOk()) {
 *   const addr = result.unwrap();
 *   console.log(`${formatIPv4(addr)}/${classfulPrefix(addr)}`); // 172.16.0.5/16
 * }
 * ```
 */

// Interface name buffer size (IFNAMSIZ from <net/if.h>)
export const IFNAMSIZ = 16;

// Interface flags
export const IFF_UP = 0x1;

export {
  parseIPv4,
  formatIPv4,
  ipv4ToNum,
  classfulPrefix,
  parsePrefixLength,
  parseIPv6,
  formatIPv6,
  AddressParseError,
} from "./inet.js";
