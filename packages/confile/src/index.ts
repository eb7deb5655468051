/**
 * @lxconf/confile
 *
 * Reads lxc-style `key = value` configuration into a typed runtime
 * configuration: network devices, cgroup settings, mounts, root
 * filesystem, host name and terminal counts.
 *
 * @example
 * ```typescript
 * import { loadConfig } from "@lxconf/confile";
 *
 * const result = loadConfig("/var/lib/lxc/web/config");
 * if (result.isOk()) {
 *   const conf = result.unwrap();
 *   console.log(`${conf.network.length} devices, rootfs ${conf.rootfs}`);
 * }
 * ```
 */

// Read entry points
export { readConfig, loadConfig, parseConfig, parseConfigLines } from "./read.js";

// Line parsing and dispatch
export { parseDirective, trim, trimLeft, trimRight, type ParsedLine } from "./directive.js";
export {
  DirectiveTable,
  createDefaultTable,
  type DirectiveHandler,
  type DirectiveEntry,
} from "./table.js";

// Handlers
export {
  currentNetdev,
  parseInet4Binding,
  parseInet6Binding,
} from "./handlers/network.js";
export { parseCount } from "./handlers/scalar.js";

// Data model
export {
  createConf,
  isNetworkType,
  resolveHandlerOptions,
  NETWORK_TYPES,
  DEFAULT_LIMITS,
  type LxcConf,
  type NetDev,
  type NetworkType,
  type Inet4Binding,
  type Inet6Binding,
  type CgroupEntry,
  type UtsName,
  type ConfLimits,
  type ReadOptions,
  type HandlerOptions,
  type Directive,
} from "./types.js";
