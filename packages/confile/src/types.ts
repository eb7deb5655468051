import type { Logger } from "@lxconf/logger";
import { IFNAMSIZ } from "@lxconf/network";

/**
 * Network device kinds
 */
export const NETWORK_TYPES = ["veth", "macvlan", "phys", "empty"] as const;

export type NetworkType = (typeof NETWORK_TYPES)[number];

export function isNetworkType(value: string): value is NetworkType {
  return (NETWORK_TYPES as readonly string[]).includes(value);
}

/**
 * IPv4 address bound to a device
 */
export interface Inet4Binding {
  /** Address bytes in network order */
  addr: Uint8Array;
  /** Broadcast address, when given explicitly */
  bcast?: Uint8Array;
  /** Prefix length, 0-32 */
  prefix: number;
}

/**
 * IPv6 address bound to a device
 */
export interface Inet6Binding {
  addr: Uint8Array;
  /** Prefix length, 0-128 */
  prefix: number;
}

/**
 * One network device declared with lxc.network.type
 */
export interface NetDev {
  type: NetworkType;
  /** Interface flags (IFF_UP) */
  flags: number;
  /** Host-side interface the device attaches to */
  link?: string;
  /** Interface name inside the container */
  name?: string;
  hwaddr?: string;
  mtu?: string;
  ipv4: Inet4Binding[];
  ipv6: Inet6Binding[];
}

export interface CgroupEntry {
  /** Controller file below the cgroup, e.g. "memory.limit_in_bytes" */
  subsystem: string;
  value: string;
}

export interface UtsName {
  nodename: string;
}

/**
 * Runtime configuration of one container
 */
export interface LxcConf {
  /** Declared devices, most recent first */
  network: NetDev[];
  /** Cgroup settings in declaration order */
  cgroup: CgroupEntry[];
  /** Inline fstab lines in declaration order */
  mountList: string[];
  /** External fstab file */
  fstab?: string;
  rootfs?: string;
  pivotdir?: string;
  utsname?: UtsName;
  pts: number;
  tty: number;
}

/**
 * Create an empty configuration
 */
export function createConf(): LxcConf {
  return {
    network: [],
    cgroup: [],
    mountList: [],
    pts: 0,
    tty: 0,
  };
}

/**
 * Length ceilings applied to directive values, in UTF-8 bytes
 */
export interface ConfLimits {
  /** Longest accepted interface name (values longer than this fail) */
  ifNameSize: number;
  /** Path buffer size (values this long or longer fail) */
  maxPath: number;
  /** Host name field size, terminator included (values this long or longer fail) */
  hostNameSize: number;
}

export const DEFAULT_LIMITS: Readonly<ConfLimits> = Object.freeze({
  ifNameSize: IFNAMSIZ,
  maxPath: 4096,
  hostNameSize: 65,
});

export interface ReadOptions {
  /** Override individual length ceilings */
  limits?: Partial<ConfLimits>;
  /** Parse lxc.pts / lxc.tty like atoi(3): non-numeric text reads as 0 */
  legacyNumbers?: boolean;
  logger?: Logger;
}

/**
 * Options as seen by directive handlers
 */
export interface HandlerOptions {
  limits: ConfLimits;
  legacyNumbers: boolean;
}

export function resolveHandlerOptions(options: ReadOptions = {}): HandlerOptions {
  return {
    limits: {
      ifNameSize: options.limits?.ifNameSize ?? DEFAULT_LIMITS.ifNameSize,
      maxPath: options.limits?.maxPath ?? DEFAULT_LIMITS.maxPath,
      hostNameSize: options.limits?.hostNameSize ?? DEFAULT_LIMITS.hostNameSize,
    },
    legacyNumbers: options.legacyNumbers ?? false,
  };
}

/**
 * One parsed `key = value` line
 */
export interface Directive {
  key: string;
  value: string;
}
