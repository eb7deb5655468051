/**
 * Directive dispatch table
 *
 * Entries are matched in insertion order and the first entry whose prefix
 * starts the key wins, so a short prefix placed early shadows every longer
 * key beginning with it (e.g. "lxc.mount" also receives "lxc.mount.entry").
 */

import { Result } from "better-result";
import { UnknownDirectiveError, type ConfigError } from "@lxconf/errors";
import type { Directive, HandlerOptions, LxcConf } from "./types.js";
import {
  configNetworkType,
  configNetworkFlags,
  configNetworkLink,
  configNetworkName,
  configNetworkHwaddr,
  configNetworkMtu,
  configNetworkIpv4,
  configNetworkIpv6,
} from "./handlers/network.js";
import { configCgroup } from "./handlers/cgroup.js";
import { configMount } from "./handlers/mount.js";
import {
  configPts,
  configTty,
  configRootfs,
  configPivotdir,
  configUtsname,
} from "./handlers/scalar.js";

export type DirectiveHandler = (
  directive: Directive,
  conf: LxcConf,
  options: HandlerOptions
) => Result<void, ConfigError>;

export interface DirectiveEntry {
  prefix: string;
  handler: DirectiveHandler;
}

export class DirectiveTable {
  private entries: DirectiveEntry[] = [];

  append(prefix: string, handler: DirectiveHandler): this {
    this.entries.push({ prefix, handler });
    return this;
  }

  /**
   * First entry whose prefix starts the key
   */
  lookup(key: string): DirectiveEntry | undefined {
    return this.entries.find((entry) => key.startsWith(entry.prefix));
  }

  /**
   * Route a directive to its handler and return the handler's result
   */
  dispatch(
    directive: Directive,
    conf: LxcConf,
    options: HandlerOptions
  ): Result<void, ConfigError> {
    const entry = this.lookup(directive.key);
    if (!entry) {
      return Result.err(
        new UnknownDirectiveError({
          message: "unknown key",
          key: directive.key,
          value: directive.value,
        })
      );
    }
    return entry.handler(directive, conf, options);
  }

  prefixes(): string[] {
    return this.entries.map((entry) => entry.prefix);
  }
}

/**
 * Table for the lxc.* directive set
 */
export function createDefaultTable(): DirectiveTable {
  return new DirectiveTable()
    .append("lxc.pts", configPts)
    .append("lxc.tty", configTty)
    .append("lxc.cgroup", configCgroup)
    .append("lxc.mount", configMount)
    .append("lxc.rootfs", configRootfs)
    .append("lxc.utsname", configUtsname)
    .append("lxc.network.type", configNetworkType)
    .append("lxc.pivotdir", configPivotdir)
    .append("lxc.network.flags", configNetworkFlags)
    .append("lxc.network.link", configNetworkLink)
    .append("lxc.network.name", configNetworkName)
    .append("lxc.network.hwaddr", configNetworkHwaddr)
    .append("lxc.network.mtu", configNetworkMtu)
    .append("lxc.network.ipv4", configNetworkIpv4)
    .append("lxc.network.ipv6", configNetworkIpv6);
}
