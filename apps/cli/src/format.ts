import type { LxcConf, NetDev } from "@lxconf/confile";
import { IFF_UP, formatIPv4, formatIPv6 } from "@lxconf/network";

/**
 * JSON-friendly view of a configuration, addresses rendered as text
 */
export function renderConf(conf: LxcConf) {
  return {
    utsname: conf.utsname?.nodename ?? null,
    rootfs: conf.rootfs ?? null,
    pivotdir: conf.pivotdir ?? null,
    fstab: conf.fstab ?? null,
    pts: conf.pts,
    tty: conf.tty,
    network: conf.network.map(renderNetdev),
    cgroup: conf.cgroup.map(({ subsystem, value }) => ({ subsystem, value })),
    mounts: [...conf.mountList],
  };
}

function renderNetdev(netdev: NetDev) {
  return {
    type: netdev.type,
    flags: netdev.flags & IFF_UP ? ["up"] : [],
    link: netdev.link ?? null,
    name: netdev.name ?? null,
    hwaddr: netdev.hwaddr ?? null,
    mtu: netdev.mtu ?? null,
    ipv4: netdev.ipv4.map((binding) => ({
      address: `${formatIPv4(binding.addr)}/${binding.prefix}`,
      broadcast: binding.bcast ? formatIPv4(binding.bcast) : null,
    })),
    ipv6: netdev.ipv6.map((binding) => `${formatIPv6(binding.addr)}/${binding.prefix}`),
  };
}
