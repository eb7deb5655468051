/**
 * lxc.network.* handlers
 *
 * lxc.network.type opens a new device; every other network directive
 * configures the device opened most recently.
 */

import { Result } from "better-result";
import {
  InvalidAddressError,
  InvalidValueError,
  MissingContextError,
} from "@lxconf/errors";
import {
  IFF_UP,
  classfulPrefix,
  parseIPv4,
  parseIPv6,
  parsePrefixLength,
} from "@lxconf/network";
import {
  NETWORK_TYPES,
  isNetworkType,
  type Directive,
  type HandlerOptions,
  type Inet4Binding,
  type Inet6Binding,
  type LxcConf,
  type NetDev,
} from "../types.js";

const DEFAULT_IPV6_PREFIX = 64;

/**
 * The device subsequent network directives apply to
 */
export function currentNetdev(
  directive: Directive,
  conf: LxcConf
): Result<NetDev, MissingContextError> {
  const netdev = conf.network[0];
  if (!netdev) {
    return Result.err(
      new MissingContextError({
        message: "network is not created for option",
        key: directive.key,
        value: directive.value,
      })
    );
  }
  return Result.ok(netdev);
}

export function configNetworkType(
  { key, value }: Directive,
  conf: LxcConf
): Result<void, InvalidValueError> {
  if (!isNetworkType(value)) {
    return Result.err(
      new InvalidValueError({
        message: `invalid network type, expected one of ${NETWORK_TYPES.join(", ")}`,
        key,
        value,
      })
    );
  }

  const netdev: NetDev = {
    type: value,
    flags: 0,
    ipv4: [],
    ipv6: [],
  };
  conf.network.unshift(netdev);

  return Result.ok(undefined);
}

export function configNetworkFlags(
  directive: Directive,
  conf: LxcConf
): Result<void, MissingContextError> {
  const netdev = currentNetdev(directive, conf);
  if (netdev.isErr()) {
    return Result.err(netdev.error);
  }

  netdev.unwrap().flags |= IFF_UP;
  return Result.ok(undefined);
}

function checkIfname(
  { key, value }: Directive,
  options: HandlerOptions
): Result<string, InvalidValueError> {
  if (Buffer.byteLength(value, "utf8") > options.limits.ifNameSize) {
    return Result.err(
      new InvalidValueError({
        message: "invalid interface name",
        key,
        value,
      })
    );
  }
  return Result.ok(value);
}

export function configNetworkLink(
  directive: Directive,
  conf: LxcConf,
  options: HandlerOptions
): Result<void, MissingContextError | InvalidValueError> {
  const netdev = currentNetdev(directive, conf);
  if (netdev.isErr()) {
    return Result.err(netdev.error);
  }

  const link = checkIfname(directive, options);
  if (link.isErr()) {
    return Result.err(link.error);
  }

  netdev.unwrap().link = link.unwrap();
  return Result.ok(undefined);
}

export function configNetworkName(
  directive: Directive,
  conf: LxcConf,
  options: HandlerOptions
): Result<void, MissingContextError | InvalidValueError> {
  const netdev = currentNetdev(directive, conf);
  if (netdev.isErr()) {
    return Result.err(netdev.error);
  }

  const name = checkIfname(directive, options);
  if (name.isErr()) {
    return Result.err(name.error);
  }

  netdev.unwrap().name = name.unwrap();
  return Result.ok(undefined);
}

export function configNetworkHwaddr(
  directive: Directive,
  conf: LxcConf
): Result<void, MissingContextError> {
  const netdev = currentNetdev(directive, conf);
  if (netdev.isErr()) {
    return Result.err(netdev.error);
  }

  netdev.unwrap().hwaddr = directive.value;
  return Result.ok(undefined);
}

export function configNetworkMtu(
  directive: Directive,
  conf: LxcConf
): Result<void, MissingContextError> {
  const netdev = currentNetdev(directive, conf);
  if (netdev.isErr()) {
    return Result.err(netdev.error);
  }

  netdev.unwrap().mtu = directive.value;
  return Result.ok(undefined);
}

/**
 * Parse `<address>[/<prefix>][ <broadcast>]`
 *
 * Without an explicit prefix the length comes from the address class.
 */
export function parseInet4Binding(
  directive: Directive
): Result<Inet4Binding, InvalidAddressError> {
  const { key, value } = directive;
  const invalid = (message: string) =>
    Result.err(new InvalidAddressError({ message, key, value }));

  let addrText = value;
  let bcastText: string | undefined;
  let prefixText: string | undefined;

  const space = addrText.indexOf(" ");
  if (space !== -1) {
    bcastText = addrText.slice(space + 1).trimStart();
    addrText = addrText.slice(0, space);
  }

  const slash = addrText.indexOf("/");
  if (slash !== -1) {
    prefixText = addrText.slice(slash + 1);
    addrText = addrText.slice(0, slash);
  }

  const addr = parseIPv4(addrText);
  if (addr.isErr()) {
    return invalid("invalid ipv4 address");
  }

  let bcast: Uint8Array | undefined;
  if (bcastText !== undefined) {
    const parsed = parseIPv4(bcastText);
    if (parsed.isErr()) {
      return invalid("invalid ipv4 broadcast address");
    }
    bcast = parsed.unwrap();
  }

  let prefix = classfulPrefix(addr.unwrap());
  if (prefixText !== undefined) {
    const parsed = parsePrefixLength(prefixText, 32);
    if (parsed.isErr()) {
      return invalid("invalid ipv4 prefix length");
    }
    prefix = parsed.unwrap();
  }

  const binding: Inet4Binding = { addr: addr.unwrap(), prefix };
  if (bcast) {
    binding.bcast = bcast;
  }
  return Result.ok(binding);
}

export function configNetworkIpv4(
  directive: Directive,
  conf: LxcConf
): Result<void, MissingContextError | InvalidAddressError> {
  const netdev = currentNetdev(directive, conf);
  if (netdev.isErr()) {
    return Result.err(netdev.error);
  }

  const binding = parseInet4Binding(directive);
  if (binding.isErr()) {
    return Result.err(binding.error);
  }

  netdev.unwrap().ipv4.push(binding.unwrap());
  return Result.ok(undefined);
}

/**
 * Parse `<address>[/<prefix>]`, prefix defaulting to 64
 */
export function parseInet6Binding(
  directive: Directive
): Result<Inet6Binding, InvalidAddressError> {
  const { key, value } = directive;

  let addrText = value;
  let prefix = DEFAULT_IPV6_PREFIX;

  const slash = value.indexOf("/");
  if (slash !== -1) {
    const parsed = parsePrefixLength(value.slice(slash + 1), 128);
    if (parsed.isErr()) {
      return Result.err(
        new InvalidAddressError({ message: "invalid ipv6 prefix length", key, value })
      );
    }
    prefix = parsed.unwrap();
    addrText = value.slice(0, slash);
  }

  const addr = parseIPv6(addrText);
  if (addr.isErr()) {
    return Result.err(
      new InvalidAddressError({ message: "invalid ipv6 address", key, value })
    );
  }

  return Result.ok({ addr: addr.unwrap(), prefix });
}

export function configNetworkIpv6(
  directive: Directive,
  conf: LxcConf
): Result<void, MissingContextError | InvalidAddressError> {
  const netdev = currentNetdev(directive, conf);
  if (netdev.isErr()) {
    return Result.err(netdev.error);
  }

  const binding = parseInet6Binding(directive);
  if (binding.isErr()) {
    return Result.err(binding.error);
  }

  netdev.unwrap().ipv6.push(binding.unwrap());
  return Result.ok(undefined);
}
