/**
 * Basic lxconf Example
 *
 * This example demonstrates:
 *   - Reading a container configuration file
 *   - Walking the declared network devices and their addresses
 *   - Reporting the first configuration error
 *
 * Run with: npm run example
 */

import { fileURLToPath } from "node:url";
import { createConf, readConfig } from "@lxconf/confile";
import { describeError } from "@lxconf/errors";
import { createLogger, generateSessionId } from "@lxconf/logger";
import { formatIPv4, formatIPv6 } from "@lxconf/network";

const CONFIG_PATH = fileURLToPath(new URL("./container.conf", import.meta.url));

function main(): number {
  const logger = createLogger({ sessionId: generateSessionId(), example: "basic" });
  const conf = createConf();

  const result = readConfig(CONFIG_PATH, conf, { logger });
  if (result.isErr()) {
    console.error(describeError(result.error));
    return 1;
  }

  console.log(`Host name: ${conf.utsname?.nodename ?? "(unset)"}`);
  console.log(`Root filesystem: ${conf.rootfs ?? "(host)"}`);

  // Devices are stored most recent first; print them in file order
  for (const netdev of [...conf.network].reverse()) {
    console.log(`Device ${netdev.type} ${netdev.name ?? ""} -> ${netdev.link ?? "-"}`);
    for (const binding of netdev.ipv4) {
      console.log(`  inet  ${formatIPv4(binding.addr)}/${binding.prefix}`);
    }
    for (const binding of netdev.ipv6) {
      console.log(`  inet6 ${formatIPv6(binding.addr)}/${binding.prefix}`);
    }
  }

  for (const { subsystem, value } of conf.cgroup) {
    console.log(`cgroup ${subsystem} = ${value}`);
  }

  return 0;
}

process.exitCode = main();
