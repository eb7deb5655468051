import { Result } from "better-result";
import { InvalidDirectiveError } from "@lxconf/errors";
import type { Directive, LxcConf } from "../types.js";

const CGROUP_TOKEN = "lxc.cgroup.";

/**
 * lxc.cgroup.<subsystem> = <value>
 *
 * Entries accumulate; a repeated subsystem is kept twice, in order.
 */
export function configCgroup(
  { key, value }: Directive,
  conf: LxcConf
): Result<void, InvalidDirectiveError> {
  const index = key.indexOf(CGROUP_TOKEN);
  const subsystem = index === -1 ? "" : key.slice(index + CGROUP_TOKEN.length);

  if (subsystem === "") {
    return Result.err(
      new InvalidDirectiveError({
        message: "missing cgroup subsystem",
        key,
        value,
      })
    );
  }

  conf.cgroup.push({ subsystem, value });
  return Result.ok(undefined);
}
