import { Result } from "better-result";
import type { PathTooLongError } from "@lxconf/errors";
import type { Directive, HandlerOptions, LxcConf } from "../types.js";
import { checkPath } from "./scalar.js";

const MOUNT_ENTRY_TOKEN = "lxc.mount.entry";

/**
 * lxc.mount.entry appends an fstab line; plain lxc.mount names the fstab
 * file, replacing any earlier one
 */
export function configMount(
  directive: Directive,
  conf: LxcConf,
  options: HandlerOptions
): Result<void, PathTooLongError> {
  if (directive.key.includes(MOUNT_ENTRY_TOKEN)) {
    conf.mountList.push(directive.value);
    return Result.ok(undefined);
  }

  const path = checkPath(directive, options, "fstab");
  if (path.isErr()) {
    return Result.err(path.error);
  }
  conf.fstab = path.unwrap();
  return Result.ok(undefined);
}
