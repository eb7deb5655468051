import { describe, it, expect } from "vitest";
import { InvalidDirectiveError } from "@lxconf/errors";
import { parseDirective, trim, type ParsedLine } from "../index.js";

function directiveOf(line: string) {
  const parsed: ParsedLine = parseDirective(line).unwrap();
  if (parsed.kind !== "directive") {
    throw new Error(`expected a directive for ${JSON.stringify(line)}`);
  }
  return parsed.directive;
}

describe("parseDirective", () => {
  it("splits key and value", () => {
    expect(directiveOf("lxc.utsname = web01")).toEqual({
      key: "lxc.utsname",
      value: "web01",
    });
  });

  it("trims both sides of key and value", () => {
    expect(directiveOf(" \t lxc.tty\t=\t 4 \t")).toEqual({ key: "lxc.tty", value: "4" });
  });

  it("splits on the first separator only", () => {
    expect(directiveOf("lxc.cgroup.devices.allow = a=b=c")).toEqual({
      key: "lxc.cgroup.devices.allow",
      value: "a=b=c",
    });
  });

  it("accepts an empty value", () => {
    expect(directiveOf("lxc.cgroup =")).toEqual({ key: "lxc.cgroup", value: "" });
  });

  it("skips blank lines", () => {
    expect(parseDirective("").unwrap()).toEqual({ kind: "skip" });
    expect(parseDirective("   \t  ").unwrap()).toEqual({ kind: "skip" });
  });

  it("skips comments after leading whitespace", () => {
    expect(parseDirective("# lxc.tty = 4").unwrap()).toEqual({ kind: "skip" });
    expect(parseDirective("   #comment = yes").unwrap()).toEqual({ kind: "skip" });
  });

  it("does not treat a later # as a comment", () => {
    expect(directiveOf("lxc.utsname = host#1")).toEqual({
      key: "lxc.utsname",
      value: "host#1",
    });
  });

  it("fails without a separator", () => {
    const result = parseDirective("not a directive");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(InvalidDirectiveError.is(result.error)).toBe(true);
      expect(result.error.key).toBe("not a directive");
    }
  });
});

describe("trim", () => {
  it("is idempotent", () => {
    const samples = ["  lxc.tty ", "\tvalue\r", "a b", "", " \v\f "];
    for (const sample of samples) {
      const once = trim(sample);
      expect(trim(once)).toBe(once);
    }
  });

  it("keeps inner whitespace", () => {
    expect(trim("  proc /proc proc defaults 0 0  ")).toBe("proc /proc proc defaults 0 0");
  });

  it("reparses a trimmed directive to the same key and value", () => {
    const first = directiveOf("  lxc.rootfs  =  /var/lib/lxc/web/rootfs  ");
    const second = directiveOf(`${first.key} = ${first.value}`);

    expect(second).toEqual(first);
  });
});
