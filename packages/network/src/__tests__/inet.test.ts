import { describe, it, expect } from "vitest";
import {
  parseIPv4,
  formatIPv4,
  ipv4ToNum,
  classfulPrefix,
  parsePrefixLength,
  parseIPv6,
  formatIPv6,
  AddressParseError,
} from "../index.js";

function v4(text: string): Uint8Array {
  return parseIPv4(text).unwrap();
}

describe("parseIPv4", () => {
  it("parses a dotted-quad address", () => {
    const result = parseIPv4("192.168.0.5");
    expect(result.isOk()).toBe(true);
    expect(Array.from(result.unwrap())).toEqual([192, 168, 0, 5]);
  });

  it("parses boundary octets", () => {
    expect(Array.from(v4("0.0.0.0"))).toEqual([0, 0, 0, 0]);
    expect(Array.from(v4("255.255.255.255"))).toEqual([255, 255, 255, 255]);
  });

  it("rejects too few or too many parts", () => {
    expect(parseIPv4("10.0.0").isErr()).toBe(true);
    expect(parseIPv4("10.0.0.1.2").isErr()).toBe(true);
  });

  it("rejects octets above 255", () => {
    const result = parseIPv4("10.0.0.256");
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(AddressParseError.is(result.error)).toBe(true);
      expect(result.error.input).toBe("10.0.0.256");
    }
  });

  it("rejects leading zeros, signs and empty parts", () => {
    expect(parseIPv4("10.0.0.01").isErr()).toBe(true);
    expect(parseIPv4("10.0.+1.1").isErr()).toBe(true);
    expect(parseIPv4("10..0.1").isErr()).toBe(true);
    expect(parseIPv4("").isErr()).toBe(true);
  });

  it("rejects embedded whitespace", () => {
    expect(parseIPv4("10.0.0.1 ").isErr()).toBe(true);
  });
});

describe("formatIPv4 / ipv4ToNum", () => {
  it("formats bytes", () => {
    expect(formatIPv4(new Uint8Array([10, 0, 0, 255]))).toBe("10.0.0.255");
  });

  it("converts to an unsigned number", () => {
    expect(ipv4ToNum(v4("255.255.255.255"))).toBe(0xffffffff);
    expect(ipv4ToNum(v4("10.0.0.1"))).toBe(0x0a000001);
  });
});

describe("classfulPrefix", () => {
  it("returns 8 for class A", () => {
    expect(classfulPrefix(v4("10.0.0.5"))).toBe(8);
    expect(classfulPrefix(v4("0.1.2.3"))).toBe(8);
    expect(classfulPrefix(v4("127.255.255.255"))).toBe(8);
  });

  it("returns 16 for class B", () => {
    expect(classfulPrefix(v4("128.0.0.1"))).toBe(16);
    expect(classfulPrefix(v4("172.16.0.5"))).toBe(16);
    expect(classfulPrefix(v4("191.255.0.1"))).toBe(16);
  });

  it("returns 24 for class C", () => {
    expect(classfulPrefix(v4("192.168.0.5"))).toBe(24);
    expect(classfulPrefix(v4("223.1.1.1"))).toBe(24);
  });

  it("returns 0 for classes D and E", () => {
    expect(classfulPrefix(v4("224.0.0.1"))).toBe(0);
    expect(classfulPrefix(v4("240.0.0.1"))).toBe(0);
    expect(classfulPrefix(v4("255.255.255.255"))).toBe(0);
  });
});

describe("parsePrefixLength", () => {
  it("accepts values in range", () => {
    expect(parsePrefixLength("0", 32).unwrap()).toBe(0);
    expect(parsePrefixLength("24", 32).unwrap()).toBe(24);
    expect(parsePrefixLength("128", 128).unwrap()).toBe(128);
  });

  it("rejects values above the maximum", () => {
    expect(parsePrefixLength("33", 32).isErr()).toBe(true);
  });

  it("rejects non-decimal text", () => {
    expect(parsePrefixLength("", 32).isErr()).toBe(true);
    expect(parsePrefixLength("-1", 32).isErr()).toBe(true);
    expect(parsePrefixLength("2x", 32).isErr()).toBe(true);
    expect(parsePrefixLength("1000", 128).isErr()).toBe(true);
  });
});

describe("parseIPv6", () => {
  it("parses a compressed link-local address", () => {
    const bytes = parseIPv6("fe80::1").unwrap();
    expect(bytes.length).toBe(16);
    expect(bytes[0]).toBe(0xfe);
    expect(bytes[1]).toBe(0x80);
    expect(bytes[15]).toBe(1);
    expect(Array.from(bytes.slice(2, 15)).every((b) => b === 0)).toBe(true);
  });

  it("parses the unspecified and loopback addresses", () => {
    expect(Array.from(parseIPv6("::").unwrap())).toEqual(new Array(16).fill(0));
    expect(parseIPv6("::1").unwrap()[15]).toBe(1);
  });

  it("parses a full address", () => {
    const bytes = parseIPv6("2001:0db8:0000:0000:0000:ff00:0042:8329").unwrap();
    expect(formatIPv6(bytes)).toBe("2001:db8::ff00:42:8329");
  });

  it("parses an embedded IPv4 tail", () => {
    const bytes = parseIPv6("::ffff:192.168.0.1").unwrap();
    expect(Array.from(bytes.slice(10))).toEqual([0xff, 0xff, 192, 168, 0, 1]);
  });

  it("accepts :: standing for a single group", () => {
    expect(formatIPv6(parseIPv6("1:2:3:4:5:6:7::").unwrap())).toBe("1:2:3:4:5:6:7:0");
  });

  it("rejects malformed input", () => {
    expect(parseIPv6("").isErr()).toBe(true);
    expect(parseIPv6("fe80:::1").isErr()).toBe(true);
    expect(parseIPv6("1::2::3").isErr()).toBe(true);
    expect(parseIPv6("12345::").isErr()).toBe(true);
    expect(parseIPv6("g::1").isErr()).toBe(true);
    expect(parseIPv6("1:2:3:4:5:6:7").isErr()).toBe(true);
    expect(parseIPv6("1:2:3:4:5:6:7:8:9").isErr()).toBe(true);
    expect(parseIPv6("1:2:3:4:5:6:7:8::").isErr()).toBe(true);
    expect(parseIPv6(":1::").isErr()).toBe(true);
    expect(parseIPv6("fe80::1%eth0").isErr()).toBe(true);
    expect(parseIPv6("10.0.0.1").isErr()).toBe(true);
  });

  it("rejects an IPv4 tail before the compression", () => {
    expect(parseIPv6("1.2.3.4::").isErr()).toBe(true);
  });
});

describe("formatIPv6", () => {
  it("compresses the longest zero run", () => {
    expect(formatIPv6(parseIPv6("2001:db8:0:0:1:0:0:0").unwrap())).toBe("2001:db8:0:0:1::");
  });

  it("compresses the leftmost run on ties", () => {
    expect(formatIPv6(parseIPv6("1:0:0:2:0:0:3:4").unwrap())).toBe("1::2:0:0:3:4");
  });

  it("does not compress a single zero group", () => {
    expect(formatIPv6(parseIPv6("1:0:2:3:4:5:6:7").unwrap())).toBe("1:0:2:3:4:5:6:7");
  });

  it("formats the unspecified address", () => {
    expect(formatIPv6(new Uint8Array(16))).toBe("::");
  });

  it("keeps the dotted tail of an IPv4-mapped address", () => {
    expect(formatIPv6(parseIPv6("::ffff:10.0.0.1").unwrap())).toBe("::ffff:10.0.0.1");
    expect(formatIPv6(parseIPv6("0:0:0:0:0:ffff:c0a8:1").unwrap())).toBe("::ffff:192.168.0.1");
  });

  it("formats other addresses ending in ffff groups as hex", () => {
    expect(formatIPv6(parseIPv6("::1:ffff:a00:1").unwrap())).toBe("::1:ffff:a00:1");
  });
});
