/**
 * Tests for address parsing, formatting and fingerprints
 */

import { artifactsEqual, fingerprint, formatAddress, parseAddress } from "../src/compare";
import { ConfigurationError } from "../src/errors";

describe("formatAddress", () => {
  it("should format addresses as lowercase hex", () => {
    expect(formatAddress(0x401abcn)).toBe("0x401abc");
    expect(formatAddress(0n)).toBe("0x0");
  });
});

describe("parseAddress", () => {
  it("should accept hex strings, decimal strings, numbers and bigints", () => {
    expect(parseAddress("0x401000")).toBe(0x401000n);
    expect(parseAddress(" 0X10 ")).toBe(0x10n);
    expect(parseAddress("4096")).toBe(4096n);
    expect(parseAddress(4096)).toBe(4096n);
    expect(parseAddress(7n)).toBe(7n);
    expect(parseAddress("0xffffffffffffffff")).toBe(0xffff_ffff_ffff_ffffn);
  });

  it("should reject malformed and out-of-range values", () => {
    expect(() => parseAddress("main")).toThrow(ConfigurationError);
    expect(() => parseAddress("-1")).toThrow("Invalid address '-1'");
    expect(() => parseAddress(-1)).toThrow("Address -1 is outside the 64-bit range");
    expect(() => parseAddress(1.5)).toThrow(ConfigurationError);
    expect(() => parseAddress("0x10000000000000000")).toThrow(ConfigurationError);
  });
});

describe("fingerprint", () => {
  it("should not depend on key order", () => {
    expect(fingerprint({ name: "a", size: 4 })).toBe(fingerprint({ size: 4, name: "a" }));
  });

  it("should encode bigints as hex and bytes as hex strings", () => {
    expect(fingerprint({ addr: 0x10n, bytes: Uint8Array.from([0x90, 0xcc]) })).toBe(
      '{"addr":"0x10","bytes":"bytes:90cc"}'
    );
  });

  it("should skip undefined fields", () => {
    expect(fingerprint({ name: "g", type: undefined })).toBe(fingerprint({ name: "g" }));
  });

  it("should preserve array order", () => {
    expect(fingerprint({ members: [1, 2] })).not.toBe(fingerprint({ members: [2, 1] }));
  });
});

describe("artifactsEqual", () => {
  it("should compare artifacts by value", () => {
    const a = { addr: 0x10n, name: "f", stackVars: [{ offset: -4, name: "x" }] };
    const b = { stackVars: [{ name: "x", offset: -4 }], name: "f", addr: 0x10n };

    expect(artifactsEqual(a, b)).toBe(true);
    expect(artifactsEqual(a, { ...b, name: "g" })).toBe(false);
  });
});
