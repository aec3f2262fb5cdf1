/**
 * Tests for ArtifactLifter
 */

import { RebasedAddressLifter } from "../src/address";
import { ArtifactLifter } from "../src/artifact-lifter";
import { INVALID_ADDRESS, type Comment, type FunctionArtifact } from "../src/artifacts";
import { ConfigurationError, UnmappedAddressError } from "../src/errors";

function createLifter(): ArtifactLifter {
  return new ArtifactLifter(new RebasedAddressLifter({ nativeBase: 0x401000n, canonicalBase: 0x1000n, size: 0xf000n }), {
    __int64: "long long",
    _DWORD: "unsigned int",
  });
}

const nativeFunction: FunctionArtifact = {
  addr: 0x401000n,
  size: 0x40,
  header: { name: "parse_args", addr: 0x401000n, returnType: "__int64" },
  stackVars: [
    { funcAddr: 0x401000n, offset: -8, name: "count", type: "_DWORD", size: 4 },
    { funcAddr: 0x401000n, offset: -16, name: "buf", type: "char *", size: 8 },
  ],
};

describe("ArtifactLifter", () => {
  describe("Functions", () => {
    it("should lift every address and type in a function", () => {
      const lifted = createLifter().liftFunction(nativeFunction);

      expect(lifted).toEqual({
        addr: 0x1000n,
        size: 0x40,
        header: { name: "parse_args", addr: 0x1000n, returnType: "long long" },
        stackVars: [
          { funcAddr: 0x1000n, offset: -8, name: "count", type: "unsigned int", size: 4 },
          { funcAddr: 0x1000n, offset: -16, name: "buf", type: "char *", size: 8 },
        ],
      });
    });

    it("should restore the native function when lowering a lifted one", () => {
      const lifter = createLifter();

      expect(lifter.lowerFunction(lifter.liftFunction(nativeFunction))).toEqual(nativeFunction);
    });

    it("should not mutate its input", () => {
      const input = structuredClone(nativeFunction);
      createLifter().liftFunction(input);

      expect(input).toEqual(nativeFunction);
    });

    it("should leave an absent return type absent", () => {
      const header = createLifter().liftFunctionHeader({ name: "f", addr: 0x401010n });

      expect(header).toEqual({ name: "f", addr: 0x1010n });
      expect("returnType" in header).toBe(false);
    });
  });

  describe("Unset and invalid addresses", () => {
    it("should keep unset addresses unset in both directions", () => {
      const lifter = createLifter();
      const comment: Comment = { addr: 0x401020n, text: "entry", decompiled: false, funcAddr: 0n };

      expect(lifter.liftComment(comment).funcAddr).toBe(0n);
      expect(lifter.liftAddress(0n)).toBe(0n);
      expect(lifter.lowerAddress(0n)).toBe(0n);
    });

    it("should lift unmappable native addresses to the invalid address", () => {
      expect(createLifter().liftAddress(0x500000n)).toBe(INVALID_ADDRESS);
    });

    it("should propagate unmapped errors when lowering", () => {
      expect(() => createLifter().lowerGlobalVariable({ addr: 0x20000n, name: "g", size: 4 })).toThrow(
        UnmappedAddressError
      );
    });
  });

  describe("Types", () => {
    it("should translate aliased types and pass others through", () => {
      const lifter = createLifter();

      expect(lifter.liftType("__int64")).toBe("long long");
      expect(lifter.lowerType("long long")).toBe("__int64");
      expect(lifter.liftType("int")).toBe("int");
    });

    it("should translate struct member types", () => {
      const struct = createLifter().lowerStruct({
        name: "header",
        size: 12,
        members: [{ offset: 0, name: "magic", type: "unsigned int", size: 4 }],
      });

      expect(struct.members[0].type).toBe("_DWORD");
    });

    it("should reject aliases that map two native types to one canonical type", () => {
      expect(
        () =>
          new ArtifactLifter(new RebasedAddressLifter({ nativeBase: 0n }), {
            __int64: "long long",
            int64_t: "long long",
          })
      ).toThrow(ConfigurationError);
    });
  });

  describe("Patches and enums", () => {
    it("should copy patch bytes", () => {
      const bytes = Uint8Array.from([0x90, 0x90]);
      const lifted = createLifter().liftPatch({ addr: 0x401100n, bytes });
      bytes[0] = 0xcc;

      expect(lifted.addr).toBe(0x1100n);
      expect(Array.from(lifted.bytes)).toEqual([0x90, 0x90]);
    });

    it("should copy enum members", () => {
      const members = { RED: 0, GREEN: 1 };
      const lowered = createLifter().lowerEnum({ name: "color", members });

      expect(lowered).toEqual({ name: "color", members: { RED: 0, GREEN: 1 } });
      expect(lowered.members).not.toBe(members);
    });
  });
});
