/**
 * Contract tests for BackendAdapter implementations.
 * The same suite runs against the in-memory backend under every address
 * lifter, so canonical behaviour must not depend on the native layout.
 */

import {
  IdentityAddressLifter,
  RebasedAddressLifter,
  SegmentedAddressLifter,
  type AddressLifter,
  type BackendAdapter,
  type Comment,
  type FunctionArtifact,
  type GlobalVariable,
} from "@artisync/core";
import { InMemoryBackend } from "../src/in-memory-adapter";

function createFunction(addr: bigint): FunctionArtifact {
  return {
    addr,
    size: 0x30,
    header: { name: `sub_${addr.toString(16)}`, addr, returnType: "int" },
    stackVars: [
      { funcAddr: addr, offset: -16, name: "buf", type: "char *", size: 8 },
      { funcAddr: addr, offset: -4, name: "i", type: "int", size: 4 },
    ],
  };
}

/**
 * Test suite that works with any BackendAdapter whose native layout is
 * described by `lifter`.
 */
function runBackendContractTests(
  createBackend: () => { backend: BackendAdapter; exportNative: () => { functions: bigint[]; patches: bigint[] } },
  lifter: AddressLifter,
  implementationName: string
) {
  describe(`BackendAdapter Contract Tests - ${implementationName}`, () => {
    let backend: BackendAdapter;
    let exportNative: () => { functions: bigint[]; patches: bigint[] };

    beforeEach(() => {
      ({ backend, exportNative } = createBackend());
    });

    describe("Functions", () => {
      it("should store functions at their native address and read them back canonically", async () => {
        const fn = createFunction(0x1100n);

        expect(await backend.setFunction(fn)).toBe(true);
        expect(await backend.getFunction(0x1100n)).toEqual(fn);
        expect(exportNative().functions).toEqual([lifter.lower(0x1100n)]);
      });

      it("should report identical writes as unchanged", async () => {
        const fn = createFunction(0x1100n);
        await backend.setFunction(fn);

        expect(await backend.setFunction(structuredClone(fn))).toBe(false);
      });

      it("should update headers without touching stack variables", async () => {
        const fn = createFunction(0x1100n);
        await backend.setFunction(fn);

        expect(await backend.setFunctionHeader({ name: "main", addr: 0x1100n, returnType: "int" })).toBe(true);

        const updated = await backend.getFunction(0x1100n);
        expect(updated?.header.name).toBe("main");
        expect(updated?.stackVars).toEqual(fn.stackVars);
      });

      it("should list functions keyed by canonical address with minimal fields", async () => {
        await backend.setFunction(createFunction(0x1200n));
        await backend.setFunction(createFunction(0x1100n));

        const listing = await backend.functions();
        expect([...listing.keys()].sort()).toEqual([0x1100n, 0x1200n]);
        expect(listing.get(0x1100n)?.stackVars).toEqual([]);
        expect(listing.get(0x1100n)?.header.returnType).toBeUndefined();
      });

      it("should write single stack variables into an existing function", async () => {
        await backend.setFunction(createFunction(0x1100n));
        const svar = { funcAddr: 0x1100n, offset: -4, name: "index", type: "unsigned int", size: 4 };

        expect(await backend.setStackVariable(svar)).toBe(true);
        expect(await backend.getStackVariable(0x1100n, -4)).toEqual(svar);
      });

      it("should fail stack variable writes for unknown functions", async () => {
        const svar = { funcAddr: 0x1100n, offset: -4, name: "i", type: "int", size: 4 };

        expect(await backend.setStackVariable(svar)).toBe(false);
      });
    });

    describe("Global variables and comments", () => {
      it("should round-trip global variables", async () => {
        const gvar: GlobalVariable = { addr: 0x1800n, name: "g_count", size: 4, type: "int" };

        expect(await backend.setGlobalVariable(gvar)).toBe(true);
        expect(await backend.setGlobalVariable({ ...gvar })).toBe(false);
        expect(await backend.getGlobalVariable(0x1800n)).toEqual(gvar);
      });

      it("should round-trip comments including their function address", async () => {
        await backend.setFunction(createFunction(0x1100n));
        const comment: Comment = { addr: 0x1104n, text: "check bounds", decompiled: true, funcAddr: 0x1100n };

        expect(await backend.setComment(comment)).toBe(true);
        expect(await backend.getComment(0x1104n)).toEqual(comment);
        expect([...(await backend.comments()).keys()]).toEqual([0x1104n]);
      });
    });

    describe("Structs and enums", () => {
      it("should round-trip structs and list them without members", async () => {
        const struct = { name: "node", size: 16, members: [{ offset: 0, name: "next", type: "node *", size: 8 }] };

        expect(await backend.setStruct(struct)).toBe(true);
        expect(await backend.setStruct(structuredClone(struct))).toBe(false);
        expect(await backend.getStruct("node")).toEqual(struct);
        expect((await backend.structs()).get("node")?.members).toEqual([]);
      });

      it("should round-trip enums", async () => {
        const enumeration = { name: "mode", members: { READ: 1, WRITE: 2 } };

        expect(await backend.setEnum(enumeration)).toBe(true);
        expect(await backend.getEnum("mode")).toEqual(enumeration);
        expect(await backend.setEnum({ name: "mode", members: { WRITE: 2, READ: 1 } })).toBe(false);
      });
    });

    describe("Patches", () => {
      it("should list patches as maximal runs in canonical addresses", async () => {
        await backend.setPatch({ addr: 0x1010n, bytes: Uint8Array.from([0x90]) });
        await backend.setPatch({ addr: 0x1011n, bytes: Uint8Array.from([0x90, 0x90]) });
        await backend.setPatch({ addr: 0x1020n, bytes: Uint8Array.from([0xc3]) });

        const patches = await backend.patches();
        expect([...patches.keys()]).toEqual([0x1010n, 0x1020n]);
        expect(Array.from(patches.get(0x1010n)?.bytes ?? [])).toEqual([0x90, 0x90, 0x90]);
        expect(exportNative().patches).toEqual([
          lifter.lower(0x1010n),
          lifter.lower(0x1011n),
          lifter.lower(0x1012n),
          lifter.lower(0x1020n),
        ]);
      });

      it("should find a patch only at the start of its run", async () => {
        await backend.setPatch({ addr: 0x1010n, bytes: Uint8Array.from([0x31, 0xc0]) });

        expect(Array.from((await backend.getPatch(0x1010n))?.bytes ?? [])).toEqual([0x31, 0xc0]);
        expect(await backend.getPatch(0x1011n)).toBeNull();
      });
    });

    describe("Metadata", () => {
      it("should report a lowercase hex binary hash", async () => {
        expect(await backend.binaryHash()).toMatch(/^[0-9a-f]+$/);
      });
    });
  });
}

const lifters: [string, () => AddressLifter][] = [
  ["identity", () => new IdentityAddressLifter()],
  ["rebased", () => new RebasedAddressLifter({ nativeBase: 0x400000n, canonicalBase: 0x1000n, size: 0x10000n })],
  [
    "segmented",
    () =>
      new SegmentedAddressLifter([
        { nativeStart: 0x10000n, canonicalStart: 0x1000n, size: 0x800n },
        { nativeStart: 0x80000n, canonicalStart: 0x1800n, size: 0x800n },
      ]),
  ],
];

for (const [name, createLifter] of lifters) {
  const lifter = createLifter();
  runBackendContractTests(
    () => {
      const backend = new InMemoryBackend({ lifter, binaryHash: "00ff" });
      return {
        backend,
        exportNative: () => {
          const state = backend.exportState();
          return {
            functions: (state.functions ?? []).map((fn) => fn.addr),
            patches: (state.patchedBytes ?? []).map((edit) => edit.addr),
          };
        },
      };
    },
    lifter,
    `InMemory (${name} lifter)`
  );
}

describe("InMemoryBackend", () => {
  it("should hash the loaded image with MD5", async () => {
    const backend = new InMemoryBackend({ image: new TextEncoder().encode("abc") });

    expect(await backend.binaryHash()).toBe("900150983cd24fb0d6963f7d28e17f72");
  });

  it("should fail to hash when nothing is loaded", async () => {
    await expect(new InMemoryBackend().binaryHash()).rejects.toThrow("no binary loaded");
  });

  it("should treat image bytes as the originals when patching", async () => {
    const backend = new InMemoryBackend({ image: Uint8Array.from([0x55, 0x48, 0x89]), imageBase: 0x400000n });

    expect(await backend.setPatch({ addr: 0x400000n, bytes: Uint8Array.from([0x55, 0xc3]) })).toBe(true);

    expect(backend.exportState().patchedBytes).toEqual([{ addr: 0x400001n, original: 0x48, patched: 0xc3 }]);
  });

  it("should limit patch listings to the image", async () => {
    const backend = new InMemoryBackend({
      image: Uint8Array.from([0x00, 0x00]),
      imageBase: 0x400000n,
      initialState: {
        patchedBytes: [
          { addr: 0x400001n, original: 0, patched: 0x90 },
          { addr: 0x500000n, original: 0, patched: 0x90 },
        ],
      },
    });

    expect([...(await backend.patches()).keys()]).toEqual([0x400001n]);
  });

  it("should delete a comment written with empty text", async () => {
    const backend = new InMemoryBackend({ binaryHash: "00" });
    await backend.setComment({ addr: 0x10n, text: "note", decompiled: false });

    expect(await backend.setComment({ addr: 0x10n, text: "", decompiled: false })).toBe(true);
    expect(await backend.getComment(0x10n)).toBeNull();
  });
});
