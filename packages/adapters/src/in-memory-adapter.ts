/**
 * InMemoryBackend - a complete DecompilerBackend that keeps its database in
 * process memory. Used for testing, for offline snapshots, and as the
 * reference for what a real binding has to provide.
 *
 * All state is held in native addresses; the base class handles lifting.
 */

import { createHash } from "node:crypto";
import {
  DecompilerBackend,
  MAX_ADDRESS,
  artifactsEqual,
  formatAddress,
  type Address,
  type AddressRange,
  type Comment,
  type DecompilerBackendOptions,
  type Enum,
  type FunctionArtifact,
  type FunctionHeader,
  type GlobalVariable,
  type Patch,
  type PatchedByte,
  type StackVariable,
  type Struct,
} from "@artisync/core";

/**
 * Native database contents, used to seed a backend and to export it.
 */
export interface InMemoryState {
  functions?: FunctionArtifact[];
  globalVariables?: GlobalVariable[];
  structs?: Struct[];
  enums?: Enum[];
  comments?: Comment[];
  patchedBytes?: PatchedByte[];
}

/**
 * Native primitives that can be made to fail once, for exercising the
 * error policy.
 */
export type FaultPoint =
  | "getFunction"
  | "setFunction"
  | "setFunctionHeader"
  | "functions"
  | "setStackVariable"
  | "getGlobalVariable"
  | "setGlobalVariable"
  | "getStruct"
  | "setStructHeader"
  | "setStructMembers"
  | "setEnum"
  | "setComment"
  | "setPatch"
  | "decompile"
  | "navigateTo";

export type Decompiler = (fn: FunctionArtifact) => string;

/**
 * Configuration options for InMemoryBackend.
 */
export interface InMemoryBackendOptions extends DecompilerBackendOptions {
  /** Raw image bytes, loaded at `imageBase`. Used for the binary hash and original bytes. */
  image?: Uint8Array;
  /** Native address of `image[0]`. Defaults to 0. */
  imageBase?: Address;
  /** Digest to report when no image is loaded. */
  binaryHash?: string;
  binaryPath?: string | null;
  /** Native range to scan for patches when no image is loaded. Defaults to the whole space. */
  addressRange?: AddressRange;
  /** Omit to simulate a backend with disassembly only. */
  decompiler?: Decompiler;
  initialState?: InMemoryState;
  /** Called with the native state when the backend is closed. */
  onClose?: (state: InMemoryState) => Promise<void>;
}

interface ByteEdit {
  original: number;
  patched: number;
}

function compareAddresses(a: Address, b: Address): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * In-memory backend that honours the full adapter contract: identical
 * writes report no change and patched bytes enumerate in address order.
 */
export class InMemoryBackend extends DecompilerBackend {
  /** Native addresses passed to navigation, oldest first. */
  readonly navigationHistory: Address[] = [];

  private readonly functionMap = new Map<Address, FunctionArtifact>();
  private readonly globalMap = new Map<Address, GlobalVariable>();
  private readonly structMap = new Map<string, Struct>();
  private readonly enumMap = new Map<string, Enum>();
  private readonly commentMap = new Map<Address, Comment>();
  private readonly byteEdits = new Map<Address, ByteEdit>();
  private readonly faults = new Map<FaultPoint, Error>();

  private readonly image: Uint8Array | undefined;
  private readonly imageBase: Address;
  private readonly options: InMemoryBackendOptions;
  private decompiler: Decompiler | undefined;

  constructor(options: InMemoryBackendOptions = {}) {
    super({ name: "in-memory", ...options });
    this.options = options;
    this.image = options.image;
    this.imageBase = options.imageBase ?? 0n;
    this.decompiler = options.decompiler;

    if (options.initialState) {
      this.load(options.initialState);
    }
  }

  /**
   * Replace the database contents with `state` (native addresses).
   */
  load(state: InMemoryState): void {
    this.functionMap.clear();
    this.globalMap.clear();
    this.structMap.clear();
    this.enumMap.clear();
    this.commentMap.clear();
    this.byteEdits.clear();

    for (const fn of state.functions ?? []) {
      this.functionMap.set(fn.addr, structuredClone(fn));
    }
    for (const gvar of state.globalVariables ?? []) {
      this.globalMap.set(gvar.addr, structuredClone(gvar));
    }
    for (const struct of state.structs ?? []) {
      this.structMap.set(struct.name, structuredClone(struct));
    }
    for (const enumeration of state.enums ?? []) {
      this.enumMap.set(enumeration.name, structuredClone(enumeration));
    }
    for (const comment of state.comments ?? []) {
      this.commentMap.set(comment.addr, structuredClone(comment));
    }
    for (const edit of state.patchedBytes ?? []) {
      this.byteEdits.set(edit.addr, { original: edit.original, patched: edit.patched });
    }
  }

  /**
   * Copy of the database contents (native addresses), patched bytes sorted.
   */
  exportState(): InMemoryState {
    return {
      functions: [...this.functionMap.values()].map((fn) => structuredClone(fn)),
      globalVariables: [...this.globalMap.values()].map((gvar) => structuredClone(gvar)),
      structs: [...this.structMap.values()].map((struct) => structuredClone(struct)),
      enums: [...this.enumMap.values()].map((enumeration) => structuredClone(enumeration)),
      comments: [...this.commentMap.values()].map((comment) => structuredClone(comment)),
      patchedBytes: [...this.sortedEdits()].map(([addr, edit]) => ({ addr, ...edit })),
    };
  }

  /**
   * Make the next call to a native primitive throw (useful for testing).
   */
  injectFault(point: FaultPoint, error: Error = new Error(`injected fault in ${point}`)): void {
    this.faults.set(point, error);
  }

  /**
   * Attach or detach the decompiler. Takes effect after `invalidateCapabilities()`.
   */
  setDecompiler(decompiler: Decompiler | undefined): void {
    this.decompiler = decompiler;
  }

  // --- Metadata ---

  protected async _binaryHash(): Promise<string> {
    if (this.options.binaryHash !== undefined) {
      return this.options.binaryHash;
    }
    if (!this.image) {
      throw new Error("no binary loaded");
    }
    return createHash("md5").update(this.image).digest("hex");
  }

  protected async _binaryPath(): Promise<string | null> {
    return this.options.binaryPath ?? null;
  }

  protected async _functionSize(addr: Address): Promise<number> {
    return this.containingFunction(addr)?.size ?? 0;
  }

  protected async _navigateTo(addr: Address): Promise<void> {
    this.trip("navigateTo");
    this.navigationHistory.push(addr);
  }

  protected _detectDecompiler(): boolean {
    return this.decompiler !== undefined;
  }

  protected async _decompile(addr: Address): Promise<string | null> {
    this.trip("decompile");
    const fn = this.functionMap.get(addr);
    if (!fn || !this.decompiler) {
      return null;
    }
    return this.decompiler(structuredClone(fn));
  }

  protected async _functionContaining(addr: Address): Promise<FunctionHeader | null> {
    const fn = this.containingFunction(addr);
    return fn ? { ...fn.header, addr: fn.addr } : null;
  }

  // --- Functions ---

  protected async _getFunction(addr: Address): Promise<FunctionArtifact | null> {
    this.trip("getFunction");
    const fn = this.functionMap.get(addr);
    return fn ? structuredClone(fn) : null;
  }

  protected async _setFunction(fn: FunctionArtifact): Promise<boolean> {
    this.trip("setFunction");
    const next: FunctionArtifact = {
      ...structuredClone(fn),
      header: { ...fn.header, addr: fn.addr },
      stackVars: [...fn.stackVars].sort((a, b) => a.offset - b.offset).map((svar) => ({ ...svar, funcAddr: fn.addr })),
    };
    return this.replace(this.functionMap, fn.addr, next);
  }

  protected async _setFunctionHeader(header: FunctionHeader): Promise<boolean> {
    this.trip("setFunctionHeader");
    const fn = this.requireFunction(header.addr);
    return this.replace(this.functionMap, fn.addr, { ...fn, header: { ...header } });
  }

  protected async _functions(): Promise<Map<Address, FunctionArtifact>> {
    this.trip("functions");
    const listing = new Map<Address, FunctionArtifact>();
    for (const fn of this.functionMap.values()) {
      listing.set(fn.addr, {
        addr: fn.addr,
        size: fn.size,
        header: { name: fn.header.name, addr: fn.header.addr },
        stackVars: [],
      });
    }
    return listing;
  }

  protected async _setStackVariable(svar: StackVariable): Promise<boolean> {
    this.trip("setStackVariable");
    const fn = this.requireFunction(svar.funcAddr);
    const stackVars = fn.stackVars.filter((existing) => existing.offset !== svar.offset);
    stackVars.push({ ...svar });
    stackVars.sort((a, b) => a.offset - b.offset);
    return this.replace(this.functionMap, fn.addr, { ...fn, stackVars });
  }

  // --- Global variables ---

  protected async _getGlobalVariable(addr: Address): Promise<GlobalVariable | null> {
    this.trip("getGlobalVariable");
    const gvar = this.globalMap.get(addr);
    return gvar ? { ...gvar } : null;
  }

  protected async _setGlobalVariable(gvar: GlobalVariable): Promise<boolean> {
    this.trip("setGlobalVariable");
    return this.replace(this.globalMap, gvar.addr, { ...gvar });
  }

  protected async _globalVariables(): Promise<Map<Address, GlobalVariable>> {
    const listing = new Map<Address, GlobalVariable>();
    for (const gvar of this.globalMap.values()) {
      listing.set(gvar.addr, { addr: gvar.addr, name: gvar.name, size: gvar.size });
    }
    return listing;
  }

  // --- Structs ---

  protected async _getStruct(name: string): Promise<Struct | null> {
    this.trip("getStruct");
    const struct = this.structMap.get(name);
    return struct ? structuredClone(struct) : null;
  }

  protected async _setStructHeader(struct: Struct): Promise<boolean> {
    this.trip("setStructHeader");
    const existing = this.structMap.get(struct.name);
    const members = existing ? existing.members : [];
    return this.replace(this.structMap, struct.name, { name: struct.name, size: struct.size, members });
  }

  protected async _setStructMembers(struct: Struct): Promise<boolean> {
    this.trip("setStructMembers");
    const existing = this.structMap.get(struct.name);
    if (!existing) {
      throw new Error(`struct ${struct.name} does not exist`);
    }
    const members = struct.members.map((member) => ({ ...member })).sort((a, b) => a.offset - b.offset);
    return this.replace(this.structMap, struct.name, { ...existing, members });
  }

  protected async _deleteStruct(name: string): Promise<boolean> {
    return this.structMap.delete(name);
  }

  protected async _structs(): Promise<Map<string, Struct>> {
    const listing = new Map<string, Struct>();
    for (const struct of this.structMap.values()) {
      listing.set(struct.name, { name: struct.name, size: struct.size, members: [] });
    }
    return listing;
  }

  // --- Enums ---

  protected async _getEnum(name: string): Promise<Enum | null> {
    const enumeration = this.enumMap.get(name);
    return enumeration ? structuredClone(enumeration) : null;
  }

  protected async _setEnum(enumeration: Enum): Promise<boolean> {
    this.trip("setEnum");
    return this.replace(this.enumMap, enumeration.name, structuredClone(enumeration));
  }

  protected async _enums(): Promise<Map<string, Enum>> {
    const listing = new Map<string, Enum>();
    for (const enumeration of this.enumMap.values()) {
      listing.set(enumeration.name, { name: enumeration.name, members: {} });
    }
    return listing;
  }

  // --- Comments ---

  protected async _getComment(addr: Address): Promise<Comment | null> {
    const comment = this.commentMap.get(addr);
    return comment ? { ...comment } : null;
  }

  /**
   * An empty comment text removes the comment.
   */
  protected async _setComment(comment: Comment): Promise<boolean> {
    this.trip("setComment");
    if (comment.text === "") {
      return this.commentMap.delete(comment.addr);
    }
    return this.replace(this.commentMap, comment.addr, { ...comment });
  }

  protected async _comments(): Promise<Map<Address, Comment>> {
    const listing = new Map<Address, Comment>();
    for (const comment of this.commentMap.values()) {
      listing.set(comment.addr, { ...comment });
    }
    return listing;
  }

  // --- Patches ---

  /**
   * Writing a byte back to its original value un-patches it.
   */
  protected async _setPatch(patch: Patch): Promise<boolean> {
    this.trip("setPatch");
    if (patch.addr + BigInt(patch.bytes.length) - 1n > MAX_ADDRESS) {
      throw new Error(`patch at ${formatAddress(patch.addr)} runs past the address space`);
    }

    let changed = false;
    for (let index = 0; index < patch.bytes.length; index++) {
      const value = patch.bytes[index];
      const addr = patch.addr + BigInt(index);
      const edit = this.byteEdits.get(addr);
      const original = edit?.original ?? this.originalByte(addr);
      const current = edit?.patched ?? original;

      if (value === current) {
        continue;
      }
      changed = true;
      if (value === original) {
        this.byteEdits.delete(addr);
      } else {
        this.byteEdits.set(addr, { original, patched: value });
      }
    }
    return changed;
  }

  protected *_patchedBytes(minAddr: Address, maxAddr: Address): Iterable<PatchedByte> {
    for (const [addr, edit] of this.sortedEdits()) {
      if (addr < minAddr) {
        continue;
      }
      if (addr >= maxAddr) {
        return;
      }
      yield { addr, original: edit.original, patched: edit.patched };
    }
  }

  protected async _addressRange(): Promise<AddressRange | null> {
    if (this.image) {
      return { minAddr: this.imageBase, maxAddr: this.imageBase + BigInt(this.image.length) };
    }
    return this.options.addressRange ?? { minAddr: 0n, maxAddr: MAX_ADDRESS };
  }

  protected async _close(): Promise<void> {
    if (this.options.onClose) {
      await this.options.onClose(this.exportState());
    }
  }

  // --- Helpers ---

  private trip(point: FaultPoint): void {
    const fault = this.faults.get(point);
    if (fault) {
      this.faults.delete(point);
      throw fault;
    }
  }

  private replace<K, V extends object>(map: Map<K, V>, key: K, next: V): boolean {
    const existing = map.get(key);
    if (existing && artifactsEqual(existing, next)) {
      return false;
    }
    map.set(key, next);
    return true;
  }

  private requireFunction(addr: Address): FunctionArtifact {
    const fn = this.functionMap.get(addr);
    if (!fn) {
      throw new Error(`no function at ${formatAddress(addr)}`);
    }
    return fn;
  }

  private containingFunction(addr: Address): FunctionArtifact | undefined {
    for (const fn of this.functionMap.values()) {
      if (addr === fn.addr || (addr > fn.addr && addr < fn.addr + BigInt(fn.size))) {
        return fn;
      }
    }
    return undefined;
  }

  private originalByte(addr: Address): number {
    if (!this.image || addr < this.imageBase) {
      return 0;
    }
    const offset = addr - this.imageBase;
    return offset < BigInt(this.image.length) ? this.image[Number(offset)] : 0;
  }

  private sortedEdits(): [Address, ByteEdit][] {
    return [...this.byteEdits.entries()].sort(([a], [b]) => compareAddresses(a, b));
  }
}
