/**
 * Backend adapter contract.
 *
 * `BackendAdapter` is the seam every decompiler binding sits behind; the
 * engine only ever talks to this interface, in canonical addresses.
 * `DecompilerBackend` is the shared half of every binding: it lowers
 * incoming addresses, lifts outgoing artifacts, serializes calls, enforces
 * the error policy, and leaves concrete bindings to implement a small set
 * of native-address primitives.
 */

import type { AddressLifter } from "./address.js";
import { IdentityAddressLifter } from "./address.js";
import { ArtifactLifter, type TypeAliases } from "./artifact-lifter.js";
import {
  INVALID_ADDRESS,
  MAX_ADDRESS,
  UNSET_ADDRESS,
  type Address,
  type ArtifactKind,
  type Comment,
  type Enum,
  type FunctionArtifact,
  type FunctionHeader,
  type GlobalVariable,
  type Patch,
  type StackVariable,
  type Struct,
} from "./artifacts.js";
import { CachedCapability } from "./capability.js";
import { formatAddress } from "./compare.js";
import { BackendError, ConfigurationError, describeError, isArtisyncError } from "./errors.js";
import { BackendExecutor } from "./executor.js";
import { getLogger, type Logger } from "./logger.js";
import { collectContinuousPatches, type PatchedByte } from "./patches.js";

export interface SetStructOptions {
  /** Write name and size. Defaults to true. */
  header?: boolean;
  /** Write the member list. Defaults to true. */
  members?: boolean;
}

/**
 * How a struct write that touches both header and members behaves when one
 * half fails.
 * - `independent`: each half is applied on its own; a failure in one does
 *   not stop the other.
 * - `atomic`: both or neither; a failure restores the previous struct.
 */
export type StructSyncPolicy = "independent" | "atomic";

/**
 * A write the backend must refuse because it is known to corrupt its state.
 * `key` is the artifact identity as printed in logs: a name for structs and
 * enums, a hex address for address-keyed kinds, `0xfunc:offset` for stack
 * variables.
 */
export interface UnsafeOperation {
  kind: ArtifactKind;
  key: string;
  reason: string;
}

export interface AddressRange {
  minAddr: Address;
  /** Exclusive. */
  maxAddr: Address;
}

/**
 * Operations every backend exposes, in canonical addresses.
 *
 * `get*` resolves to null when the artifact does not exist. `set*` resolves
 * to true only when backend state actually changed, and to false for no-op
 * writes, refused writes and backend failures. Listings carry identity and
 * minimal fields only; use the matching `get*` for the full artifact.
 */
export interface BackendAdapter {
  readonly name: string;

  binaryHash(): Promise<string>;
  binaryPath(): Promise<string | null>;
  functionSize(addr: Address): Promise<number>;
  navigateTo(addr: Address): void;
  readonly decompilerAvailable: boolean;
  decompile(fn: FunctionArtifact): Promise<string | null>;
  activeContext(): FunctionArtifact | null;

  getFunction(addr: Address): Promise<FunctionArtifact | null>;
  setFunction(fn: FunctionArtifact): Promise<boolean>;
  setFunctionHeader(header: FunctionHeader): Promise<boolean>;
  functions(): Promise<Map<Address, FunctionArtifact>>;

  getStackVariable(funcAddr: Address, offset: number): Promise<StackVariable | null>;
  setStackVariable(svar: StackVariable): Promise<boolean>;

  getGlobalVariable(addr: Address): Promise<GlobalVariable | null>;
  setGlobalVariable(gvar: GlobalVariable): Promise<boolean>;
  globalVariables(): Promise<Map<Address, GlobalVariable>>;

  getStruct(name: string): Promise<Struct | null>;
  setStruct(struct: Struct, options?: SetStructOptions): Promise<boolean>;
  structs(): Promise<Map<string, Struct>>;

  getEnum(name: string): Promise<Enum | null>;
  setEnum(enumeration: Enum): Promise<boolean>;
  enums(): Promise<Map<string, Enum>>;

  getComment(addr: Address): Promise<Comment | null>;
  setComment(comment: Comment): Promise<boolean>;
  comments(): Promise<Map<Address, Comment>>;

  getPatch(addr: Address): Promise<Patch | null>;
  setPatch(patch: Patch): Promise<boolean>;
  patches(): Promise<Map<Address, Patch>>;

  /** Release backend resources; pending calls finish first. */
  close(): Promise<void>;
}

export interface DecompilerBackendOptions {
  name?: string;
  lifter?: AddressLifter;
  typeAliases?: TypeAliases;
  unsafeOperations?: UnsafeOperation[];
  structSyncPolicy?: StructSyncPolicy;
  /** Longest run `getPatch` looks for. Defaults to 0xff bytes. */
  maxPatchSize?: number;
  logger?: Logger;
  executor?: BackendExecutor;
}

const DEFAULT_MAX_PATCH_SIZE = 0xff;

function isUsableAddress(addr: Address): boolean {
  return addr !== UNSET_ADDRESS && addr !== INVALID_ADDRESS;
}

function stackVariableKey(funcAddr: Address, offset: number): string {
  return `${formatAddress(funcAddr)}:${offset}`;
}

export abstract class DecompilerBackend implements BackendAdapter {
  readonly name: string;
  readonly structSyncPolicy: StructSyncPolicy;
  readonly maxPatchSize: number;
  readonly unsafeOperations: readonly UnsafeOperation[];
  protected readonly lifter: ArtifactLifter;
  protected readonly executor: BackendExecutor;

  private readonly explicitLogger: Logger | undefined;
  private readonly unsafeIndex: Map<string, UnsafeOperation>;
  private readonly decompilerCapability: CachedCapability<boolean>;
  // Written only from updateActiveContext (the UI callback path).
  private currentContext: FunctionArtifact | null = null;

  constructor(options: DecompilerBackendOptions = {}) {
    this.name = options.name ?? "backend";
    this.lifter = new ArtifactLifter(options.lifter ?? new IdentityAddressLifter(), options.typeAliases);
    this.executor = options.executor ?? new BackendExecutor();
    this.structSyncPolicy = options.structSyncPolicy ?? "independent";
    this.maxPatchSize = options.maxPatchSize ?? DEFAULT_MAX_PATCH_SIZE;
    this.explicitLogger = options.logger;
    this.unsafeOperations = [...(options.unsafeOperations ?? [])];
    this.unsafeIndex = new Map(
      this.unsafeOperations.map((op): [string, UnsafeOperation] => [`${op.kind}:${op.key}`, op])
    );
    this.decompilerCapability = new CachedCapability(() => {
      try {
        return this._detectDecompiler();
      } catch (error) {
        this.logger.warn(`${this.name}: decompiler check failed: ${describeError(error)}`);
        return false;
      }
    });

    if (!Number.isSafeInteger(this.maxPatchSize) || this.maxPatchSize <= 0) {
      throw new ConfigurationError(`maxPatchSize must be a positive integer, got ${this.maxPatchSize}`);
    }
  }

  protected get logger(): Logger {
    return this.explicitLogger ?? getLogger();
  }

  // --- Native primitives (backend addresses, backend types) ---

  protected abstract _binaryHash(): Promise<string>;
  protected abstract _binaryPath(): Promise<string | null>;
  protected abstract _functionSize(addr: Address): Promise<number>;
  protected abstract _navigateTo(addr: Address): Promise<void>;
  protected abstract _detectDecompiler(): boolean;
  protected abstract _decompile(addr: Address): Promise<string | null>;
  /** Header of the function containing `addr`, or null outside any function. */
  protected abstract _functionContaining(addr: Address): Promise<FunctionHeader | null>;

  protected abstract _getFunction(addr: Address): Promise<FunctionArtifact | null>;
  protected abstract _setFunction(fn: FunctionArtifact): Promise<boolean>;
  protected abstract _setFunctionHeader(header: FunctionHeader): Promise<boolean>;
  protected abstract _functions(): Promise<Map<Address, FunctionArtifact>>;
  protected abstract _setStackVariable(svar: StackVariable): Promise<boolean>;

  protected abstract _getGlobalVariable(addr: Address): Promise<GlobalVariable | null>;
  protected abstract _setGlobalVariable(gvar: GlobalVariable): Promise<boolean>;
  protected abstract _globalVariables(): Promise<Map<Address, GlobalVariable>>;

  protected abstract _getStruct(name: string): Promise<Struct | null>;
  protected abstract _setStructHeader(struct: Struct): Promise<boolean>;
  protected abstract _setStructMembers(struct: Struct): Promise<boolean>;
  protected abstract _deleteStruct(name: string): Promise<boolean>;
  protected abstract _structs(): Promise<Map<string, Struct>>;

  protected abstract _getEnum(name: string): Promise<Enum | null>;
  protected abstract _setEnum(enumeration: Enum): Promise<boolean>;
  protected abstract _enums(): Promise<Map<string, Enum>>;

  protected abstract _getComment(addr: Address): Promise<Comment | null>;
  protected abstract _setComment(comment: Comment): Promise<boolean>;
  protected abstract _comments(): Promise<Map<Address, Comment>>;

  protected abstract _setPatch(patch: Patch): Promise<boolean>;
  /** Patched bytes over `[minAddr, maxAddr)`, strictly increasing by address. */
  protected abstract _patchedBytes(minAddr: Address, maxAddr: Address): Iterable<PatchedByte>;
  /** Native address range of the loaded image, or null when nothing is loaded. */
  protected abstract _addressRange(): Promise<AddressRange | null>;

  protected async _close(): Promise<void> {}

  // --- Metadata ---

  binaryHash(): Promise<string> {
    return this.executor.run(async () => {
      const hash = (await this._binaryHash()).toLowerCase();
      if (!/^[0-9a-f]+$/.test(hash)) {
        throw new BackendError(`${this.name}: binary hash '${hash}' is not a hex digest`);
      }
      return hash;
    });
  }

  binaryPath(): Promise<string | null> {
    return this.executor.run(() => this._binaryPath());
  }

  functionSize(addr: Address): Promise<number> {
    return this.executor.run(async () => {
      if (!isUsableAddress(addr)) {
        return 0;
      }
      const native = this.lifter.lowerAddress(addr);
      return (await this.guardRead("function", formatAddress(addr), () => this._functionSize(native))) ?? 0;
    });
  }

  /**
   * Best-effort jump in the backend UI. Returns immediately; failures are
   * logged.
   * @throws UnmappedAddressError if the address has no native counterpart
   */
  navigateTo(addr: Address): void {
    if (!isUsableAddress(addr)) {
      this.logger.debug(`${this.name}: ignoring navigation to ${formatAddress(addr)}`);
      return;
    }
    const native = this.lifter.lowerAddress(addr);
    void this.executor.run(() => this._navigateTo(native)).catch((error: unknown) => {
      this.logger.warn(`${this.name}: navigation to ${formatAddress(addr)} failed: ${describeError(error)}`);
    });
  }

  get decompilerAvailable(): boolean {
    return this.decompilerCapability.value;
  }

  /**
   * Drop the cached decompiler check so the next read checks again.
   */
  invalidateCapabilities(): void {
    this.decompilerCapability.invalidate();
  }

  /**
   * Decompiled text of a function, or null when no decompiler is attached
   * or the backend fails to decompile it.
   */
  decompile(fn: FunctionArtifact): Promise<string | null> {
    return this.executor.run(async () => {
      if (!this.decompilerAvailable || !isUsableAddress(fn.addr)) {
        return null;
      }
      const native = this.lifter.lowerAddress(fn.addr);
      try {
        return await this._decompile(native);
      } catch (error) {
        this.logger.debug(`${this.name}: decompiling ${formatAddress(fn.addr)} failed: ${describeError(error)}`);
        return null;
      }
    });
  }

  activeContext(): FunctionArtifact | null {
    return this.currentContext;
  }

  /**
   * UI callback entry point: the user moved to `nativeAddr` in the backend.
   * Caches the containing function as the active context.
   */
  async updateActiveContext(nativeAddr: Address): Promise<void> {
    if (nativeAddr === UNSET_ADDRESS || nativeAddr === this.lifter.addresses.nativeInvalid) {
      return;
    }

    await this.executor.run(async () => {
      let header: FunctionHeader | null;
      try {
        header = await this._functionContaining(nativeAddr);
      } catch (error) {
        this.logger.warn(`${this.name}: resolving context at native ${formatAddress(nativeAddr)} failed: ${describeError(error)}`);
        return;
      }
      if (!header) {
        return;
      }

      const lifted = this.lifter.liftFunctionHeader(header);
      if (!isUsableAddress(lifted.addr)) {
        return;
      }
      this.currentContext = { addr: lifted.addr, size: 0, header: lifted, stackVars: [] };
    });
  }

  /**
   * Reset per-session state after the backend has been re-initialized.
   */
  reinitialize(): void {
    this.currentContext = null;
    this.decompilerCapability.invalidate();
  }

  close(): Promise<void> {
    return this.executor.run(() => this._close());
  }

  // --- Functions ---

  getFunction(addr: Address): Promise<FunctionArtifact | null> {
    return this.fetchAt("function", addr, async (native) => {
      const fn = await this._getFunction(native);
      return fn ? this.lifter.liftFunction(fn) : null;
    });
  }

  setFunction(fn: FunctionArtifact): Promise<boolean> {
    return this.write(
      "function",
      fn.addr,
      formatAddress(fn.addr),
      () => this.lifter.lowerFunction(fn),
      (native) => this._setFunction(native)
    );
  }

  setFunctionHeader(header: FunctionHeader): Promise<boolean> {
    return this.write(
      "function",
      header.addr,
      formatAddress(header.addr),
      () => this.lifter.lowerFunctionHeader(header),
      (native) => this._setFunctionHeader(native)
    );
  }

  functions(): Promise<Map<Address, FunctionArtifact>> {
    return this.listAt("function", () => this._functions(), (fn) => this.lifter.liftFunction(fn));
  }

  // --- Stack variables ---

  /**
   * Stack variables are served through the owning function's fetch.
   */
  async getStackVariable(funcAddr: Address, offset: number): Promise<StackVariable | null> {
    const fn = await this.getFunction(funcAddr);
    return fn?.stackVars.find((svar) => svar.offset === offset) ?? null;
  }

  setStackVariable(svar: StackVariable): Promise<boolean> {
    return this.write(
      "stackVariable",
      svar.funcAddr,
      stackVariableKey(svar.funcAddr, svar.offset),
      () => this.lifter.lowerStackVariable(svar),
      (native) => this._setStackVariable(native)
    );
  }

  // --- Global variables ---

  getGlobalVariable(addr: Address): Promise<GlobalVariable | null> {
    return this.fetchAt("globalVariable", addr, async (native) => {
      const gvar = await this._getGlobalVariable(native);
      return gvar ? this.lifter.liftGlobalVariable(gvar) : null;
    });
  }

  setGlobalVariable(gvar: GlobalVariable): Promise<boolean> {
    return this.write(
      "globalVariable",
      gvar.addr,
      formatAddress(gvar.addr),
      () => this.lifter.lowerGlobalVariable(gvar),
      (native) => this._setGlobalVariable(native)
    );
  }

  globalVariables(): Promise<Map<Address, GlobalVariable>> {
    return this.listAt("globalVariable", () => this._globalVariables(), (gvar) =>
      this.lifter.liftGlobalVariable(gvar)
    );
  }

  // --- Structs ---

  getStruct(name: string): Promise<Struct | null> {
    return this.fetchNamed("struct", name, async () => {
      const struct = await this._getStruct(name);
      return struct ? this.lifter.liftStruct(struct) : null;
    });
  }

  setStruct(struct: Struct, options: SetStructOptions = {}): Promise<boolean> {
    const header = options.header ?? true;
    const members = options.members ?? true;

    return this.executor.run(async () => {
      if (!struct.name) {
        this.logger.warn(`${this.name}: refusing to write a struct without a name`);
        return false;
      }
      if (this.refuseUnsafe("struct", struct.name)) {
        return false;
      }

      const native = this.lifter.lowerStruct(struct);
      if (header && members && this.structSyncPolicy === "atomic") {
        return this.setStructAtomically(native);
      }

      let changed = false;
      if (header) {
        changed = (await this.attempt("struct", `${struct.name} header`, () => this._setStructHeader(native))) || changed;
      }
      if (members) {
        changed = (await this.attempt("struct", `${struct.name} members`, () => this._setStructMembers(native))) || changed;
      }
      return changed;
    });
  }

  structs(): Promise<Map<string, Struct>> {
    return this.listNamed("struct", () => this._structs(), (struct) => this.lifter.liftStruct(struct));
  }

  // --- Enums ---

  getEnum(name: string): Promise<Enum | null> {
    return this.fetchNamed("enum", name, async () => {
      const enumeration = await this._getEnum(name);
      return enumeration ? this.lifter.liftEnum(enumeration) : null;
    });
  }

  setEnum(enumeration: Enum): Promise<boolean> {
    return this.executor.run(async () => {
      if (!enumeration.name) {
        this.logger.warn(`${this.name}: refusing to write an enum without a name`);
        return false;
      }
      if (this.refuseUnsafe("enum", enumeration.name)) {
        return false;
      }
      const native = this.lifter.lowerEnum(enumeration);
      return this.attempt("enum", enumeration.name, () => this._setEnum(native));
    });
  }

  enums(): Promise<Map<string, Enum>> {
    return this.listNamed("enum", () => this._enums(), (enumeration) => this.lifter.liftEnum(enumeration));
  }

  // --- Comments ---

  getComment(addr: Address): Promise<Comment | null> {
    return this.fetchAt("comment", addr, async (native) => {
      const comment = await this._getComment(native);
      return comment ? this.lifter.liftComment(comment) : null;
    });
  }

  setComment(comment: Comment): Promise<boolean> {
    return this.write(
      "comment",
      comment.addr,
      formatAddress(comment.addr),
      () => this.lifter.lowerComment(comment),
      (native) => this._setComment(native)
    );
  }

  comments(): Promise<Map<Address, Comment>> {
    return this.listAt("comment", () => this._comments(), (comment) => this.lifter.liftComment(comment));
  }

  // --- Patches ---

  /**
   * The patch whose run starts exactly at `addr`. An address inside a run
   * that started earlier has no patch of its own.
   *
   * The first scan covers `maxPatchSize` bytes; a run that fills it is
   * rescanned up to the end of the backend's address range, so the result is
   * always the whole run.
   */
  getPatch(addr: Address): Promise<Patch | null> {
    return this.fetchAt("patch", addr, async (native) => {
      const minAddr = native > 0n ? native - 1n : native;
      const end = native + BigInt(this.maxPatchSize);
      const window = end > MAX_ADDRESS ? MAX_ADDRESS : end;

      let run = this.firstRunAt(native, minAddr, window);
      if (run && native + BigInt(run.bytes.length) >= window) {
        const rangeEnd = (await this._addressRange())?.maxAddr ?? MAX_ADDRESS;
        if (rangeEnd > window) {
          run = this.firstRunAt(native, minAddr, rangeEnd);
        }
      }
      return run ? this.lifter.liftPatch(run) : null;
    });
  }

  private firstRunAt(native: Address, minAddr: Address, maxAddr: Address): Patch | undefined {
    const runs = collectContinuousPatches((lo, hi) => this._patchedBytes(lo, hi), {
      minAddr,
      maxAddr,
      stopAfterFirst: true,
    });
    return runs.get(native);
  }

  setPatch(patch: Patch): Promise<boolean> {
    if (patch.bytes.length === 0) {
      this.logger.warn(`${this.name}: ignoring empty patch at ${formatAddress(patch.addr)}`);
      return Promise.resolve(false);
    }
    return this.write(
      "patch",
      patch.addr,
      formatAddress(patch.addr),
      () => this.lifter.lowerPatch(patch),
      (native) => this._setPatch(native)
    );
  }

  patches(): Promise<Map<Address, Patch>> {
    return this.listAt(
      "patch",
      async () => {
        const range = await this._addressRange();
        if (!range) {
          return new Map<Address, Patch>();
        }
        return collectContinuousPatches((lo, hi) => this._patchedBytes(lo, hi), range);
      },
      (patch) => this.lifter.liftPatch(patch)
    );
  }

  // --- Plumbing ---

  private refuseUnsafe(kind: ArtifactKind, key: string): boolean {
    const rule = this.unsafeIndex.get(`${kind}:${key}`);
    if (!rule) {
      return false;
    }
    this.logger.critical(`${this.name}: refusing to write ${kind} '${key}': ${rule.reason}. Skipping...`);
    return true;
  }

  private reportFailure(action: string, error: unknown): void {
    // Contract breaches are a backend bug, not an ordinary failed call.
    if (isArtisyncError(error)) {
      this.logger.error(`${this.name}: ${action} failed`, error);
    } else {
      this.logger.warn(`${this.name}: ${action} failed: ${describeError(error)}`);
    }
  }

  private async guardRead<T>(kind: ArtifactKind, key: string, read: () => Promise<T | null>): Promise<T | null> {
    try {
      return await read();
    } catch (error) {
      this.reportFailure(`reading ${kind} ${key}`, error);
      return null;
    }
  }

  private async attempt(kind: ArtifactKind, key: string, apply: () => Promise<boolean>): Promise<boolean> {
    try {
      return await apply();
    } catch (error) {
      this.reportFailure(`writing ${kind} ${key}`, error);
      return false;
    }
  }

  private fetchAt<T>(
    kind: ArtifactKind,
    addr: Address,
    read: (nativeAddr: Address) => Promise<T | null>
  ): Promise<T | null> {
    return this.executor.run(async () => {
      if (!isUsableAddress(addr)) {
        return null;
      }
      const native = this.lifter.lowerAddress(addr);
      return this.guardRead(kind, formatAddress(addr), () => read(native));
    });
  }

  private fetchNamed<T>(kind: ArtifactKind, name: string, read: () => Promise<T | null>): Promise<T | null> {
    return this.executor.run(async () => {
      if (!name) {
        return null;
      }
      return this.guardRead(kind, name, read);
    });
  }

  private listAt<T>(
    kind: ArtifactKind,
    read: () => Promise<Map<Address, T>>,
    lift: (artifact: T) => T
  ): Promise<Map<Address, T>> {
    return this.executor.run(async () => {
      const native = await this.guardRead(kind, "listing", read);
      const lifted = new Map<Address, T>();
      if (!native) {
        return lifted;
      }

      for (const [nativeAddr, artifact] of native) {
        const canonical = this.lifter.liftAddress(nativeAddr);
        if (!isUsableAddress(canonical)) {
          this.logger.warn(`${this.name}: dropping ${kind} at native ${formatAddress(nativeAddr)}: no canonical address`);
          continue;
        }
        lifted.set(canonical, lift(artifact));
      }
      return lifted;
    });
  }

  private listNamed<T>(
    kind: ArtifactKind,
    read: () => Promise<Map<string, T>>,
    lift: (artifact: T) => T
  ): Promise<Map<string, T>> {
    return this.executor.run(async () => {
      const native = await this.guardRead(kind, "listing", read);
      const lifted = new Map<string, T>();
      for (const [name, artifact] of native ?? []) {
        lifted.set(name, lift(artifact));
      }
      return lifted;
    });
  }

  /**
   * Shared path for address-keyed writes. Lowering happens outside the
   * failure guard so an unmapped address reaches the caller.
   */
  private write<T>(
    kind: ArtifactKind,
    keyAddr: Address,
    key: string,
    lower: () => T,
    apply: (native: T) => Promise<boolean>
  ): Promise<boolean> {
    return this.executor.run(async () => {
      if (!isUsableAddress(keyAddr)) {
        this.logger.warn(`${this.name}: refusing to write ${kind} at ${formatAddress(keyAddr)}`);
        return false;
      }
      if (this.refuseUnsafe(kind, key)) {
        return false;
      }
      const native = lower();
      return this.attempt(kind, key, () => apply(native));
    });
  }

  private async setStructAtomically(struct: Struct): Promise<boolean> {
    let snapshot: Struct | null;
    try {
      snapshot = await this._getStruct(struct.name);
    } catch (error) {
      this.reportFailure(`snapshotting struct ${struct.name} before an atomic write`, error);
      return false;
    }

    try {
      const headerChanged = await this._setStructHeader(struct);
      const membersChanged = await this._setStructMembers(struct);
      return headerChanged || membersChanged;
    } catch (error) {
      this.reportFailure(`writing struct ${struct.name} atomically; rolling back`, error);
      await this.restoreStruct(struct.name, snapshot);
      return false;
    }
  }

  private async restoreStruct(name: string, snapshot: Struct | null): Promise<void> {
    try {
      if (snapshot) {
        await this._setStructHeader(snapshot);
        await this._setStructMembers(snapshot);
      } else {
        await this._deleteStruct(name);
      }
    } catch (error) {
      this.logger.error(`${this.name}: rolling back struct ${name} failed`, error);
    }
  }
}
