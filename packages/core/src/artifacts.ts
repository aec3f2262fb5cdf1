/**
 * Canonical artifact model.
 *
 * Plain data shared by every backend and by sync peers. Artifacts are
 * transient projections of live backend state: mutate a backend through
 * its setters, never by editing an object you got back from it.
 */

/**
 * Unsigned 64-bit address.
 */
export type Address = bigint;

/** Marks an address field that was never filled in. */
export const UNSET_ADDRESS: Address = 0n;

/** Canonical sentinel for the backend's "invalid address" marker. */
export const INVALID_ADDRESS: Address = 0xffff_ffff_ffff_ffffn;

export const MAX_ADDRESS: Address = 0xffff_ffff_ffff_ffffn;

export interface FunctionHeader {
  /** Empty string means the backend's default name. */
  name: string;
  addr: Address;
  returnType?: string;
}

/**
 * A stack slot of one function, identified by (funcAddr, offset).
 */
export interface StackVariable {
  funcAddr: Address;
  offset: number;
  name: string;
  type: string;
  size: number;
}

export interface FunctionArtifact {
  addr: Address;
  /** Byte length, 0 when unknown. */
  size: number;
  header: FunctionHeader;
  stackVars: StackVariable[];
}

export interface GlobalVariable {
  addr: Address;
  name: string;
  size: number;
  type?: string;
}

export interface StructMember {
  offset: number;
  name: string;
  type: string;
  size: number;
}

export interface Struct {
  name: string;
  size: number;
  /** Ordered by offset. Empty in listings. */
  members: StructMember[];
}

export interface Enum {
  name: string;
  members: Record<string, number>;
}

export interface Comment {
  addr: Address;
  text: string;
  /** Anchored to decompiled text rather than disassembly. */
  decompiled: boolean;
  funcAddr?: Address;
}

/**
 * One contiguous run of patched bytes starting at `addr`.
 */
export interface Patch {
  addr: Address;
  bytes: Uint8Array;
}

export interface ArtifactTypes {
  function: FunctionArtifact;
  stackVariable: StackVariable;
  globalVariable: GlobalVariable;
  struct: Struct;
  enum: Enum;
  comment: Comment;
  patch: Patch;
}

export type ArtifactKind = keyof ArtifactTypes;

export type Artifact = ArtifactTypes[ArtifactKind];

export const ARTIFACT_KINDS: readonly ArtifactKind[] = [
  "function",
  "stackVariable",
  "globalVariable",
  "struct",
  "enum",
  "comment",
  "patch",
];

export function isArtifactKind(value: string): value is ArtifactKind {
  return ARTIFACT_KINDS.some((kind) => kind === value);
}
