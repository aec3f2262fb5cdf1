/**
 * @artisync/core - Artifact model and synchronization contracts
 *
 * This package provides:
 * - The canonical artifact model (functions, variables, structs, enums, comments, patches)
 * - Address lifting between native and canonical address spaces
 * - Patch coalescing from byte-level edits into contiguous runs
 * - The BackendAdapter contract and the DecompilerBackend base class
 * - SyncEngine for pushing artifacts from one backend to another
 *
 * Core never imports a concrete backend; the CLI wires everything together at runtime.
 */

export {
  UNSET_ADDRESS,
  INVALID_ADDRESS,
  MAX_ADDRESS,
  ARTIFACT_KINDS,
  isArtifactKind,
  type Address,
  type Artifact,
  type ArtifactKind,
  type ArtifactTypes,
  type Comment,
  type Enum,
  type FunctionArtifact,
  type FunctionHeader,
  type GlobalVariable,
  type Patch,
  type StackVariable,
  type Struct,
  type StructMember,
} from "./artifacts.js";

export { formatAddress, parseAddress, fingerprint, artifactsEqual } from "./compare.js";

export {
  IdentityAddressLifter,
  RebasedAddressLifter,
  SegmentedAddressLifter,
  type AddressLifter,
  type AddressSegment,
  type RebasedAddressLifterOptions,
} from "./address.js";

export { ArtifactLifter, type TypeAliases } from "./artifact-lifter.js";

export {
  coalescePatches,
  collectContinuousPatches,
  type CoalesceOptions,
  type PatchedByte,
  type PatchedByteSource,
  type PatchQuery,
} from "./patches.js";

export {
  DecompilerBackend,
  type AddressRange,
  type BackendAdapter,
  type DecompilerBackendOptions,
  type SetStructOptions,
  type StructSyncPolicy,
  type UnsafeOperation,
} from "./adapter.js";

export { BackendExecutor } from "./executor.js";
export { CachedCapability } from "./capability.js";

export {
  SyncEngine,
  DEFAULT_SYNC_KINDS,
  type FunctionSyncMode,
  type JobConfig,
  type PeerConfig,
} from "./engine.js";

export type {
  KindStats,
  PeerKey,
  RunStats,
  RunStatus,
  RunSummary,
  SyncStateStore,
} from "./types.js";

export {
  ArtisyncError,
  BackendError,
  ConfigurationError,
  ErrorCode,
  InvalidRangeError,
  PatchEnumerationError,
  UnmappedAddressError,
  describeError,
  isArtisyncError,
} from "./errors.js";

export { consoleLogger, noopLogger, getLogger, setLogger, type Logger } from "./logger.js";
