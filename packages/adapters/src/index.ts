/**
 * @artisync/adapter-in-memory - In-process backend, snapshot codec and factory
 */

export {
  InMemoryBackend,
  type Decompiler,
  type FaultPoint,
  type InMemoryBackendOptions,
  type InMemoryState,
} from "./in-memory-adapter.js";

export {
  SnapshotFormatError,
  loadSnapshot,
  parseSnapshot,
  saveSnapshot,
  serializeSnapshot,
  type Snapshot,
  type SnapshotBinary,
} from "./snapshot.js";

export { createInMemoryBackend, renderPseudocode, type BackendFactoryContext } from "./factory.js";
