/**
 * @artisync/syncstate-in-memory - In-memory SyncStateStore
 */

export { InMemorySyncStateStore } from "./in-memory-sync-state.js";
