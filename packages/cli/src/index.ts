/**
 * @artisync/cli - configuration loading and job running for ArtiSync
 */

export { runJobs, createEngineForJob, inspectPeer } from "./runner.js";
export type { PeerInspection, PreparedJob, RunJobsOptions } from "./runner.js";
export { loadConfig, loadConfigFile, parseConfig, expandEnvVar, expandEnvironmentVariables } from "./parser.js";
export {
  loadBackend,
  loadSyncState,
  registerBackend,
  registerSyncState,
  registeredBackends,
  registeredSyncStates,
} from "./loaders.js";
export type { BackendFactory, LoaderContext, SyncStateFactory } from "./loaders.js";
export type { ConfigFile, FactoryOptions, JobConfigRaw, PeerConfigRaw, SyncStateConfig } from "./config.js";
