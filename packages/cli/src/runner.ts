/**
 * Wire everything together: parse config, load backends, create engines, run syncs.
 */

import * as path from "path";
import {
  ConfigurationError,
  SyncEngine,
  describeError,
  getLogger,
  type ArtifactKind,
  type BackendAdapter,
  type JobConfig,
  type Logger,
  type Patch,
  type RunSummary,
  type SyncStateStore,
} from "@artisync/core";
import type { ConfigFile, JobConfigRaw } from "./config.js";
import { loadConfig } from "./parser.js";
import { loadBackend, loadSyncState, type LoaderContext } from "./loaders.js";

/**
 * A configured engine together with the backends it owns.
 */
export interface PreparedJob {
  engine: SyncEngine;
  source: BackendAdapter;
  target: BackendAdapter;
}

export interface RunJobsOptions {
  /** Specific job IDs to run (default: all jobs). */
  jobIds?: string[];
  /** Reuse a store across calls, e.g. between scheduled runs. */
  stateStore?: SyncStateStore;
  logger?: Logger;
}

/**
 * Convert a raw job config (snake_case) into engine config (camelCase).
 */
function convertJobConfig(
  raw: JobConfigRaw,
  source: BackendAdapter,
  target: BackendAdapter,
  stateStore: SyncStateStore,
  logger?: Logger
): JobConfig {
  return {
    jobId: raw.id,
    source: { adapter: source, peerKey: "source" },
    target: { adapter: target, peerKey: "target" },
    stateStore,
    kinds: raw.kinds,
    functionSync: raw.function_sync,
    requireMatchingBinary: raw.require_matching_binary,
    disableJobAfter: raw.disable_job_after,
    logger,
  };
}

/**
 * Create a SyncEngine instance from a job configuration.
 * The target backend is closed again if it cannot be created after the source was.
 * @param jobConfig - Raw job configuration from JSONC
 * @param stateStore - The SyncStateStore instance to use
 * @param context - Base directory for relative paths and logger
 */
export async function createEngineForJob(
  jobConfig: JobConfigRaw,
  stateStore: SyncStateStore,
  context: LoaderContext
): Promise<PreparedJob> {
  const source = await loadBackend(jobConfig.source, context);

  let target: BackendAdapter;
  try {
    target = await loadBackend(jobConfig.target, context);
  } catch (error) {
    await source.close();
    throw error;
  }

  const engine = new SyncEngine(convertJobConfig(jobConfig, source, target, stateStore, context.logger));
  return { engine, source, target };
}

function selectJobs(config: ConfigFile, jobIds?: string[]): JobConfigRaw[] {
  if (!jobIds || jobIds.length === 0) {
    return config.jobs;
  }

  const unknown = jobIds.filter((id) => !config.jobs.some((job) => job.id === id));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown job id(s): ${unknown.join(", ")}`);
  }
  return config.jobs.filter((job) => jobIds.includes(job.id));
}

/**
 * Run jobs from a configuration file, one after another.
 * Each job's backends are closed when its run finishes, so a backend with an
 * `output` option writes its database back before the next job starts.
 * @param configFilePath - Path to the JSONC configuration file
 * @returns Run summaries in job order
 */
export async function runJobs(configFilePath: string, options: RunJobsOptions = {}): Promise<RunSummary[]> {
  const logger = options.logger ?? getLogger();
  const config = await loadConfig(configFilePath);
  const context: LoaderContext = { baseDir: path.dirname(path.resolve(configFilePath)), logger };
  const jobs = selectJobs(config, options.jobIds);

  // Shared across all jobs
  const stateStore = options.stateStore ?? (await loadSyncState(config.syncstate, context));

  const results: RunSummary[] = [];

  for (const jobConfig of jobs) {
    const { engine, source, target } = await createEngineForJob(jobConfig, stateStore, context);

    try {
      logger.info(`Running job: ${jobConfig.id}`);
      const summary = await engine.run();
      results.push(summary);

      logger.info(`Job '${jobConfig.id}' completed: ${summary.status}`);
      if (summary.stats.errors.length > 0) {
        logger.warn(`Job '${jobConfig.id}' had errors:\n  ${summary.stats.errors.join("\n  ")}`);
      }
    } finally {
      await Promise.all([source.close(), target.close()]);
    }
  }

  return results;
}

/**
 * What one peer of a job currently holds.
 */
export interface PeerInspection {
  backend: string;
  binaryHash: string | null;
  counts: Record<ArtifactKind, number>;
  /** Coalesced patches in address order. */
  patches: Patch[];
}

async function countStackVariables(adapter: BackendAdapter): Promise<number> {
  let total = 0;
  for (const addr of (await adapter.functions()).keys()) {
    const fn = await adapter.getFunction(addr);
    total += fn?.stackVars.length ?? 0;
  }
  return total;
}

/**
 * Load one peer of a job and report its artifact counts without syncing.
 * @param side - "source" or "target"
 */
export async function inspectPeer(
  configFilePath: string,
  jobId: string,
  side: "source" | "target",
  options: { logger?: Logger } = {}
): Promise<PeerInspection> {
  const logger = options.logger ?? getLogger();
  const config = await loadConfig(configFilePath);
  const [jobConfig] = selectJobs(config, [jobId]);
  const context: LoaderContext = { baseDir: path.dirname(path.resolve(configFilePath)), logger };

  const adapter = await loadBackend(jobConfig[side], context);
  try {
    let binaryHash: string | null = null;
    try {
      binaryHash = await adapter.binaryHash();
    } catch (error) {
      logger.debug(`${adapter.name}: binary hash unavailable: ${describeError(error)}`);
    }

    const patches = await adapter.patches();
    const sizes: Record<Exclude<ArtifactKind, "stackVariable">, number> = {
      function: (await adapter.functions()).size,
      globalVariable: (await adapter.globalVariables()).size,
      struct: (await adapter.structs()).size,
      enum: (await adapter.enums()).size,
      comment: (await adapter.comments()).size,
      patch: patches.size,
    };
    const counts: Record<ArtifactKind, number> = { ...sizes, stackVariable: await countStackVariables(adapter) };

    return {
      backend: jobConfig[side].backend,
      binaryHash,
      counts,
      patches: [...patches.values()].sort((a, b) => (a.addr < b.addr ? -1 : a.addr > b.addr ? 1 : 0)),
    };
  } finally {
    await adapter.close();
  }
}
