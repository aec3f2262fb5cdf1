/**
 * SyncEngine - one directional synchronization pass between two backends.
 * Lists every configured artifact kind on the source, fetches each artifact
 * in full and writes it to the target, one artifact at a time.
 */

import type { BackendAdapter } from "./adapter.js";
import type { Address, ArtifactKind, FunctionArtifact } from "./artifacts.js";
import { fingerprint, formatAddress } from "./compare.js";
import { describeError } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import type { KindStats, PeerKey, RunStats, RunStatus, RunSummary, SyncStateStore } from "./types.js";

/**
 * One end of a job.
 */
export interface PeerConfig {
  adapter: BackendAdapter;
  peerKey: PeerKey;
}

/**
 * `full` writes size, header and stack variables; `header` writes only the
 * function header.
 */
export type FunctionSyncMode = "full" | "header";

/**
 * Full configuration for a sync job.
 */
export interface JobConfig {
  jobId: string;
  source: PeerConfig;
  target: PeerConfig;
  stateStore: SyncStateStore;
  kinds?: ArtifactKind[];
  functionSync?: FunctionSyncMode;
  /** Refuse to sync peers whose binary hashes differ. Defaults to true. */
  requireMatchingBinary?: boolean;
  /** Consecutive failed runs before the job is disabled. Defaults to 20. */
  disableJobAfter?: number;
  logger?: Logger;
}

/**
 * Kinds synced when a job does not name any. Stack variables travel with
 * full function writes; list "stackVariable" explicitly to write them one
 * by one.
 */
export const DEFAULT_SYNC_KINDS: readonly ArtifactKind[] = [
  "function",
  "globalVariable",
  "struct",
  "enum",
  "comment",
  "patch",
];

const DEFAULT_DISABLE_JOB_AFTER = 20;

interface KindPlan<K, T extends object> {
  list: () => Promise<Iterable<K>>;
  key: (key: K) => string;
  fetch: (key: K) => Promise<T | null>;
  write: (artifact: T) => Promise<boolean>;
}

function emptyStats(): KindStats {
  return { listed: 0, changed: 0, unchanged: 0, skipped: 0, missing: 0, failed: 0 };
}

export class SyncEngine {
  private config: Required<Omit<JobConfig, "logger">>;
  private logger: Logger;

  constructor(config: JobConfig) {
    this.config = {
      ...config,
      kinds: config.kinds ?? [...DEFAULT_SYNC_KINDS],
      functionSync: config.functionSync ?? "full",
      requireMatchingBinary: config.requireMatchingBinary ?? true,
      disableJobAfter: config.disableJobAfter ?? DEFAULT_DISABLE_JOB_AFTER,
    };
    this.logger = config.logger ?? getLogger();
  }

  /**
   * Execute one sync pass for the configured job:
   * 1. Skip if disabled
   * 2. Check both peers hold the same binary
   * 3. Per kind: list, fetch, compare fingerprint, write
   * 4. Record the run and update the job's fail count
   */
  async run(): Promise<RunSummary> {
    const runId = this.generateRunId();
    const startedAt = new Date();
    const { jobId, stateStore, source, target, kinds } = this.config;
    const stats: RunStats = { kinds: {}, errors: [], durationMs: 0 };

    this.logger.info(`[${runId}] Starting sync job: ${jobId} (${source.peerKey} → ${target.peerKey})`);

    if (await stateStore.isJobDisabled(jobId)) {
      this.logger.info(`[${runId}] Job ${jobId} is disabled, skipping`);
      stats.reason = "job_disabled";
      const skipped = this.createRunSummary(runId, jobId, startedAt, "failed", stats);
      await stateStore.insertRun(skipped);
      return skipped;
    }

    let status: RunStatus;
    try {
      if (this.config.requireMatchingBinary && !(await this.binariesMatch(runId, stats))) {
        stats.reason = "binary_mismatch";
        status = "failed";
      } else {
        for (const kind of kinds) {
          stats.kinds[kind] = await this.syncKind(kind, stats.errors);
        }
        status = this.statusFor(stats);
      }
    } catch (error) {
      const message = describeError(error);
      stats.errors.push(message);
      stats.reason = "fatal";
      status = "failed";
    }

    const summary = this.createRunSummary(runId, jobId, startedAt, status, stats);
    await stateStore.insertRun(summary);
    await this.trackFailures(runId, status);

    this.logger.info(`[${runId}] Sync job ${jobId} completed: ${status}`);
    return summary;
  }

  private async binariesMatch(runId: string, stats: RunStats): Promise<boolean> {
    const { source, target } = this.config;
    const sourceHash = await source.adapter.binaryHash();
    const targetHash = await target.adapter.binaryHash();
    if (sourceHash === targetHash) {
      return true;
    }

    const message = `Binary mismatch: ${source.peerKey}=${sourceHash} ${target.peerKey}=${targetHash}`;
    stats.errors.push(message);
    this.logger.warn(`[${runId}] ${message}`);
    return false;
  }

  private statusFor(stats: RunStats): RunStatus {
    if (stats.errors.length === 0) {
      return "success";
    }
    const changed = Object.values(stats.kinds).reduce((total, kind) => total + (kind?.changed ?? 0), 0);
    return changed > 0 ? "partial" : "failed";
  }

  private async trackFailures(runId: string, status: RunStatus): Promise<void> {
    const { jobId, stateStore, disableJobAfter } = this.config;

    if (status === "success") {
      await stateStore.resetFailCount(jobId);
      return;
    }
    if (status !== "failed") {
      return;
    }

    const failures = await stateStore.incrementFailCount(jobId);
    if (failures >= disableJobAfter) {
      await stateStore.setJobDisabled(jobId, new Date());
      this.logger.warn(`[${runId}] Job ${jobId} disabled after ${failures} consecutive failed runs`);
    }
  }

  private syncKind(kind: ArtifactKind, errors: string[]): Promise<KindStats> {
    const source = this.config.source.adapter;
    const target = this.config.target.adapter;

    switch (kind) {
      case "function":
        if (this.config.functionSync === "header") {
          return this.syncArtifacts(kind, errors, {
            list: async () => (await source.functions()).keys(),
            key: formatAddress,
            fetch: async (addr: Address) => (await source.getFunction(addr))?.header ?? null,
            write: (header) => target.setFunctionHeader(header),
          });
        }
        return this.syncArtifacts(kind, errors, {
          list: async () => (await source.functions()).keys(),
          key: formatAddress,
          fetch: (addr: Address) => source.getFunction(addr),
          write: (fn) => target.setFunction(fn),
        });
      case "stackVariable":
        return this.syncArtifacts(kind, errors, {
          list: () => this.listStackVariables(),
          key: ([addr, offset]) => `${formatAddress(addr)}:${offset}`,
          fetch: ([addr, offset]: [Address, number]) => source.getStackVariable(addr, offset),
          write: (svar) => target.setStackVariable(svar),
        });
      case "globalVariable":
        return this.syncArtifacts(kind, errors, {
          list: async () => (await source.globalVariables()).keys(),
          key: formatAddress,
          fetch: (addr: Address) => source.getGlobalVariable(addr),
          write: (gvar) => target.setGlobalVariable(gvar),
        });
      case "struct":
        return this.syncArtifacts(kind, errors, {
          list: async () => (await source.structs()).keys(),
          key: (name: string) => name,
          fetch: (name: string) => source.getStruct(name),
          write: (struct) => target.setStruct(struct, { header: true, members: true }),
        });
      case "enum":
        return this.syncArtifacts(kind, errors, {
          list: async () => (await source.enums()).keys(),
          key: (name: string) => name,
          fetch: (name: string) => source.getEnum(name),
          write: (enumeration) => target.setEnum(enumeration),
        });
      case "comment":
        return this.syncArtifacts(kind, errors, {
          list: async () => (await source.comments()).keys(),
          key: formatAddress,
          fetch: (addr: Address) => source.getComment(addr),
          write: (comment) => target.setComment(comment),
        });
      case "patch":
        return this.syncArtifacts(kind, errors, {
          list: async () => (await source.patches()).keys(),
          key: formatAddress,
          fetch: (addr: Address) => source.getPatch(addr),
          write: (patch) => target.setPatch(patch),
        });
    }
  }

  private async listStackVariables(): Promise<[Address, number][]> {
    const source = this.config.source.adapter;
    const keys: [Address, number][] = [];

    for (const addr of (await source.functions()).keys()) {
      const fn: FunctionArtifact | null = await source.getFunction(addr);
      for (const svar of fn?.stackVars ?? []) {
        keys.push([addr, svar.offset]);
      }
    }
    return keys;
  }

  /**
   * Push every listed artifact of one kind. A failure is recorded against
   * that artifact and the pass moves on.
   */
  private async syncArtifacts<K, T extends object>(
    kind: ArtifactKind,
    errors: string[],
    plan: KindPlan<K, T>
  ): Promise<KindStats> {
    const { jobId, stateStore, target } = this.config;
    const stats = emptyStats();

    let keys: Iterable<K>;
    try {
      keys = await plan.list();
    } catch (error) {
      const message = `Failed to list ${kind} artifacts: ${describeError(error)}`;
      errors.push(message);
      this.logger.warn(message);
      return stats;
    }

    for (const key of keys) {
      stats.listed++;
      const keyText = plan.key(key);

      try {
        const artifact = await plan.fetch(key);
        if (!artifact) {
          stats.missing++;
          continue;
        }

        const print = fingerprint(artifact);
        const last = await stateStore.loadFingerprint(jobId, target.peerKey, kind, keyText);
        if (last === print) {
          stats.skipped++;
          continue;
        }

        if (await plan.write(artifact)) {
          stats.changed++;
          await stateStore.saveFingerprint(jobId, target.peerKey, kind, keyText, print);
        } else {
          stats.unchanged++;
        }
      } catch (error) {
        stats.failed++;
        const message = `Failed to sync ${kind} ${keyText}: ${describeError(error)}`;
        errors.push(message);
        this.logger.warn(message);
      }
    }

    return stats;
  }

  private generateRunId(): string {
    return `run_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  private createRunSummary(
    runId: string,
    jobId: string,
    startedAt: Date,
    status: RunStatus,
    stats: RunStats
  ): RunSummary {
    const endedAt = new Date();
    return {
      runId,
      jobId,
      startedAt,
      endedAt,
      status,
      stats: { ...stats, durationMs: endedAt.getTime() - startedAt.getTime() },
    };
  }
}
