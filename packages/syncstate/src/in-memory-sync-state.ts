/**
 * InMemorySyncStateStore - An in-memory implementation of SyncStateStore.
 * Stores fingerprints, job state, fail counts and run logs in memory.
 */

import type { ArtifactKind, PeerKey, RunSummary, SyncStateStore } from "@artisync/core";

/**
 * In-memory sync-state store. State lives as long as the process, so a
 * scheduled job skips unchanged artifacts between passes but starts fresh
 * after a restart.
 */
export class InMemorySyncStateStore implements SyncStateStore {
  // Key format: `${jobId}:${peer}:${kind}:${key}`
  private fingerprints: Map<string, string>;

  // Key is jobId
  private failCounts: Map<string, number>;

  // Key is jobId, value is disabled timestamp
  private disabledJobs: Map<string, Date>;

  // Insertion order is run order
  private runs: RunSummary[];

  constructor() {
    this.fingerprints = new Map();
    this.failCounts = new Map();
    this.disabledJobs = new Map();
    this.runs = [];
  }

  private fingerprintKey(jobId: string, peer: PeerKey, kind: ArtifactKind, key: string): string {
    return `${jobId}:${peer}:${kind}:${key}`;
  }

  async loadFingerprint(jobId: string, peer: PeerKey, kind: ArtifactKind, key: string): Promise<string | null> {
    return this.fingerprints.get(this.fingerprintKey(jobId, peer, kind, key)) ?? null;
  }

  async saveFingerprint(
    jobId: string,
    peer: PeerKey,
    kind: ArtifactKind,
    key: string,
    fingerprint: string
  ): Promise<void> {
    this.fingerprints.set(this.fingerprintKey(jobId, peer, kind, key), fingerprint);
  }

  /**
   * Mark a job as disabled at the given timestamp.
   */
  async setJobDisabled(jobId: string, ts: Date): Promise<void> {
    this.disabledJobs.set(jobId, ts);
  }

  async isJobDisabled(jobId: string): Promise<boolean> {
    return this.disabledJobs.has(jobId);
  }

  async incrementFailCount(jobId: string): Promise<number> {
    const next = (this.failCounts.get(jobId) ?? 0) + 1;
    this.failCounts.set(jobId, next);
    return next;
  }

  async resetFailCount(jobId: string): Promise<void> {
    this.failCounts.delete(jobId);
  }

  async getFailCount(jobId: string): Promise<number> {
    return this.failCounts.get(jobId) ?? 0;
  }

  /**
   * Insert a summary record for a sync run.
   */
  async insertRun(run: RunSummary): Promise<void> {
    this.runs.push({ ...run });
  }

  async getRuns(jobId: string): Promise<RunSummary[]> {
    return this.runs.filter((run) => run.jobId === jobId);
  }

  // --- Helper methods for testing/debugging ---

  /**
   * Timestamp a job was disabled at, or undefined while it is enabled.
   */
  disabledAt(jobId: string): Date | undefined {
    return this.disabledJobs.get(jobId);
  }

  /**
   * Enable a previously disabled job.
   */
  enableJob(jobId: string): void {
    this.disabledJobs.delete(jobId);
  }

  /**
   * Clear all data.
   */
  clear(): void {
    this.fingerprints.clear();
    this.failCounts.clear();
    this.disabledJobs.clear();
    this.runs = [];
  }
}
