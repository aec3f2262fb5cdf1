/**
 * Contracts between the sync engine and its persistence collaborator.
 * The core never stores artifacts itself; it asks a SyncStateStore to
 * remember what it last wrote and how each job has been doing.
 */

import type { ArtifactKind } from "./artifacts.js";

/**
 * Which end of a job ("source", "target", or any label a runner picks).
 */
export type PeerKey = string;

export type RunStatus = "success" | "partial" | "failed";

/**
 * Outcome counters for one artifact kind in one pass.
 */
export interface KindStats {
  /** Artifacts listed on the source. */
  listed: number;
  /** Writes that changed the target. */
  changed: number;
  /** Writes the target reported as no-ops or refused. */
  unchanged: number;
  /** Artifacts whose fingerprint matched the last pass; not written. */
  skipped: number;
  /** Artifacts that vanished between listing and fetch. */
  missing: number;
  /** Artifacts whose write raised. */
  failed: number;
}

export interface RunStats {
  kinds: Partial<Record<ArtifactKind, KindStats>>;
  errors: string[];
  durationMs: number;
  /** Set when the pass stopped before touching any artifact. */
  reason?: "job_disabled" | "binary_mismatch" | "fatal";
}

/**
 * Summary of a sync run.
 */
export interface RunSummary {
  runId: string;
  jobId: string;
  startedAt: Date;
  endedAt: Date | null;
  status: RunStatus;
  stats: RunStats;
}

/**
 * Persistence for sync bookkeeping. Implementations can keep it in memory,
 * on disk or in a database.
 */
export interface SyncStateStore {
  // --- Fingerprints ---
  /**
   * Fingerprint of the artifact as last written to a peer, or null if it
   * was never written.
   */
  loadFingerprint(jobId: string, peer: PeerKey, kind: ArtifactKind, key: string): Promise<string | null>;

  saveFingerprint(
    jobId: string,
    peer: PeerKey,
    kind: ArtifactKind,
    key: string,
    fingerprint: string
  ): Promise<void>;

  // --- Job State ---
  setJobDisabled(jobId: string, ts: Date): Promise<void>;

  isJobDisabled(jobId: string): Promise<boolean>;

  // --- Fail Count Tracking ---
  /**
   * @returns The new fail count after incrementing
   */
  incrementFailCount(jobId: string): Promise<number>;

  resetFailCount(jobId: string): Promise<void>;

  getFailCount(jobId: string): Promise<number>;

  // --- Run Logs ---
  insertRun(run: RunSummary): Promise<void>;

  /**
   * Runs recorded for a job, oldest first.
   */
  getRuns(jobId: string): Promise<RunSummary[]>;
}
