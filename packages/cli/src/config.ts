/**
 * Type definitions for JSONC configuration file format.
 * These types represent the configuration as it appears in the JSONC file,
 * after structural validation.
 */

import type { ArtifactKind, FunctionSyncMode } from "@artisync/core";

/**
 * Free-form options handed to a backend or state-store factory.
 * Each factory validates its own keys.
 */
export interface FactoryOptions {
  [key: string]: unknown;
}

/**
 * Sync-state store configuration.
 */
export interface SyncStateConfig {
  driver: string; // e.g., "in-memory"
  options?: FactoryOptions;
}

/**
 * One end of a sync job (as it appears in JSONC).
 */
export interface PeerConfigRaw {
  backend: string; // e.g., "in-memory"
  options?: FactoryOptions;
}

/**
 * Individual job configuration (as it appears in JSONC).
 * Uses snake_case to match JSONC format.
 */
export interface JobConfigRaw {
  id: string;
  schedule?: string; // Cron expression; omit for manual/CLI-only
  source: PeerConfigRaw;
  target: PeerConfigRaw;
  kinds?: ArtifactKind[];
  function_sync?: FunctionSyncMode;
  disable_job_after?: number;
  require_matching_binary?: boolean;
}

/**
 * Complete configuration file structure (as it appears in JSONC).
 */
export interface ConfigFile {
  syncstate: SyncStateConfig;
  jobs: JobConfigRaw[];
}
