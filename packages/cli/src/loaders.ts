/**
 * Registry of backend and sync-state factories.
 *
 * Configuration names a backend or driver by string; the registry maps that
 * string to a factory. The in-memory implementations are registered up
 * front, and embedders register their own before calling the runner.
 */

import { createInMemoryBackend } from "@artisync/adapter-in-memory";
import { ConfigurationError, type BackendAdapter, type Logger, type SyncStateStore } from "@artisync/core";
import { InMemorySyncStateStore } from "@artisync/syncstate-in-memory";
import type { FactoryOptions, PeerConfigRaw, SyncStateConfig } from "./config.js";

export interface LoaderContext {
  /** Directory relative paths in options resolve against (the config file's directory). */
  baseDir: string;
  logger?: Logger;
}

export type BackendFactory = (options: FactoryOptions, context: LoaderContext) => Promise<BackendAdapter>;

export type SyncStateFactory = (options: FactoryOptions, context: LoaderContext) => Promise<SyncStateStore>;

const backendFactories = new Map<string, BackendFactory>([["in-memory", createInMemoryBackend]]);

const syncStateFactories = new Map<string, SyncStateFactory>([
  ["in-memory", async () => new InMemorySyncStateStore()],
]);

/**
 * Register a backend factory under a name usable as `backend` in job configs.
 * Registering an existing name replaces it.
 */
export function registerBackend(name: string, factory: BackendFactory): void {
  backendFactories.set(name, factory);
}

/**
 * Register a sync-state factory under a name usable as `syncstate.driver`.
 */
export function registerSyncState(name: string, factory: SyncStateFactory): void {
  syncStateFactories.set(name, factory);
}

export function registeredBackends(): string[] {
  return [...backendFactories.keys()].sort();
}

export function registeredSyncStates(): string[] {
  return [...syncStateFactories.keys()].sort();
}

/**
 * Load a backend instance based on the peer configuration.
 * @param peerConfig - Peer configuration naming the backend and its options
 * @param context - Base directory and logger handed to the factory
 * @returns Instantiated backend
 * @throws ConfigurationError if the backend is unknown or its factory fails
 */
export async function loadBackend(peerConfig: PeerConfigRaw, context: LoaderContext): Promise<BackendAdapter> {
  const factory = backendFactories.get(peerConfig.backend);
  if (!factory) {
    throw new ConfigurationError(
      `Unknown backend '${peerConfig.backend}'. Registered backends: ${registeredBackends().join(", ") || "none"}`
    );
  }

  try {
    return await factory(peerConfig.options ?? {}, context);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load backend '${peerConfig.backend}': ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Load a SyncStateStore instance based on the configuration.
 * @throws ConfigurationError if the driver is unknown or its factory fails
 */
export async function loadSyncState(config: SyncStateConfig, context: LoaderContext): Promise<SyncStateStore> {
  const factory = syncStateFactories.get(config.driver);
  if (!factory) {
    throw new ConfigurationError(
      `Unknown syncstate driver '${config.driver}'. Registered drivers: ${registeredSyncStates().join(", ") || "none"}`
    );
  }

  try {
    return await factory(config.options ?? {}, context);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load syncstate driver '${config.driver}': ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}
