/**
 * JSONC configuration file parsing and environment variable expansion.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import { ARTIFACT_KINDS, ConfigurationError, isArtifactKind, type ArtifactKind } from "@artisync/core";
import type { ConfigFile, FactoryOptions, JobConfigRaw, PeerConfigRaw, SyncStateConfig } from "./config.js";

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load and parse a JSONC configuration file.
 * @param configPath - Path to the JSONC configuration file
 * @returns Parsed and validated configuration, environment variables not yet expanded
 * @throws ConfigurationError if file cannot be read, parsed or validated
 */
export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  const fullPath = path.resolve(configPath);

  try {
    const content = await fs.readFile(fullPath, "utf-8");
    return parseConfig(content);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config from ${fullPath}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Parse and validate configuration text.
 * @throws ConfigurationError if the text is not valid JSONC or not a valid configuration
 */
export function parseConfig(content: string): ConfigFile {
  const errors: ParseError[] = [];

  // Parse JSONC (supports comments)
  const document: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    disallowComments: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors.map((e) => `Error at offset ${e.offset}: ${printParseErrorCode(e.error)}`);
    throw new ConfigurationError(`Failed to parse JSONC file: ${errorMessages.join(", ")}`);
  }

  return validateConfig(document);
}

/**
 * Expand environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * @param value - String that may contain environment variable references
 * @returns Expanded string
 */
export function expandEnvVar(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([^}:-]+)(?::-([^}]*))?\}/g, (match: string, varName: string, defaultValue?: string) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Unresolved references are kept so the backend reports the literal value
    return match;
  });
}

/**
 * Recursively expand environment variables in strings nested in a value.
 */
function expandValue(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return expandEnvVar(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => expandValue(item, env));
  }

  if (isObject(value)) {
    return expandOptions(value, env);
  }

  return value;
}

function expandOptions(options: FactoryOptions, env: NodeJS.ProcessEnv): FactoryOptions {
  const expanded: FactoryOptions = {};
  for (const [key, value] of Object.entries(options)) {
    expanded[key] = expandValue(value, env);
  }
  return expanded;
}

function expandPeer(peer: PeerConfigRaw, env: NodeJS.ProcessEnv): PeerConfigRaw {
  return {
    backend: expandEnvVar(peer.backend, env),
    options: peer.options ? expandOptions(peer.options, env) : undefined,
  };
}

/**
 * Expand environment variables in the configuration.
 * Covers driver and backend names and every string inside their options.
 * @param config - Raw configuration object
 * @returns Configuration with environment variables expanded
 */
export function expandEnvironmentVariables(config: ConfigFile, env: NodeJS.ProcessEnv = process.env): ConfigFile {
  return {
    syncstate: {
      driver: expandEnvVar(config.syncstate.driver, env),
      options: config.syncstate.options ? expandOptions(config.syncstate.options, env) : undefined,
    },
    jobs: config.jobs.map((job) => ({
      ...job,
      source: expandPeer(job.source, env),
      target: expandPeer(job.target, env),
    })),
  };
}

/**
 * Load a configuration file and expand its environment variables.
 */
export async function loadConfig(configPath: string): Promise<ConfigFile> {
  return expandEnvironmentVariables(await loadConfigFile(configPath));
}

/**
 * Validate the structure of the configuration object.
 * @param config - Configuration object to validate
 * @throws ConfigurationError if configuration is invalid
 */
function validateConfig(config: unknown): ConfigFile {
  if (!isObject(config)) {
    throw new ConfigurationError("Configuration file must contain an object");
  }

  if (!isObject(config.syncstate)) {
    throw new ConfigurationError("Configuration must include 'syncstate' section");
  }

  const { driver, options } = config.syncstate;
  if (typeof driver !== "string" || driver === "") {
    throw new ConfigurationError("SyncState configuration must include 'driver'");
  }
  const syncstate: SyncStateConfig = { driver, options: validateOptions(options, "syncstate.options") };

  if (!Array.isArray(config.jobs)) {
    throw new ConfigurationError("Configuration must include 'jobs' array");
  }

  const jobs = config.jobs.map((job: unknown) => validateJobConfig(job));
  const seen = new Set<string>();
  for (const job of jobs) {
    if (seen.has(job.id)) {
      throw new ConfigurationError(`Duplicate job id '${job.id}'`);
    }
    seen.add(job.id);
  }

  return { syncstate, jobs };
}

function validateOptions(options: unknown, where: string): FactoryOptions | undefined {
  if (options === undefined) {
    return undefined;
  }
  if (!isObject(options)) {
    throw new ConfigurationError(`${where} must be an object`);
  }
  return options;
}

/**
 * Validate a single job configuration.
 * @param job - Job configuration to validate
 * @throws ConfigurationError if job configuration is invalid
 */
function validateJobConfig(job: unknown): JobConfigRaw {
  if (!isObject(job) || typeof job.id !== "string" || job.id === "") {
    throw new ConfigurationError("Each job must have a string 'id'");
  }
  const id = job.id;

  const validated: JobConfigRaw = {
    id,
    source: validatePeerConfig(id, "source", job.source),
    target: validatePeerConfig(id, "target", job.target),
  };

  if (job.schedule !== undefined) {
    if (typeof job.schedule !== "string") {
      throw new ConfigurationError(`Job '${id}': 'schedule' must be a cron expression string`);
    }
    validated.schedule = job.schedule;
  }

  if (job.kinds !== undefined) {
    validated.kinds = validateKinds(id, job.kinds);
  }

  if (job.function_sync !== undefined) {
    if (job.function_sync !== "full" && job.function_sync !== "header") {
      throw new ConfigurationError(`Job '${id}': 'function_sync' must be "full" or "header"`);
    }
    validated.function_sync = job.function_sync;
  }

  if (job.disable_job_after !== undefined) {
    const limit = job.disable_job_after;
    if (typeof limit !== "number" || !Number.isInteger(limit) || limit < 1) {
      throw new ConfigurationError(`Job '${id}': 'disable_job_after' must be a positive integer`);
    }
    validated.disable_job_after = limit;
  }

  if (job.require_matching_binary !== undefined) {
    if (typeof job.require_matching_binary !== "boolean") {
      throw new ConfigurationError(`Job '${id}': 'require_matching_binary' must be a boolean`);
    }
    validated.require_matching_binary = job.require_matching_binary;
  }

  return validated;
}

function validateKinds(jobId: string, kinds: unknown): ArtifactKind[] {
  if (!Array.isArray(kinds) || kinds.length === 0) {
    throw new ConfigurationError(`Job '${jobId}': 'kinds' must be a non-empty array`);
  }

  return kinds.map((kind: unknown) => {
    if (typeof kind !== "string" || !isArtifactKind(kind)) {
      throw new ConfigurationError(
        `Job '${jobId}': unknown artifact kind '${String(kind)}' (expected one of: ${ARTIFACT_KINDS.join(", ")})`
      );
    }
    return kind;
  });
}

/**
 * Validate a peer configuration.
 * @param jobId - Job ID for error messages
 * @param peerName - "source" or "target", for error messages
 * @param peerConfig - Peer configuration to validate
 * @throws ConfigurationError if peer configuration is invalid
 */
function validatePeerConfig(jobId: string, peerName: string, peerConfig: unknown): PeerConfigRaw {
  if (!isObject(peerConfig)) {
    throw new ConfigurationError(`Job '${jobId}': must have a '${peerName}' object`);
  }

  if (typeof peerConfig.backend !== "string" || peerConfig.backend === "") {
    throw new ConfigurationError(`Job '${jobId}', ${peerName}: must have 'backend' string`);
  }

  return {
    backend: peerConfig.backend,
    options: validateOptions(peerConfig.options, `Job '${jobId}', ${peerName}: 'options'`),
  };
}
