/**
 * Build an InMemoryBackend from the loosely typed `options` block of a job
 * configuration.
 */

import * as fs from "fs/promises";
import * as path from "path";
import {
  ARTIFACT_KINDS,
  ConfigurationError,
  IdentityAddressLifter,
  RebasedAddressLifter,
  isArtifactKind,
  parseAddress,
  type Address,
  type AddressLifter,
  type FunctionArtifact,
  type Logger,
  type StructSyncPolicy,
  type TypeAliases,
  type UnsafeOperation,
} from "@artisync/core";
import { InMemoryBackend, type InMemoryBackendOptions } from "./in-memory-adapter.js";
import { loadSnapshot, saveSnapshot, type Snapshot } from "./snapshot.js";

export interface BackendFactoryContext {
  /** Directory relative paths in options resolve against (the config file's directory). */
  baseDir: string;
  logger?: Logger;
}

/**
 * Minimal pseudo-C used when a job asks for a decompiler on an in-memory peer.
 */
export function renderPseudocode(fn: FunctionArtifact): string {
  const lines = [`${fn.header.returnType ?? "void"} ${fn.header.name || "sub"}(void)`, "{"];
  for (const svar of fn.stackVars) {
    lines.push(`  ${svar.type} ${svar.name}; // [sp${svar.offset < 0 ? "-" : "+"}0x${Math.abs(svar.offset).toString(16)}]`);
  }
  lines.push("}");
  return lines.join("\n");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value === "") {
    throw new ConfigurationError(`in-memory backend: '${key}' must be a non-empty string`);
  }
  return value;
}

function optionalAddress(options: Record<string, unknown>, key: string): Address | undefined {
  const value = options[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" && typeof value !== "number") {
    throw new ConfigurationError(`in-memory backend: '${key}' must be an address`);
  }
  return parseAddress(value);
}

function parseStructPolicy(value: unknown): StructSyncPolicy | undefined {
  if (value === undefined || value === "independent" || value === "atomic") {
    return value;
  }
  throw new ConfigurationError(`in-memory backend: 'struct_policy' must be "independent" or "atomic"`);
}

function parseUnsafe(value: unknown): UnsafeOperation[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError("in-memory backend: 'unsafe' must be an array");
  }
  return value.map((entry: unknown, i) => {
    const where = `in-memory backend: unsafe[${i}]`;
    if (!isRecord(entry)) {
      throw new ConfigurationError(`${where} must be an object`);
    }
    const { kind, key, reason } = entry;
    if (typeof kind !== "string" || !isArtifactKind(kind)) {
      throw new ConfigurationError(`${where}.kind must be one of: ${ARTIFACT_KINDS.join(", ")}`);
    }
    if (typeof key !== "string" || key === "") {
      throw new ConfigurationError(`${where}.key must be a non-empty string`);
    }
    return { kind, key, reason: typeof reason === "string" && reason !== "" ? reason : "marked unsafe" };
  });
}

function parseTypeAliases(value: unknown): TypeAliases {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError("in-memory backend: 'type_aliases' must be an object");
  }
  const aliases: TypeAliases = {};
  for (const [nativeType, canonicalType] of Object.entries(value)) {
    if (typeof canonicalType !== "string") {
      throw new ConfigurationError(`in-memory backend: type_aliases.${nativeType} must be a string`);
    }
    aliases[nativeType] = canonicalType;
  }
  return aliases;
}

function parseMaxPatchSize(value: unknown): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigurationError("in-memory backend: 'max_patch_size' must be a positive integer");
  }
  return value;
}

/**
 * Options:
 * - `snapshot`: JSON snapshot to seed the database from
 * - `output`: where `close()` writes the database back
 * - `image`: raw image file, for the binary hash and original bytes
 * - `image_base`: native load address
 * - `canonical_base`: where the image starts in canonical space (defaults to `image_base`)
 * - `image_size`: limit of the rebased mapping (defaults to the image length)
 * - `binary_path`, `binary_hash`: override what the snapshot records
 * - `decompiler`: attach the pseudo-C renderer
 * - `struct_policy`, `unsafe`, `max_patch_size`, `type_aliases`
 */
export async function createInMemoryBackend(
  options: Record<string, unknown>,
  context: BackendFactoryContext
): Promise<InMemoryBackend> {
  const resolve = (file: string): string => path.resolve(context.baseDir, file);

  const snapshotPath = optionalString(options, "snapshot");
  const outputPath = optionalString(options, "output");
  const imagePath = optionalString(options, "image");

  const snapshot: Snapshot = snapshotPath ? await loadSnapshot(resolve(snapshotPath)) : { binary: {}, state: {} };

  let image: Uint8Array | undefined;
  if (imagePath) {
    try {
      image = new Uint8Array(await fs.readFile(resolve(imagePath)));
    } catch (error) {
      throw new ConfigurationError(
        `in-memory backend: failed to read image ${imagePath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  const imageBase = optionalAddress(options, "image_base");
  const canonicalBase = optionalAddress(options, "canonical_base");
  const imageSize = optionalAddress(options, "image_size") ?? (image ? BigInt(image.length) : undefined);
  if (canonicalBase !== undefined && imageBase === undefined) {
    throw new ConfigurationError("in-memory backend: 'canonical_base' needs 'image_base'");
  }
  const lifter: AddressLifter =
    imageBase !== undefined
      ? new RebasedAddressLifter({ nativeBase: imageBase, canonicalBase, size: imageSize })
      : new IdentityAddressLifter();

  const decompile = options.decompiler ?? false;
  if (typeof decompile !== "boolean") {
    throw new ConfigurationError("in-memory backend: 'decompiler' must be a boolean");
  }

  const binaryPath = optionalString(options, "binary_path") ?? snapshot.binary.path;
  const binaryHash = optionalString(options, "binary_hash") ?? (image ? undefined : snapshot.binary.hash);

  const backendOptions: InMemoryBackendOptions = {
    lifter,
    image,
    imageBase,
    binaryHash,
    binaryPath,
    decompiler: decompile ? renderPseudocode : undefined,
    initialState: snapshot.state,
    structSyncPolicy: parseStructPolicy(options.struct_policy),
    unsafeOperations: parseUnsafe(options.unsafe),
    maxPatchSize: parseMaxPatchSize(options.max_patch_size),
    typeAliases: parseTypeAliases(options.type_aliases),
    logger: context.logger,
  };

  if (outputPath) {
    const target = resolve(outputPath);
    backendOptions.onClose = async (state) => {
      await saveSnapshot(target, { binary: { path: binaryPath, hash: binaryHash }, state });
    };
  }

  return new InMemoryBackend(backendOptions);
}
