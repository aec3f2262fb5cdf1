/**
 * JSON snapshot format for InMemoryBackend databases.
 *
 * Addresses are written as hex strings so 64-bit values survive JSON, and
 * patched bytes are stored as coalesced runs with hex byte strings.
 *
 * ```json
 * {
 *   "binary": { "path": "/bin/demo", "hash": "0c5f..." },
 *   "functions": [{ "addr": "0x401000", "size": 32, "name": "main",
 *                   "stack_vars": [{ "offset": -8, "name": "n", "type": "int", "size": 4 }] }],
 *   "patches": [{ "addr": "0x401004", "bytes": "9090", "original": "7405" }]
 * }
 * ```
 */

import * as fs from "fs/promises";
import {
  ArtisyncError,
  ErrorCode,
  coalescePatches,
  formatAddress,
  parseAddress,
  type Address,
  type Comment,
  type Enum,
  type FunctionArtifact,
  type GlobalVariable,
  type PatchedByte,
  type StackVariable,
  type Struct,
} from "@artisync/core";
import type { InMemoryState } from "./in-memory-adapter.js";

export class SnapshotFormatError extends ArtisyncError {
  constructor(message: string) {
    super(message, ErrorCode.CONFIGURATION);
    this.name = "SnapshotFormatError";
  }
}

export interface SnapshotBinary {
  path?: string;
  hash?: string;
}

export interface Snapshot {
  binary: SnapshotBinary;
  state: InMemoryState;
}

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, where: string): JsonObject {
  if (!isObject(value)) {
    throw new SnapshotFormatError(`${where}: expected an object`);
  }
  return value;
}

function readArray(obj: JsonObject, key: string, where: string): unknown[] {
  const value = obj[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new SnapshotFormatError(`${where}.${key}: expected an array`);
  }
  return value;
}

function readString(obj: JsonObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new SnapshotFormatError(`${where}.${key}: expected a string`);
  }
  return value;
}

function readOptionalString(obj: JsonObject, key: string, where: string): string | undefined {
  return obj[key] === undefined ? undefined : readString(obj, key, where);
}

function readInteger(obj: JsonObject, key: string, where: string, fallback?: number): number {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new SnapshotFormatError(`${where}.${key}: expected an integer`);
  }
  return value;
}

function readAddress(obj: JsonObject, key: string, where: string): Address {
  const value = obj[key];
  if (typeof value !== "string" && typeof value !== "number") {
    throw new SnapshotFormatError(`${where}.${key}: expected an address`);
  }
  try {
    return parseAddress(value);
  } catch (error) {
    throw new SnapshotFormatError(`${where}.${key}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function readHexBytes(obj: JsonObject, key: string, where: string): Uint8Array {
  const text = readString(obj, key, where);
  if (text.length === 0 || text.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(text)) {
    throw new SnapshotFormatError(`${where}.${key}: expected a non-empty hex byte string`);
  }
  return Uint8Array.from(Buffer.from(text, "hex"));
}

function parseStackVariable(value: unknown, funcAddr: Address, where: string): StackVariable {
  const obj = expectObject(value, where);
  return {
    funcAddr,
    offset: readInteger(obj, "offset", where),
    name: readString(obj, "name", where),
    type: readString(obj, "type", where),
    size: readInteger(obj, "size", where),
  };
}

function parseFunction(value: unknown, where: string): FunctionArtifact {
  const obj = expectObject(value, where);
  const addr = readAddress(obj, "addr", where);
  const fn: FunctionArtifact = {
    addr,
    size: readInteger(obj, "size", where, 0),
    header: { name: readOptionalString(obj, "name", where) ?? "", addr },
    stackVars: readArray(obj, "stack_vars", where).map((svar, i) =>
      parseStackVariable(svar, addr, `${where}.stack_vars[${i}]`)
    ),
  };
  const returnType = readOptionalString(obj, "return_type", where);
  if (returnType !== undefined) {
    fn.header.returnType = returnType;
  }
  return fn;
}

function parseGlobalVariable(value: unknown, where: string): GlobalVariable {
  const obj = expectObject(value, where);
  const gvar: GlobalVariable = {
    addr: readAddress(obj, "addr", where),
    name: readString(obj, "name", where),
    size: readInteger(obj, "size", where, 0),
  };
  const type = readOptionalString(obj, "type", where);
  if (type !== undefined) {
    gvar.type = type;
  }
  return gvar;
}

function parseStruct(value: unknown, where: string): Struct {
  const obj = expectObject(value, where);
  return {
    name: readString(obj, "name", where),
    size: readInteger(obj, "size", where),
    members: readArray(obj, "members", where).map((member, i) => {
      const at = `${where}.members[${i}]`;
      const m = expectObject(member, at);
      return {
        offset: readInteger(m, "offset", at),
        name: readString(m, "name", at),
        type: readString(m, "type", at),
        size: readInteger(m, "size", at),
      };
    }),
  };
}

function parseEnum(value: unknown, where: string): Enum {
  const obj = expectObject(value, where);
  const membersObj = obj.members === undefined ? {} : expectObject(obj.members, `${where}.members`);
  const members: Record<string, number> = {};
  for (const name of Object.keys(membersObj)) {
    members[name] = readInteger(membersObj, name, `${where}.members`);
  }
  return { name: readString(obj, "name", where), members };
}

function parseComment(value: unknown, where: string): Comment {
  const obj = expectObject(value, where);
  const decompiled = obj.decompiled ?? false;
  if (typeof decompiled !== "boolean") {
    throw new SnapshotFormatError(`${where}.decompiled: expected a boolean`);
  }
  const comment: Comment = {
    addr: readAddress(obj, "addr", where),
    text: readString(obj, "text", where),
    decompiled,
  };
  if (obj.func_addr !== undefined) {
    comment.funcAddr = readAddress(obj, "func_addr", where);
  }
  return comment;
}

function parsePatchRun(value: unknown, where: string): PatchedByte[] {
  const obj = expectObject(value, where);
  const addr = readAddress(obj, "addr", where);
  const bytes = readHexBytes(obj, "bytes", where);
  const original = obj.original === undefined ? new Uint8Array(bytes.length) : readHexBytes(obj, "original", where);
  if (original.length !== bytes.length) {
    throw new SnapshotFormatError(`${where}: 'original' and 'bytes' differ in length`);
  }
  return Array.from(bytes, (patched, i) => ({ addr: addr + BigInt(i), original: original[i], patched }));
}

/**
 * Validate a parsed JSON document and convert it to backend state.
 * @throws SnapshotFormatError if the document does not match the format
 */
export function parseSnapshot(document: unknown): Snapshot {
  const root = expectObject(document, "snapshot");
  const binaryObj = root.binary === undefined ? {} : expectObject(root.binary, "snapshot.binary");

  const patchedBytes = readArray(root, "patches", "snapshot")
    .flatMap((run, i) => parsePatchRun(run, `snapshot.patches[${i}]`))
    .sort((a, b) => (a.addr < b.addr ? -1 : a.addr > b.addr ? 1 : 0));
  for (let i = 1; i < patchedBytes.length; i++) {
    if (patchedBytes[i].addr === patchedBytes[i - 1].addr) {
      throw new SnapshotFormatError(`snapshot.patches: byte ${formatAddress(patchedBytes[i].addr)} is patched twice`);
    }
  }

  return {
    binary: {
      path: readOptionalString(binaryObj, "path", "snapshot.binary"),
      hash: readOptionalString(binaryObj, "hash", "snapshot.binary"),
    },
    state: {
      functions: readArray(root, "functions", "snapshot").map((v, i) => parseFunction(v, `snapshot.functions[${i}]`)),
      globalVariables: readArray(root, "global_variables", "snapshot").map((v, i) =>
        parseGlobalVariable(v, `snapshot.global_variables[${i}]`)
      ),
      structs: readArray(root, "structs", "snapshot").map((v, i) => parseStruct(v, `snapshot.structs[${i}]`)),
      enums: readArray(root, "enums", "snapshot").map((v, i) => parseEnum(v, `snapshot.enums[${i}]`)),
      comments: readArray(root, "comments", "snapshot").map((v, i) => parseComment(v, `snapshot.comments[${i}]`)),
      patchedBytes,
    },
  };
}

function toHex(bytes: Iterable<number>): string {
  return Buffer.from(Array.from(bytes)).toString("hex");
}

/**
 * Convert backend state to the JSON document form.
 */
export function serializeSnapshot(snapshot: Snapshot): JsonObject {
  const { binary, state } = snapshot;
  const patchedBytes = state.patchedBytes ?? [];
  const originals = new Map(patchedBytes.map((edit): [Address, number] => [edit.addr, edit.original]));

  const patches = [...coalescePatches(patchedBytes).values()].map((patch) => ({
    addr: formatAddress(patch.addr),
    bytes: toHex(patch.bytes),
    original: toHex(Array.from(patch.bytes, (_, i) => originals.get(patch.addr + BigInt(i)) ?? 0)),
  }));

  return {
    binary: { ...binary },
    functions: (state.functions ?? []).map((fn) => ({
      addr: formatAddress(fn.addr),
      size: fn.size,
      name: fn.header.name,
      ...(fn.header.returnType !== undefined ? { return_type: fn.header.returnType } : {}),
      stack_vars: fn.stackVars.map((svar) => ({
        offset: svar.offset,
        name: svar.name,
        type: svar.type,
        size: svar.size,
      })),
    })),
    global_variables: (state.globalVariables ?? []).map((gvar) => ({
      addr: formatAddress(gvar.addr),
      name: gvar.name,
      size: gvar.size,
      ...(gvar.type !== undefined ? { type: gvar.type } : {}),
    })),
    structs: (state.structs ?? []).map((struct) => ({
      name: struct.name,
      size: struct.size,
      members: struct.members.map((member) => ({ ...member })),
    })),
    enums: (state.enums ?? []).map((enumeration) => ({ name: enumeration.name, members: { ...enumeration.members } })),
    comments: (state.comments ?? []).map((comment) => ({
      addr: formatAddress(comment.addr),
      text: comment.text,
      decompiled: comment.decompiled,
      ...(comment.funcAddr !== undefined ? { func_addr: formatAddress(comment.funcAddr) } : {}),
    })),
    patches,
  };
}

/**
 * Load and validate a snapshot file.
 * @throws Error if the file cannot be read or is not a valid snapshot
 */
export async function loadSnapshot(snapshotPath: string): Promise<Snapshot> {
  let content: string;
  try {
    content = await fs.readFile(snapshotPath, "utf-8");
  } catch (error) {
    throw new SnapshotFormatError(
      `Failed to read snapshot ${snapshotPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new SnapshotFormatError(
      `Snapshot ${snapshotPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseSnapshot(document);
}

export async function saveSnapshot(snapshotPath: string, snapshot: Snapshot): Promise<void> {
  await fs.writeFile(snapshotPath, `${JSON.stringify(serializeSnapshot(snapshot), null, 2)}\n`, "utf-8");
}
