/**
 * Address formatting and artifact comparison helpers.
 */

import { MAX_ADDRESS, type Address } from "./artifacts.js";
import { ConfigurationError } from "./errors.js";

export function formatAddress(addr: Address): string {
  return `0x${addr.toString(16)}`;
}

/**
 * Parse an address from configuration or snapshot input.
 * Accepts `0x`-prefixed hex, decimal strings, safe integers and bigints.
 * @throws ConfigurationError if the value is not an unsigned 64-bit address
 */
export function parseAddress(value: string | number | bigint): Address {
  let parsed: bigint;

  if (typeof value === "bigint") {
    parsed = value;
  } else if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new ConfigurationError(`Address ${value} is not a safe integer; use a hex string`);
    }
    parsed = BigInt(value);
  } else {
    const text = value.trim();
    if (!/^(0[xX][0-9a-fA-F]+|[0-9]+)$/.test(text)) {
      throw new ConfigurationError(`Invalid address '${value}'`);
    }
    parsed = BigInt(text);
  }

  if (parsed < 0n || parsed > MAX_ADDRESS) {
    throw new ConfigurationError(`Address ${value} is outside the 64-bit range`);
  }
  return parsed;
}

function canonicalize(value: unknown): unknown {
  if (typeof value === "bigint") {
    return formatAddress(value);
  }
  if (value instanceof Uint8Array) {
    return `bytes:${Buffer.from(value).toString("hex")}`;
  }
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }
  if (value !== null && typeof value === "object") {
    const entries: [string, unknown][] = Object.entries(value);
    const out: { [key: string]: unknown } = {};
    for (const [key, item] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (item !== undefined) {
        out[key] = canonicalize(item);
      }
    }
    return out;
  }
  return value;
}

/**
 * Stable string form of an artifact: key order, bigints and byte arrays
 * are normalized so equal artifacts always produce the same string.
 */
export function fingerprint(artifact: object): string {
  return JSON.stringify(canonicalize(artifact));
}

export function artifactsEqual(a: object, b: object): boolean {
  return fingerprint(a) === fingerprint(b);
}
