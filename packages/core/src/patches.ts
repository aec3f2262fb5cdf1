/**
 * Patch coalescing.
 *
 * Backends report patched bytes one at a time. This module rebuilds the
 * maximal contiguous runs those bytes form and returns one Patch per run,
 * keyed by the address the run starts at.
 */

import type { Address, Patch } from "./artifacts.js";
import { formatAddress } from "./compare.js";
import { InvalidRangeError, PatchEnumerationError } from "./errors.js";

/**
 * A single modified byte as reported by the backend.
 */
export interface PatchedByte {
  addr: Address;
  original: number;
  patched: number;
}

export interface CoalesceOptions {
  /**
   * Stop pulling facts once the first run is closed. Used for point
   * lookups so the rest of the patched-byte universe is never scanned.
   */
  stopAfterFirst?: boolean;
}

/**
 * Enumerates patched bytes over `[minAddr, maxAddr)` in strictly
 * increasing address order.
 */
export type PatchedByteSource = (minAddr: Address, maxAddr: Address) => Iterable<PatchedByte>;

export interface PatchQuery extends CoalesceOptions {
  minAddr: Address;
  /** Exclusive. */
  maxAddr: Address;
}

function isByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

/**
 * Merge individually reported bytes into contiguous Patch runs.
 *
 * Facts must arrive in strictly increasing address order. A run continues
 * only while each address is exactly one past the previous one; any gap
 * starts a new run.
 *
 * @throws PatchEnumerationError if facts are out of order or not bytes
 */
export function coalescePatches(
  facts: Iterable<PatchedByte>,
  options: CoalesceOptions = {}
): Map<Address, Patch> {
  const runs = new Map<Address, number[]>();
  let current: number[] = [];
  let lastAddr: Address | null = null;

  for (const fact of facts) {
    if (lastAddr !== null && fact.addr <= lastAddr) {
      throw new PatchEnumerationError(
        `Patched bytes out of order: ${formatAddress(fact.addr)} after ${formatAddress(lastAddr)}`
      );
    }
    if (!isByte(fact.patched)) {
      throw new PatchEnumerationError(
        `Patched value ${fact.patched} at ${formatAddress(fact.addr)} is not a byte`
      );
    }

    if (lastAddr === null || fact.addr !== lastAddr + 1n) {
      if (lastAddr !== null && options.stopAfterFirst) {
        break;
      }
      current = [];
      runs.set(fact.addr, current);
    }

    current.push(fact.patched);
    lastAddr = fact.addr;
  }

  const patches = new Map<Address, Patch>();
  for (const [addr, bytes] of runs) {
    patches.set(addr, { addr, bytes: Uint8Array.from(bytes) });
  }
  return patches;
}

/**
 * Query a backend's patched bytes over a range and coalesce them.
 * An empty range yields no patches.
 *
 * @throws InvalidRangeError if `minAddr > maxAddr`
 * @throws PatchEnumerationError if the source reports bytes outside the range
 */
export function collectContinuousPatches(
  source: PatchedByteSource,
  query: PatchQuery
): Map<Address, Patch> {
  const { minAddr, maxAddr } = query;
  if (minAddr > maxAddr) {
    throw new InvalidRangeError(minAddr, maxAddr);
  }
  if (minAddr === maxAddr) {
    return new Map();
  }

  function* bounded(): Generator<PatchedByte> {
    for (const fact of source(minAddr, maxAddr)) {
      if (fact.addr < minAddr || fact.addr >= maxAddr) {
        throw new PatchEnumerationError(
          `Patched byte at ${formatAddress(fact.addr)} is outside [${formatAddress(minAddr)}, ${formatAddress(maxAddr)})`
        );
      }
      yield fact;
    }
  }

  return coalescePatches(bounded(), { stopAfterFirst: query.stopAfterFirst });
}
