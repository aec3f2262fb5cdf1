/**
 * Translation between a backend's native addressing and the canonical
 * address space shared by the engine and sync peers.
 *
 * `lift` goes native → canonical, `lower` goes canonical → native.
 * For every valid native address `x`: `lower(lift(x)) === x`.
 */

import { INVALID_ADDRESS, MAX_ADDRESS, UNSET_ADDRESS, type Address } from "./artifacts.js";
import { formatAddress } from "./compare.js";
import { ConfigurationError, UnmappedAddressError } from "./errors.js";

export interface AddressLifter {
  /** The backend's own "invalid address" marker. */
  readonly nativeInvalid: Address;

  /**
   * Native → canonical. The native invalid marker, and any address the
   * backend cannot place, map to `INVALID_ADDRESS`.
   */
  lift(nativeAddr: Address): Address;

  /**
   * Canonical → native. `INVALID_ADDRESS` maps back to `nativeInvalid`.
   * @throws UnmappedAddressError if the address has no native counterpart
   */
  lower(canonicalAddr: Address): Address;
}

/**
 * For backends whose native space already is the canonical one.
 */
export class IdentityAddressLifter implements AddressLifter {
  readonly nativeInvalid: Address;

  constructor(nativeInvalid: Address = INVALID_ADDRESS) {
    this.nativeInvalid = nativeInvalid;
  }

  lift(nativeAddr: Address): Address {
    return nativeAddr === this.nativeInvalid ? INVALID_ADDRESS : nativeAddr;
  }

  lower(canonicalAddr: Address): Address {
    if (canonicalAddr === INVALID_ADDRESS) {
      return this.nativeInvalid;
    }
    if (canonicalAddr === this.nativeInvalid) {
      throw new UnmappedAddressError(canonicalAddr, "collides with the native invalid marker");
    }
    return canonicalAddr;
  }
}

export interface RebasedAddressLifterOptions {
  /** Where the image is loaded in the backend. */
  nativeBase: Address;
  /**
   * Where the same image starts in canonical space. Defaults to `nativeBase`.
   * Must not be 0 unless `nativeBase` is: the first image byte would lift to
   * the unset address.
   */
  canonicalBase?: Address;
  /** Image size; when set, addresses past the image are unmapped. */
  size?: bigint;
  nativeInvalid?: Address;
}

/**
 * For backends that load the image at a different base address.
 */
export class RebasedAddressLifter implements AddressLifter {
  readonly nativeInvalid: Address;
  private readonly nativeBase: Address;
  private readonly canonicalBase: Address;
  private readonly size: bigint | undefined;

  constructor(options: RebasedAddressLifterOptions) {
    this.nativeBase = options.nativeBase;
    this.canonicalBase = options.canonicalBase ?? options.nativeBase;
    this.size = options.size;
    this.nativeInvalid = options.nativeInvalid ?? INVALID_ADDRESS;

    if (this.size !== undefined && this.size <= 0n) {
      throw new ConfigurationError(`Rebased image size must be positive, got ${this.size}`);
    }
    assertNoUnsetTarget(this.nativeBase, this.canonicalBase);
  }

  lift(nativeAddr: Address): Address {
    if (nativeAddr === this.nativeInvalid || nativeAddr < this.nativeBase) {
      return INVALID_ADDRESS;
    }
    const offset = nativeAddr - this.nativeBase;
    if (this.size !== undefined && offset >= this.size) {
      return INVALID_ADDRESS;
    }
    const canonical = this.canonicalBase + offset;
    return canonical >= MAX_ADDRESS ? INVALID_ADDRESS : canonical;
  }

  lower(canonicalAddr: Address): Address {
    if (canonicalAddr === INVALID_ADDRESS) {
      return this.nativeInvalid;
    }
    if (canonicalAddr < this.canonicalBase) {
      throw new UnmappedAddressError(canonicalAddr, `below canonical base ${formatAddress(this.canonicalBase)}`);
    }
    const offset = canonicalAddr - this.canonicalBase;
    if (this.size !== undefined && offset >= this.size) {
      throw new UnmappedAddressError(canonicalAddr, "past the end of the image");
    }
    const native = this.nativeBase + offset;
    if (native > MAX_ADDRESS || native === this.nativeInvalid) {
      throw new UnmappedAddressError(canonicalAddr, "outside the native address space");
    }
    return native;
  }
}

export interface AddressSegment {
  nativeStart: Address;
  canonicalStart: Address;
  size: bigint;
}

/**
 * A mapped native byte other than 0 may not land on canonical 0 (unset).
 */
function assertNoUnsetTarget(nativeStart: Address, canonicalStart: Address): void {
  if (canonicalStart === UNSET_ADDRESS && nativeStart !== UNSET_ADDRESS) {
    throw new ConfigurationError(
      `Native ${formatAddress(nativeStart)} would lift to the unset address 0; use a canonical base above 0`
    );
  }
}

function assertDisjoint(segments: AddressSegment[], start: (segment: AddressSegment) => Address, side: string): void {
  const sorted = [...segments].sort((a, b) => (start(a) < start(b) ? -1 : start(a) > start(b) ? 1 : 0));
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    if (start(previous) + previous.size > start(sorted[i])) {
      throw new ConfigurationError(
        `Segments overlap in ${side} space at ${formatAddress(start(sorted[i]))}`
      );
    }
  }
}

/**
 * For backends that place each section of the image independently.
 */
export class SegmentedAddressLifter implements AddressLifter {
  readonly nativeInvalid: Address;
  private readonly segments: AddressSegment[];

  constructor(segments: AddressSegment[], nativeInvalid: Address = INVALID_ADDRESS) {
    for (const segment of segments) {
      if (segment.size <= 0n) {
        throw new ConfigurationError(
          `Segment at ${formatAddress(segment.nativeStart)} must have a positive size`
        );
      }
      assertNoUnsetTarget(segment.nativeStart, segment.canonicalStart);
    }
    assertDisjoint(segments, (segment) => segment.nativeStart, "native");
    assertDisjoint(segments, (segment) => segment.canonicalStart, "canonical");

    this.segments = segments.map((segment) => ({ ...segment }));
    this.nativeInvalid = nativeInvalid;
  }

  lift(nativeAddr: Address): Address {
    if (nativeAddr === this.nativeInvalid) {
      return INVALID_ADDRESS;
    }
    const segment = this.segments.find(
      (s) => nativeAddr >= s.nativeStart && nativeAddr < s.nativeStart + s.size
    );
    if (!segment) {
      return INVALID_ADDRESS;
    }
    return segment.canonicalStart + (nativeAddr - segment.nativeStart);
  }

  lower(canonicalAddr: Address): Address {
    if (canonicalAddr === INVALID_ADDRESS) {
      return this.nativeInvalid;
    }
    const segment = this.segments.find(
      (s) => canonicalAddr >= s.canonicalStart && canonicalAddr < s.canonicalStart + s.size
    );
    if (!segment) {
      throw new UnmappedAddressError(canonicalAddr, "not inside any segment");
    }
    return segment.nativeStart + (canonicalAddr - segment.canonicalStart);
  }
}
