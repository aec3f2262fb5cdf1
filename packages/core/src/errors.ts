/**
 * Error hierarchy for ArtiSync.
 *
 * Most failures inside a sync pass are reported as values (null results,
 * `false` from setters). The classes here cover the conditions that are
 * surfaced to the caller instead: unmapped addresses, invalid ranges,
 * broken adapter preconditions and bad configuration.
 */

/**
 * Stable codes for programmatic handling.
 */
export enum ErrorCode {
  UNKNOWN = "UNKNOWN",
  UNMAPPED_ADDRESS = "UNMAPPED_ADDRESS",
  INVALID_RANGE = "INVALID_RANGE",
  PATCH_ENUMERATION = "PATCH_ENUMERATION",
  CONFIGURATION = "CONFIGURATION",
  BACKEND = "BACKEND",
}

/**
 * Base class for every error raised by ArtiSync packages.
 */
export class ArtisyncError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArtisyncError";
    this.code = code;
  }
}

/**
 * A canonical address has no counterpart in the backend's native space.
 */
export class UnmappedAddressError extends ArtisyncError {
  readonly address: bigint;

  constructor(address: bigint, detail?: string) {
    super(
      `Address 0x${address.toString(16)} has no native mapping${detail ? ` (${detail})` : ""}`,
      ErrorCode.UNMAPPED_ADDRESS
    );
    this.name = "UnmappedAddressError";
    this.address = address;
  }
}

export class InvalidRangeError extends ArtisyncError {
  constructor(minAddr: bigint, maxAddr: bigint) {
    super(
      `Invalid address range [0x${minAddr.toString(16)}, 0x${maxAddr.toString(16)})`,
      ErrorCode.INVALID_RANGE
    );
    this.name = "InvalidRangeError";
  }
}

/**
 * The patched-byte enumeration broke its ordering or range guarantee.
 */
export class PatchEnumerationError extends ArtisyncError {
  constructor(message: string) {
    super(message, ErrorCode.PATCH_ENUMERATION);
    this.name = "PatchEnumerationError";
  }
}

export class ConfigurationError extends ArtisyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.CONFIGURATION, options);
    this.name = "ConfigurationError";
  }
}

/**
 * A backend returned something that violates the adapter contract.
 */
export class BackendError extends ArtisyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.BACKEND, options);
    this.name = "BackendError";
  }
}

export function isArtisyncError(error: unknown): error is ArtisyncError {
  return error instanceof ArtisyncError;
}

/**
 * Render an unknown thrown value for log lines and run summaries.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
