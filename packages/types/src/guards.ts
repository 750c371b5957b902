/**
 * Runtime Type Guards
 *
 * Narrowing functions for stream domain types.
 * Used at system boundaries (config, snapshots).
 */

import type { Address, SerializedStreamRecord } from "./stream.js";

// =============================================================================
// Primitive guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const UINT_PATTERN = /^\d+$/;
const INT_PATTERN = /^-?\d+$/;

/**
 * Shape check only (0x + 40 hex chars). Checksum validation happens
 * where addresses are normalised.
 */
export function isAddressLike(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/** A non-negative integer written as a plain decimal string. */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && UINT_PATTERN.test(value);
}

/** An integer, possibly negative, written as a plain decimal string. */
export function isIntString(value: unknown): value is string {
  return typeof value === "string" && INT_PATTERN.test(value);
}

// =============================================================================
// Stream guards
// =============================================================================

export function isSerializedStreamRecord(
  value: unknown,
): value is SerializedStreamRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddressLike(v.recipient) &&
    isUintString(v.cap) &&
    isIntString(v.last) &&
    isAddressLike(v.asset)
  );
}
