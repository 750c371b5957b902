/**
 * Address normalisation.
 *
 * Recipients are keyed by their EIP-55 checksum form so that differently
 * cased spellings of one address hit the same record.
 */

import { getAddress, isAddress } from "viem";
import type { Address } from "@capstream/types";
import { StreamError } from "./errors.js";

export function normalizeAddress(value: string, label = "address"): Address {
  if (!isAddress(value, { strict: false })) {
    throw new StreamError("INVALID_ADDRESS", `Invalid ${label}: "${value}"`);
  }
  return getAddress(value);
}
