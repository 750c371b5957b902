/**
 * Checked uint256 arithmetic.
 *
 * All amounts and timestamps are bigint. bigint never wraps, so the
 * checks here enforce the uint256 domain explicitly: every operand and
 * every result must lie in [0, 2^256 - 1], otherwise ARITHMETIC_OVERFLOW.
 *
 * Products are formed at full width before division, so `cap * elapsed`
 * is exact for any cap the domain admits.
 */

import { StreamError } from "./errors.js";

export const MAX_UINT256 = (1n << 256n) - 1n;

const UINT_PATTERN = /^\d+$/;
const INT_PATTERN = /^-?\d+$/;

/**
 * Assert a value lies in the uint256 domain and return it.
 */
export function toUint256(value: bigint, label = "value"): bigint {
  if (value < 0n || value > MAX_UINT256) {
    throw new StreamError(
      "ARITHMETIC_OVERFLOW",
      `${label} ${value.toString()} is outside the uint256 range`,
    );
  }
  return value;
}

/**
 * Parse a plain decimal string ("1000000000000000000") into a uint256.
 * Signs, decimal points, exponents and whitespace are rejected.
 */
export function parseUint(value: string, label = "value"): bigint {
  if (!UINT_PATTERN.test(value)) {
    throw new StreamError(
      "INVALID_AMOUNT",
      `${label} must be a non-negative integer string, got "${value}"`,
    );
  }
  return toUint256(BigInt(value), label);
}

/**
 * Parse a checkpoint timestamp. Checkpoints sit one period behind the
 * creation time, so they go negative for streams created before
 * STREAM_PERIOD.
 */
export function parseTimestamp(value: string, label = "timestamp"): bigint {
  if (!INT_PATTERN.test(value)) {
    throw new StreamError("INVALID_AMOUNT", `${label} must be an integer string, got "${value}"`);
  }
  const parsed = BigInt(value);
  toUint256(parsed < 0n ? -parsed : parsed, label);
  return parsed;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return toUint256(toUint256(a, "addend") + toUint256(b, "addend"), "sum");
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return toUint256(toUint256(a, "minuend") - toUint256(b, "subtrahend"), "difference");
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return toUint256(toUint256(a, "factor") * toUint256(b, "factor"), "product");
}

/**
 * floor(a * b / denominator) with a full-width intermediate product.
 * The result must fit uint256; the product itself may exceed it.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  assertDenominator(denominator);
  return toUint256(
    (toUint256(a, "factor") * toUint256(b, "factor")) / denominator,
    "quotient",
  );
}

/**
 * ceil(a * b / denominator) with a full-width intermediate product.
 */
export function mulDivUp(a: bigint, b: bigint, denominator: bigint): bigint {
  assertDenominator(denominator);
  const product = toUint256(a, "factor") * toUint256(b, "factor");
  return toUint256((product + denominator - 1n) / denominator, "quotient");
}

export function minUint(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

function assertDenominator(denominator: bigint): void {
  if (denominator <= 0n) {
    throw new StreamError("ARITHMETIC_OVERFLOW", "Division by zero");
  }
  toUint256(denominator, "denominator");
}
