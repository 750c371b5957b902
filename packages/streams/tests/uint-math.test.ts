/**
 * Tests for checked uint256 arithmetic.
 */

import { describe, it, expect } from "vitest";
import {
  MAX_UINT256,
  checkedAdd,
  checkedMul,
  checkedSub,
  minUint,
  mulDiv,
  mulDivUp,
  parseUint,
  toUint256,
} from "../src/uint-math.js";
import { codeOf } from "./helpers.js";

describe("toUint256", () => {
  it("accepts the range bounds", () => {
    expect(toUint256(0n)).toBe(0n);
    expect(toUint256(MAX_UINT256)).toBe(MAX_UINT256);
  });

  it("rejects values outside the range", () => {
    expect(codeOf(() => toUint256(-1n))).toBe("ARITHMETIC_OVERFLOW");
    expect(codeOf(() => toUint256(MAX_UINT256 + 1n))).toBe("ARITHMETIC_OVERFLOW");
  });
});

describe("parseUint", () => {
  it("parses plain decimal strings", () => {
    expect(parseUint("0")).toBe(0n);
    expect(parseUint("1000000000000000000")).toBe(10n ** 18n);
  });

  it.each(["", "-1", "1.5", "1e18", " 1", "0x10", "abc"])(
    "rejects %j",
    (input) => {
      expect(codeOf(() => parseUint(input))).toBe("INVALID_AMOUNT");
    },
  );

  it("rejects values beyond uint256", () => {
    expect(codeOf(() => parseUint((MAX_UINT256 + 1n).toString()))).toBe(
      "ARITHMETIC_OVERFLOW",
    );
  });
});

describe("checked operations", () => {
  it("adds, subtracts and multiplies within range", () => {
    expect(checkedAdd(2n, 3n)).toBe(5n);
    expect(checkedSub(5n, 3n)).toBe(2n);
    expect(checkedMul(4n, 3n)).toBe(12n);
  });

  it("fails instead of wrapping", () => {
    expect(codeOf(() => checkedAdd(MAX_UINT256, 1n))).toBe("ARITHMETIC_OVERFLOW");
    expect(codeOf(() => checkedSub(1n, 2n))).toBe("ARITHMETIC_OVERFLOW");
    expect(codeOf(() => checkedMul(2n ** 200n, 2n ** 100n))).toBe("ARITHMETIC_OVERFLOW");
  });
});

describe("mulDiv / mulDivUp", () => {
  it("rounds down and up", () => {
    expect(mulDiv(7n, 3n, 2n)).toBe(10n);
    expect(mulDivUp(7n, 3n, 2n)).toBe(11n);
  });

  it("does not round up exact quotients", () => {
    expect(mulDivUp(6n, 2n, 3n)).toBe(4n);
  });

  it("keeps a product wider than uint256 exact", () => {
    expect(mulDiv(MAX_UINT256, 2n, 2n)).toBe(MAX_UINT256);
  });

  it("rejects a zero denominator", () => {
    expect(codeOf(() => mulDiv(1n, 1n, 0n))).toBe("ARITHMETIC_OVERFLOW");
    expect(codeOf(() => mulDivUp(1n, 1n, 0n))).toBe("ARITHMETIC_OVERFLOW");
  });
});

describe("minUint", () => {
  it("returns the smaller operand", () => {
    expect(minUint(3n, 9n)).toBe(3n);
    expect(minUint(9n, 3n)).toBe(3n);
  });
});
