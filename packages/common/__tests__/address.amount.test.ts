import { describe, it, expect } from "vitest";
import { parseAddress, tryParseAddress, ZERO_ADDRESS } from "../src/address.js";
import { MAX_UINT256, parseAmount } from "../src/amount.js";
import { DonationError, isDonationError } from "../src/errors.js";

describe("address parsing", () => {
  it("normalizes to lower case", () => {
    expect(parseAddress("0x00000000000000000000000000000000000AD000")).toBe(
      "0x00000000000000000000000000000000000ad000"
    );
  });

  it("rejects malformed input with INVALID_ADDRESS", () => {
    expect(tryParseAddress("0x1234")).toBeNull();
    expect(() => parseAddress("alice", "donor")).toThrow("INVALID_ADDRESS: donor is not a valid address: alice");
  });

  it("rejects the zero address unless allowed", () => {
    expect(() => parseAddress(ZERO_ADDRESS, "owner")).toThrow("INVALID_ADDRESS: owner must not be the zero address");
    expect(parseAddress(ZERO_ADDRESS, "owner", { allowZero: true })).toBe(ZERO_ADDRESS);
  });
});

describe("amount parsing", () => {
  it("accepts bigint, safe integers and decimal strings", () => {
    expect(parseAmount(5n)).toBe(5n);
    expect(parseAmount(42)).toBe(42n);
    expect(parseAmount("5000000000000000000")).toBe(5000000000000000000n);
  });

  it("rejects zero unless allowed", () => {
    expect(() => parseAmount(0n)).toThrow("INVALID_AMOUNT: amount must be greater than zero");
    expect(parseAmount(0, { allowZero: true })).toBe(0n);
  });

  it("rejects negatives, fractions and values above 2^256 - 1", () => {
    for (const bad of [-1n, -3, 1.5, "1e3", "-7", "", "0x10"]) {
      expect(() => parseAmount(bad)).toThrow(DonationError);
    }
    expect(parseAmount(MAX_UINT256)).toBe(MAX_UINT256);
    expect(() => parseAmount(MAX_UINT256 + 1n)).toThrow(/^INVALID_AMOUNT: amount out of range/);
  });

  it("carries the code on the error", () => {
    try {
      parseAmount("nope");
      throw new Error("expected parseAmount to throw");
    } catch (e) {
      expect(isDonationError(e, "INVALID_AMOUNT")).toBe(true);
      expect(isDonationError(e, "TRANSFER_FAILED")).toBe(false);
    }
  });
});
