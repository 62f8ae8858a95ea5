// packages/common/src/amount.ts
import { z } from "zod";
import { DonationError } from "./errors.js";

export const MAX_UINT256 = (1n << 256n) - 1n;

/** Amounts in smallest indivisible units. Strings must be plain decimal digits. */
export type AmountInput = bigint | number | string;

const AmountSchema = z
  .union([
    z.bigint(),
    z.number().refine(Number.isSafeInteger, "Must be a safe integer"),
    z.string().trim().regex(/^\d+$/, "Must be decimal digits"),
  ])
  .transform((v) => BigInt(v));

/**
 * Parse an unsigned amount. Zero is rejected unless `allowZero`.
 * Anything outside `[0, 2^256 - 1]` or not an integer fails with INVALID_AMOUNT.
 */
export function parseAmount(input: unknown, opts?: { allowZero?: boolean }): bigint {
  const r = AmountSchema.safeParse(input);
  if (!r.success) {
    throw new DonationError("INVALID_AMOUNT", `amount is not an unsigned integer: ${String(input)}`);
  }
  const v = r.data;
  if (v < 0n || v > MAX_UINT256) {
    throw new DonationError("INVALID_AMOUNT", `amount out of range: ${v}`);
  }
  if (v === 0n && opts?.allowZero !== true) {
    throw new DonationError("INVALID_AMOUNT", "amount must be greater than zero");
  }
  return v;
}
