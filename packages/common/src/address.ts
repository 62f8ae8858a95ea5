// packages/common/src/address.ts
import { z } from "zod";
import { DonationError } from "./errors.js";

/** Lower-cased `0x` + 40 hex digits. */
export type Address = string;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export const AddressSchema = z
  .string()
  .trim()
  .regex(/^0x[0-9a-fA-F]{40}$/, "Expected 0x followed by 40 hex digits")
  .transform((v) => v.toLowerCase());

export function isZeroAddress(a: Address): boolean {
  return a === ZERO_ADDRESS;
}

export function tryParseAddress(input: unknown): Address | null {
  const r = AddressSchema.safeParse(input);
  return r.success ? r.data : null;
}

/**
 * Parse + normalize. The zero address is rejected unless `allowZero` is set.
 */
export function parseAddress(input: unknown, label = "address", opts?: { allowZero?: boolean }): Address {
  const a = tryParseAddress(input);
  if (a === null) {
    throw new DonationError("INVALID_ADDRESS", `${label} is not a valid address: ${String(input)}`);
  }
  if (isZeroAddress(a) && opts?.allowZero !== true) {
    throw new DonationError("INVALID_ADDRESS", `${label} must not be the zero address`);
  }
  return a;
}
