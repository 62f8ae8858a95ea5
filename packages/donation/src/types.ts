// packages/donation/src/types.ts
import type { Address } from "../../common/src/address.js";

/**
 * Latest donation per donor. A later donation overwrites it;
 * the registry keeps the running total separately.
 */
export type DonationRecord = {
  donor: Address;
  amount: bigint;
  verified: boolean;
  invoice_id: string | null;
};

/** Parallel arrays in roster order. */
export type AllDonations = {
  donors: Address[];
  amounts: bigint[];
  verified: boolean[];
};
