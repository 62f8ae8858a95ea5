// packages/donation/src/ledger-store.ts
import type { Address } from "../../common/src/address.js";
import type { DonationRecord } from "./types.js";

/**
 * Persistence contract for DonationLedger.
 * - One record per donor (put overwrites).
 * - Roster is insertion-ordered and duplicate-free.
 */
export interface DonationLedgerStore {
  runInTransaction?<T>(fn: () => Promise<T>): Promise<T>;

  getRecord(donor: Address): Promise<DonationRecord | null>;
  putRecord(record: DonationRecord): Promise<void>;

  /** Appends when absent; returns true if the donor was added. */
  appendToRoster(donor: Address): Promise<boolean>;
  listRoster(): Promise<Address[]>;
}
