// packages/donation/src/store.ts
import type { RegistryStore } from "../../registry/src/registry-store.js";
import type { DonationJournalStore } from "./journal.js";
import type { DonationLedgerStore } from "./ledger-store.js";

/**
 * Everything one donation touches lives behind one store so that
 * ledger record, token mint and journal entry commit or roll back together.
 */
export interface DonationStore extends RegistryStore, DonationLedgerStore, DonationJournalStore {
  runInTransaction<T>(fn: () => Promise<T>): Promise<T>;
  close?(): void;
}
