// packages/donation/src/in-memory-store.ts
import type { Address } from "../../common/src/address.js";
import { InMemoryRegistryStore } from "../../registry/src/in-memory-registry-store.js";
import type { AppendJournalEntryInput, JournalEntry, JournalQuery } from "./journal.js";
import { chainJournalEntry } from "./journal.js";
import type { DonationStore } from "./store.js";
import type { DonationRecord } from "./types.js";

type LedgerState = {
  records: Map<Address, DonationRecord>;
  roster: Address[];
  journal: JournalEntry[];
};

function clone<T>(x: T): T {
  return structuredClone(x);
}

export class InMemoryDonationStore extends InMemoryRegistryStore implements DonationStore {
  private ledger: LedgerState = { records: new Map(), roster: [], journal: [] };

  protected override checkpoint(): () => void {
    const restoreRegistry = super.checkpoint();
    const saved = clone(this.ledger);
    return () => {
      restoreRegistry();
      this.ledger = saved;
    };
  }

  async getRecord(donor: Address): Promise<DonationRecord | null> {
    const r = this.ledger.records.get(donor);
    return r ? { ...r } : null;
  }

  async putRecord(record: DonationRecord): Promise<void> {
    this.ledger.records.set(record.donor, { ...record });
  }

  async appendToRoster(donor: Address): Promise<boolean> {
    // linear scan keeps insertion order without a second index
    if (this.ledger.roster.includes(donor)) return false;
    this.ledger.roster.push(donor);
    return true;
  }

  async listRoster(): Promise<Address[]> {
    return [...this.ledger.roster];
  }

  async appendJournalEntry(input: AppendJournalEntryInput): Promise<JournalEntry> {
    const head = this.ledger.journal.length ? this.ledger.journal[this.ledger.journal.length - 1] : null;
    const entry = chainJournalEntry(head ?? null, clone(input));
    this.ledger.journal.push(entry);
    return clone(entry);
  }

  async listJournalEntries(query: JournalQuery = {}): Promise<JournalEntry[]> {
    const limit = Math.max(1, Math.floor(query.limit ?? 1_000_000));
    const rows = query.donor
      ? this.ledger.journal.filter((e) => e.donor === query.donor)
      : this.ledger.journal;
    return clone(rows.slice(0, limit));
  }
}
