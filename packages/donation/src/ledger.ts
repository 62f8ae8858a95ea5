// packages/donation/src/ledger.ts
import type { Address } from "../../common/src/address.js";
import { parseAddress } from "../../common/src/address.js";
import { parseAmount } from "../../common/src/amount.js";
import type { AmountInput } from "../../common/src/amount.js";
import { transactionRunner } from "../../common/src/transaction.js";
import type { DonationLedgerStore } from "./ledger-store.js";
import type { AllDonations, DonationRecord } from "./types.js";

export class DonationLedger {
  constructor(private readonly store: DonationLedgerStore) {}

  /**
   * Overwrites the donor's record with a fresh, unverified one and adds the
   * donor to the roster on first donation.
   */
  async record(donor: string, amount: AmountInput): Promise<DonationRecord> {
    const who = parseAddress(donor, "donor");
    const value = parseAmount(amount);

    return transactionRunner(this.store)(async () => {
      const rec: DonationRecord = { donor: who, amount: value, verified: false, invoice_id: null };
      await this.store.putRecord(rec);
      await this.store.appendToRoster(who);
      return rec;
    });
  }

  /**
   * Without a prior record this writes a zero-amount verified record and
   * leaves the roster untouched.
   */
  async markVerified(donor: string, invoiceId: string): Promise<DonationRecord> {
    const who = parseAddress(donor, "donor");

    return transactionRunner(this.store)(async () => {
      const cur = await this.store.getRecord(who);
      const rec: DonationRecord = {
        donor: who,
        amount: cur?.amount ?? 0n,
        verified: true,
        invoice_id: invoiceId,
      };
      await this.store.putRecord(rec);
      return rec;
    });
  }

  async getRecord(donor: string): Promise<DonationRecord | null> {
    return this.store.getRecord(parseAddress(donor, "donor", { allowZero: true }));
  }

  async roster(): Promise<Address[]> {
    return this.store.listRoster();
  }

  async allDonations(): Promise<AllDonations> {
    const donors = await this.store.listRoster();
    const out: AllDonations = { donors: [], amounts: [], verified: [] };

    for (const d of donors) {
      const rec = await this.store.getRecord(d);
      out.donors.push(d);
      out.amounts.push(rec?.amount ?? 0n);
      out.verified.push(rec?.verified ?? false);
    }
    return out;
  }
}
