// packages/donation/src/orchestrator.ts
import type { Address } from "../../common/src/address.js";
import { parseAddress } from "../../common/src/address.js";
import type { AmountInput } from "../../common/src/amount.js";
import { parseAmount } from "../../common/src/amount.js";
import { DonationError } from "../../common/src/errors.js";
import type { Logger } from "../../common/src/logger.js";
import { silentLogger } from "../../common/src/logger.js";
import { SerialExecutor } from "../../common/src/serial.js";
import { donationSuffix, invoiceSuffix } from "../../registry/src/locator.js";
import type { TokenMinter, TokenRegistry } from "../../registry/src/token-registry.js";
import type { TokenId } from "../../registry/src/types.js";
import type { ProofData } from "../../proof/src/proof.js";
import type { ProofVerifier } from "../../proof/src/verifier.js";
import { guardVerifier } from "../../proof/src/verifier.js";
import type { CharityDescriptor } from "./charity.js";
import type {
  DonationEvent,
  DonationReceivedEvent,
  DonationVerifiedEvent,
  JournalEntry,
  JournalQuery,
  JournalVerifyReport,
} from "./journal.js";
import { toJournalInput, verifyJournalEntries } from "./journal.js";
import type { DonationLedger } from "./ledger.js";
import type { PaymentRail } from "./payment-rail.js";
import type { DonorState } from "./state-machine.js";
import { donorStateOf, transitionDonorState } from "./state-machine.js";
import type { DonationStore } from "./store.js";
import type { AllDonations } from "./types.js";

export type DonationEventListener = (event: DonationEvent) => void;

export type DonationOrchestratorDeps = {
  store: DonationStore;
  ledger: DonationLedger;
  registry: TokenRegistry;
  minter: TokenMinter;
  verifier: ProofVerifier;
  paymentRail: PaymentRail;
  charity: CharityDescriptor;
  /** Charity payout address on the payment rail. */
  payout: string;
};

export type DonationOrchestratorOptions = {
  now?: () => string;
  logger?: Logger;
  /** Reject verifyDonation for donors with no record (NO_PRIOR_DONATION). Off by default. */
  requirePriorDonation?: boolean;
  onEvent?: DonationEventListener;
};

export class DonationOrchestrator {
  private readonly serial = new SerialExecutor();
  private readonly listeners = new Set<DonationEventListener>();
  private readonly verifier: ProofVerifier;
  private readonly payout: Address;
  private readonly log: Logger;

  constructor(
    private readonly deps: DonationOrchestratorDeps,
    private readonly opts: DonationOrchestratorOptions = {}
  ) {
    this.log = opts.logger ?? silentLogger;
    this.verifier = guardVerifier(deps.verifier, this.log);
    this.payout = parseAddress(deps.payout, "payout");
    if (opts.onEvent) this.listeners.add(opts.onEvent);
  }

  private nowIso(): string {
    return (this.opts.now ?? (() => new Date().toISOString()))();
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: DonationEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: DonationEvent): void {
    for (const l of this.listeners) {
      try {
        l(event);
      } catch (e) {
        // the call already committed; a listener cannot undo it
        this.log.error("event listener failed", {
          type: event.type,
          error: e instanceof Error ? e.message : String(e),
        });
      }
    }
  }

  private async commit(event: DonationEvent): Promise<void> {
    await this.deps.store.appendJournalEntry(toJournalInput(event, this.nowIso()));
  }

  private async transfer(donor: Address, amount: bigint): Promise<void> {
    let ok: boolean;
    try {
      ok = (await this.deps.paymentRail.transferFrom(donor, this.payout, amount)) === true;
    } catch (e) {
      throw new DonationError("TRANSFER_FAILED", "payment rail raised an error", {
        cause: e,
        details: { donor, amount: amount.toString() },
      });
    }
    if (!ok) {
      throw new DonationError("TRANSFER_FAILED", "payment rail declined the transfer", {
        details: { donor, amount: amount.toString() },
      });
    }
  }

  /**
   * Pull `amount` from the donor, then record it and mint a donation token.
   * Transfer failure leaves ledger and registry untouched.
   */
  async donate(donor: string, amount: AmountInput): Promise<TokenId> {
    return this.serial.run(async () => {
      try {
        const who = parseAddress(donor, "donor");
        const value = parseAmount(amount);

        await this.transfer(who, value);

        const { event, before } = await this.deps.store.runInTransaction(async () => {
          const before = donorStateOf(await this.deps.ledger.getRecord(who));
          await this.deps.ledger.record(who, value);
          await this.deps.minter.recordDonation(who, value);
          const token_id = await this.deps.minter.mint(who, donationSuffix(value));

          const event: DonationReceivedEvent = { type: "DONATION_RECEIVED", donor: who, amount: value, token_id };
          await this.commit(event);
          return { event, before };
        });

        this.log.info("donation received", {
          donor: who,
          amount: value,
          token_id: event.token_id,
          state: `${before} -> ${transitionDonorState(before, "DONATE")}`,
        });
        this.emit(event);
        return event.token_id;
      } catch (e) {
        this.log.warn("donation rejected", { donor, error: e instanceof Error ? e.message : String(e) });
        throw e;
      }
    });
  }

  /**
   * Gate on the proof verifier, then mark the donation verified and mint an
   * invoice token. A rejected proof mutates nothing.
   */
  async verifyDonation(donor: string, proof: ProofData, invoiceId: string): Promise<TokenId> {
    return this.serial.run(async () => {
      try {
        // zero claimant is left to the verifier, which rejects it
        const who = parseAddress(donor, "donor", { allowZero: true });
        const accepted = await this.verifier.verify(proof, who);
        if (!accepted) {
          throw new DonationError("PROOF_VERIFICATION_FAILED", "proof was rejected by the verifier", {
            details: { donor: who, verifier: this.verifier.kind },
          });
        }

        const { event, before } = await this.deps.store.runInTransaction(async () => {
          const before = donorStateOf(await this.deps.ledger.getRecord(who));
          if (before === "NO_DONATION" && this.opts.requirePriorDonation === true) {
            throw new DonationError("NO_PRIOR_DONATION", "donor has no donation to verify", {
              details: { donor: who },
            });
          }

          await this.deps.ledger.markVerified(who, invoiceId);
          const token_id = await this.deps.minter.mint(who, invoiceSuffix(invoiceId));
          await this.deps.minter.bindInvoiceToken(who, token_id);

          const event: DonationVerifiedEvent = { type: "DONATION_VERIFIED", donor: who, invoice_id: invoiceId, token_id };
          await this.commit(event);
          return { event, before };
        });

        this.log.info("donation verified", {
          donor: who,
          invoice_id: invoiceId,
          token_id: event.token_id,
          state: `${before} -> ${transitionDonorState(before, "VERIFY")}`,
        });
        this.emit(event);
        return event.token_id;
      } catch (e) {
        this.log.warn("verification rejected", { donor, error: e instanceof Error ? e.message : String(e) });
        throw e;
      }
    });
  }

  async setBaseLocator(caller: string, newBase: string): Promise<void> {
    return this.serial.run(async () => {
      const event = await this.deps.store.runInTransaction(async () => {
        const previous = await this.deps.registry.setBaseLocator(caller, newBase);
        const event: DonationEvent = {
          type: "BASE_LOCATOR_UPDATED",
          by: parseAddress(caller, "caller"),
          previous,
          next: newBase,
        };
        await this.commit(event);
        return event;
      });
      this.emit(event);
    });
  }

  async transferAdministration(caller: string, next: string): Promise<void> {
    return this.serial.run(async () => {
      const event = await this.deps.store.runInTransaction(async () => {
        const previous = await this.deps.registry.transferAdministration(caller, next);
        const event: DonationEvent = {
          type: "ADMIN_TRANSFERRED",
          previous,
          next: parseAddress(next, "administrator"),
        };
        await this.commit(event);
        return event;
      });
      this.emit(event);
    });
  }

  // -------- reads --------
  // Store reads queue behind pending mutations so they never observe a half-applied call.

  async getAllDonations(): Promise<AllDonations> {
    return this.serial.run(() => this.deps.ledger.allDonations());
  }

  getCharityInfo(): CharityDescriptor {
    return { ...this.deps.charity };
  }

  async getDonations(donor: string): Promise<bigint> {
    return this.serial.run(() => this.deps.registry.getDonations(donor));
  }

  async getInvoiceToken(donor: string): Promise<TokenId | null> {
    return this.serial.run(() => this.deps.registry.getInvoiceToken(donor));
  }

  async totalSupply(): Promise<number> {
    return this.serial.run(() => this.deps.registry.totalSupply());
  }

  async getDonorState(donor: string): Promise<DonorState> {
    return this.serial.run(async () => donorStateOf(await this.deps.ledger.getRecord(donor)));
  }

  async listEvents(query: JournalQuery = {}): Promise<JournalEntry[]> {
    const donor = query.donor ? parseAddress(query.donor, "donor", { allowZero: true }) : null;
    return this.serial.run(() => this.deps.store.listJournalEntries({ ...query, donor }));
  }

  async verifyJournal(): Promise<JournalVerifyReport> {
    return this.serial.run(async () => verifyJournalEntries(await this.deps.store.listJournalEntries()));
  }

  payoutAddress(): Address {
    return this.payout;
  }
}
