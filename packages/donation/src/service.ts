// packages/donation/src/service.ts
import { createLogger } from "../../common/src/logger.js";
import type { Logger } from "../../common/src/logger.js";
import { createTokenRegistry } from "../../registry/src/token-registry.js";
import type { TokenRegistry } from "../../registry/src/token-registry.js";
import type { ProofVerifier } from "../../proof/src/verifier.js";
import { MockProofVerifier } from "../../proof/src/verifier.js";
import type { CharityDescriptor } from "./charity.js";
import { loadCharityDescriptor } from "./charity.js";
import type { DonationConfig } from "./config.js";
import { InMemoryDonationStore } from "./in-memory-store.js";
import { DonationLedger } from "./ledger.js";
import type { DonationEventListener } from "./orchestrator.js";
import { DonationOrchestrator } from "./orchestrator.js";
import type { PaymentRail } from "./payment-rail.js";
import { SqliteDonationStore } from "./sqlite-store.js";
import type { DonationStore } from "./store.js";

export type DonationService = {
  orchestrator: DonationOrchestrator;
  registry: TokenRegistry;
  ledger: DonationLedger;
  store: DonationStore;
  logger: Logger;
  close(): void;
};

export type DonationServiceDeps = {
  paymentRail: PaymentRail;
  /** Defaults to MockProofVerifier. */
  verifier?: ProofVerifier;
  /** Defaults to the descriptor at `config.charityFile`. */
  charity?: CharityDescriptor;
  store?: DonationStore;
  logger?: Logger;
  now?: () => string;
  onEvent?: DonationEventListener;
};

export function openDonationStore(dbPath: string): DonationStore {
  return dbPath === "memory" ? new InMemoryDonationStore() : new SqliteDonationStore(dbPath);
}

export async function createDonationService(
  config: DonationConfig,
  deps: DonationServiceDeps
): Promise<DonationService> {
  const logger = deps.logger ?? createLogger("donation", config.logLevel);
  const store = deps.store ?? openDonationStore(config.dbPath);
  const charity = deps.charity ?? loadCharityDescriptor(config.charityFile);

  const { registry, minter } = await createTokenRegistry(store, {
    administrator: config.administrator,
    baseLocator: config.baseLocator,
    now: deps.now,
    logger: logger.child("registry"),
  });
  const ledger = new DonationLedger(store);

  const orchestrator = new DonationOrchestrator(
    {
      store,
      ledger,
      registry,
      minter,
      verifier: deps.verifier ?? new MockProofVerifier(),
      paymentRail: deps.paymentRail,
      charity,
      payout: config.payout,
    },
    {
      now: deps.now,
      logger,
      requirePriorDonation: config.requirePriorDonation,
      onEvent: deps.onEvent,
    }
  );

  logger.debug("donation service ready", { db: config.dbPath, charity: charity.name });

  return {
    orchestrator,
    registry,
    ledger,
    store,
    logger,
    close: () => store.close?.(),
  };
}
