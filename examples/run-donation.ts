// examples/run-donation.ts
import { createLogger } from "../packages/common/src/logger.js";
import { loadConfig } from "../packages/donation/src/config.js";
import { InMemoryPaymentRail } from "../packages/donation/src/payment-rail.js";
import { createDonationService } from "../packages/donation/src/service.js";

function makeDeterministicNow(startIso = "2025-01-01T00:00:00.000Z") {
  let t = Date.parse(startIso);
  return () => {
    const iso = new Date(t).toISOString();
    t += 50;
    return iso;
  };
}

const ALICE = "0x00000000000000000000000000000000000a11ce";
const BOB = "0x0000000000000000000000000000000000000b0b";

async function main() {
  const config = loadConfig({
    DONATION_DB_PATH: process.env.DONATION_DB_PATH ?? ":memory:",
    DONATION_BASE_LOCATOR: "https://metadata.example.org/tokens/",
    DONATION_ADMIN: "0x00000000000000000000000000000000000ad000",
    DONATION_PAYOUT: "0x00000000000000000000000000000000000c4a01",
    DONATION_LOG_LEVEL: "info",
  });

  const rail = new InMemoryPaymentRail();
  rail.credit(ALICE, 10_000n);
  rail.credit(BOB, 500n);
  rail.approve(ALICE, 10_000n);
  rail.approve(BOB, 100n);

  const service = await createDonationService(config, {
    paymentRail: rail,
    now: makeDeterministicNow(),
    logger: createLogger("demo", config.logLevel),
  });
  const { orchestrator, registry } = service;

  try {
    const t0 = await orchestrator.donate(ALICE, 1000n);
    const t1 = await orchestrator.donate(ALICE, 2000n);
    const t2 = await orchestrator.verifyDonation(ALICE, "0x01ab", "INV-2025-0001");

    // Bob only authorized 100
    await orchestrator.donate(BOB, 250n).catch((e: unknown) => {
      console.log("bob rejected:", e instanceof Error ? e.message : String(e));
    });

    for (const id of [t0, t1, t2]) {
      console.log(`token ${id}:`, await registry.locatorOf(id));
    }

    const all = await orchestrator.getAllDonations();
    console.log("donors:", all.donors);
    console.log("latest amounts:", all.amounts.map(String));
    console.log("alice cumulative:", String(await orchestrator.getDonations(ALICE)));
    console.log("alice invoice token:", await orchestrator.getInvoiceToken(ALICE));
    console.log("payout balance:", String(rail.balanceOf(config.payout)));
    console.log("journal:", JSON.stringify(await orchestrator.verifyJournal(), null, 2));
  } finally {
    service.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
