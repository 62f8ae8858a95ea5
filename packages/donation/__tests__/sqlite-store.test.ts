// packages/donation/__tests__/sqlite-store.test.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";

import { silentLogger } from "../../common/src/logger.js";
import { InMemoryPaymentRail } from "../src/payment-rail.js";
import { createDonationService } from "../src/service.js";
import { SqliteDonationStore } from "../src/sqlite-store.js";
import { ADMIN, ALICE, CHARITY, fixedClock, fund, testConfig } from "./_helpers/harness.js";

const dirs: string[] = [];

function tempDbPath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "donation-ledger-"));
  dirs.push(dir);
  return path.join(dir, "ledger.sqlite");
}

afterEach(() => {
  for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

describe("SqliteDonationStore", () => {
  test("rolls back every table on a failed transaction", async () => {
    const store = new SqliteDonationStore(":memory:");

    await expect(
      store.runInTransaction(async () => {
        await store.putRecord({ donor: ALICE, amount: 5n, verified: false, invoice_id: null });
        await store.appendToRoster(ALICE);
        await store.putCumulativeTotal(ALICE, 5n);
        await store.insertToken({ token_id: 0, owner: ALICE, suffix: ".json", minted_at: "t" });
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(await store.getRecord(ALICE)).toBeNull();
    expect(await store.listRoster()).toEqual([]);
    expect(await store.getCumulativeTotal(ALICE)).toBe(0n);
    expect(await store.countTokens()).toBe(0);
    store.close();
  });

  test("stores amounts wider than 64 bits as exact decimals", async () => {
    const store = new SqliteDonationStore(":memory:");
    const big = (1n << 256n) - 1n;

    await store.putCumulativeTotal(ALICE, big);
    await store.putRecord({ donor: ALICE, amount: big, verified: true, invoice_id: "INV-1" });

    expect(await store.getCumulativeTotal(ALICE)).toBe(big);
    expect((await store.getRecord(ALICE))?.amount).toBe(big);
    store.close();
  });

  test("appendToRoster reports whether the donor was new", async () => {
    const store = new SqliteDonationStore(":memory:");

    expect(await store.appendToRoster(ALICE)).toBe(true);
    expect(await store.appendToRoster(ALICE)).toBe(false);
    store.close();
  });

  test("state survives reopening the database file", async () => {
    const file = tempDbPath();
    const rail = new InMemoryPaymentRail();
    fund(rail, ALICE, 30n);

    const first = await createDonationService(testConfig({ dbPath: file }), {
      paymentRail: rail,
      charity: CHARITY,
      logger: silentLogger,
      now: fixedClock(),
    });
    await first.orchestrator.donate(ALICE, 10n);
    await first.orchestrator.setBaseLocator(ADMIN, "ipfs://cid/");
    first.close();

    // settings from the first open win over the new config
    const second = await createDonationService(testConfig({ dbPath: file, baseLocator: "https://other/" }), {
      paymentRail: rail,
      charity: CHARITY,
      logger: silentLogger,
      now: fixedClock(),
    });
    expect(await second.registry.locatorOf(0)).toBe("ipfs://cid/0.json?donation=10");
    expect(await second.orchestrator.donate(ALICE, 20n)).toBe(1);
    expect(await second.orchestrator.getDonations(ALICE)).toBe(30n);
    expect((await second.orchestrator.verifyJournal()).total).toBe(3);
    second.close();
  });
});
