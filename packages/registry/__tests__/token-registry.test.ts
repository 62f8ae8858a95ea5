import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryRegistryStore } from "../src/in-memory-registry-store.js";
import { createTokenRegistry, loadTokenRegistry } from "../src/token-registry.js";
import type { TokenMinter, TokenRegistry } from "../src/token-registry.js";
import { donationSuffix, invoiceSuffix } from "../src/locator.js";

const ADMIN = "0x00000000000000000000000000000000000ad000";
const ALICE = "0x00000000000000000000000000000000000a11ce";
const BOB = "0x0000000000000000000000000000000000000b0b";
const ZERO = "0x0000000000000000000000000000000000000000";

const now = () => "2026-01-19T00:00:00.000Z";

describe("TokenRegistry", () => {
  let store: InMemoryRegistryStore;
  let registry: TokenRegistry;
  let minter: TokenMinter;

  beforeEach(async () => {
    store = new InMemoryRegistryStore();
    ({ registry, minter } = await createTokenRegistry(store, {
      administrator: ADMIN,
      baseLocator: "https://x/",
      now,
    }));
  });

  it("allocates dense, zero-based, strictly increasing ids", async () => {
    const ids: number[] = [];
    for (let i = 0; i < 5; i++) ids.push(await minter.mint(i % 2 ? BOB : ALICE, ".json"));

    expect(ids).toEqual([0, 1, 2, 3, 4]);
    expect(await registry.totalSupply()).toBe(5);
  });

  it("composes the donation locator from base, id and suffix", async () => {
    const id = await minter.mint(ALICE, donationSuffix(5000000000000000000n));

    expect(id).toBe(0);
    expect(await registry.locatorOf(0)).toBe("https://x/0.json?donation=5000000000000000000");
    expect(await registry.ownerOf(0)).toBe(ALICE);
    expect(await registry.tokenOf(0)).toEqual({
      id: 0,
      owner: ALICE,
      metadata_locator: "https://x/0.json?donation=5000000000000000000",
    });
  });

  it("re-derives locators after the base changes", async () => {
    await minter.mint(ALICE, donationSuffix(7n));
    await minter.mint(BOB, invoiceSuffix("INV-1"));

    const previous = await registry.setBaseLocator(ADMIN, "ipfs://cid/");

    expect(previous).toBe("https://x/");
    expect(await registry.locatorOf(0)).toBe("ipfs://cid/0.json?donation=7");
    expect(await registry.locatorOf(1)).toBe("ipfs://cid/1.json?invoiceId=INV-1");
  });

  it("restricts setBaseLocator to the administrator", async () => {
    await expect(registry.setBaseLocator(ALICE, "https://evil/")).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    expect(await registry.baseLocator()).toBe("https://x/");

    // address comparison is case-insensitive
    await registry.setBaseLocator("0x00000000000000000000000000000000000AD000", "https://y/");
    expect(await registry.baseLocator()).toBe("https://y/");
  });

  it("moves administrator rights on transfer", async () => {
    expect(await registry.transferAdministration(ADMIN, BOB)).toBe(ADMIN);
    expect(await registry.administrator()).toBe(BOB);

    await expect(registry.setBaseLocator(ADMIN, "https://old/")).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    await expect(registry.transferAdministration(BOB, ZERO)).rejects.toMatchObject({ code: "INVALID_ADDRESS" });
  });

  it("fails lookups of unminted ids with TOKEN_NOT_FOUND", async () => {
    await expect(registry.locatorOf(0)).rejects.toThrow("TOKEN_NOT_FOUND: no token with id 0");

    await minter.mint(ALICE, ".json");

    await expect(registry.ownerOf(1)).rejects.toMatchObject({ code: "TOKEN_NOT_FOUND" });
    await expect(registry.ownerOf(-1)).rejects.toMatchObject({ code: "TOKEN_NOT_FOUND" });
    await expect(registry.locatorOf(0.5)).rejects.toMatchObject({ code: "TOKEN_NOT_FOUND" });
  });

  it("refuses to mint to the zero address and leaves the counter alone", async () => {
    await expect(minter.mint(ZERO, ".json")).rejects.toMatchObject({ code: "INVALID_ADDRESS" });
    expect(await registry.totalSupply()).toBe(0);
    expect(await minter.mint(ALICE, ".json")).toBe(0);
  });

  it("accumulates donation totals per donor", async () => {
    expect(await registry.getDonations(ALICE)).toBe(0n);

    expect(await minter.recordDonation(ALICE, 1n)).toBe(1n);
    expect(await minter.recordDonation(ALICE, 2n)).toBe(3n);
    await minter.recordDonation(BOB, 10n);

    expect(await registry.getDonations(ALICE)).toBe(3n);
    expect(await registry.getDonations(BOB)).toBe(10n);
    await expect(minter.recordDonation(ALICE, 0n)).rejects.toMatchObject({ code: "INVALID_AMOUNT" });
    expect(await registry.getDonations(ALICE)).toBe(3n);
  });

  it("keeps one invoice slot per donor, overwritten by later invoices", async () => {
    expect(await registry.getInvoiceToken(ALICE)).toBeNull();

    const first = await minter.mint(ALICE, invoiceSuffix("INV-1"));
    await minter.bindInvoiceToken(ALICE, first);
    const second = await minter.mint(ALICE, invoiceSuffix("INV-2"));
    await minter.bindInvoiceToken(ALICE, second);

    expect(await registry.getInvoiceToken(ALICE)).toBe(1);
    // the earlier invoice token still exists
    expect(await registry.locatorOf(first)).toBe("https://x/0.json?invoiceId=INV-1");
    await expect(minter.bindInvoiceToken(ALICE, 9)).rejects.toMatchObject({ code: "TOKEN_NOT_FOUND" });
  });

  it("reports balances and owned ids", async () => {
    await minter.mint(ALICE, ".json");
    await minter.mint(BOB, ".json");
    await minter.mint(ALICE, ".json");

    expect(await registry.balanceOf(ALICE)).toBe(2);
    expect(await registry.tokensOfOwner(ALICE)).toEqual([0, 2]);
    expect(await registry.balanceOf(ZERO)).toBe(0);
  });

  it("keeps existing settings when created again over the same store", async () => {
    await registry.setBaseLocator(ADMIN, "https://kept/");
    const again = await createTokenRegistry(store, { administrator: BOB, baseLocator: "https://ignored/" });

    expect(await again.registry.baseLocator()).toBe("https://kept/");
    expect(await again.registry.administrator()).toBe(ADMIN);
  });

  it("rolls back mints made inside a failed transaction", async () => {
    await minter.mint(ALICE, ".json");

    await expect(
      store.runInTransaction(async () => {
        await minter.mint(BOB, ".json");
        await minter.recordDonation(BOB, 5n);
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(await registry.totalSupply()).toBe(1);
    expect(await registry.getDonations(BOB)).toBe(0n);
    expect(await minter.mint(BOB, ".json")).toBe(1);
  });
});

describe("loadTokenRegistry", () => {
  it("requires an initialized store", async () => {
    await expect(loadTokenRegistry(new InMemoryRegistryStore())).rejects.toMatchObject({ code: "INVALID_CONFIG" });
  });

  it("opens a read surface without a minter", async () => {
    const store = new InMemoryRegistryStore();
    const { minter } = await createTokenRegistry(store, { administrator: ADMIN, baseLocator: "b/" });
    await minter.mint(ALICE, "-a");

    const reader = await loadTokenRegistry(store);
    expect(await reader.locatorOf(0)).toBe("b/0-a");
    expect("mint" in reader).toBe(false);
  });
});
