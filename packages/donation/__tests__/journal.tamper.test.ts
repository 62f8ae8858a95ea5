// packages/donation/__tests__/journal.tamper.test.ts
import { describe, expect, test } from "vitest";

import { InMemoryDonationStore } from "../src/in-memory-store.js";
import { toJournalInput, verifyJournalEntries } from "../src/journal.js";
import type { JournalEntry } from "../src/journal.js";
import { ALICE, BOB } from "./_helpers/harness.js";

const AT = "2026-01-01T00:00:00.000Z";

async function threeEntries(): Promise<JournalEntry[]> {
  const store = new InMemoryDonationStore();
  await store.appendJournalEntry(toJournalInput({ type: "DONATION_RECEIVED", donor: ALICE, amount: 5n, token_id: 0 }, AT));
  await store.appendJournalEntry(toJournalInput({ type: "DONATION_RECEIVED", donor: BOB, amount: 7n, token_id: 1 }, AT));
  await store.appendJournalEntry(
    toJournalInput({ type: "DONATION_VERIFIED", donor: ALICE, invoice_id: "INV-1", token_id: 2 }, AT)
  );
  return store.listJournalEntries();
}

describe("journal hash chain", () => {
  test("maps events to JSON-safe payloads", () => {
    expect(toJournalInput({ type: "DONATION_RECEIVED", donor: ALICE, amount: 10n ** 30n, token_id: 4 }, AT)).toEqual({
      at: AT,
      type: "DONATION_RECEIVED",
      donor: ALICE,
      token_id: 4,
      payload: { donor: ALICE, amount: "1000000000000000000000000000000", token_id: 4 },
    });
    expect(toJournalInput({ type: "ADMIN_TRANSFERRED", previous: ALICE, next: BOB }, AT)).toEqual({
      at: AT,
      type: "ADMIN_TRANSFERRED",
      donor: null,
      token_id: null,
      payload: { previous: ALICE, next: BOB },
    });
  });

  test("an untouched chain verifies", async () => {
    const entries = await threeEntries();
    const report = verifyJournalEntries(entries);

    expect(report).toEqual({
      journal_verified: true,
      journal_errors: [],
      total: 3,
      head_hash: entries[2]?.hash,
    });
  });

  test("an edited payload breaks its own entry and the link after it", async () => {
    const entries = await threeEntries();
    const tampered = entries.map((e) => (e.seq === 2 ? { ...e, payload: { ...e.payload, amount: "700" } } : e));

    const report = verifyJournalEntries(tampered);

    expect(report.journal_verified).toBe(false);
    expect(report.journal_errors.map((e) => e.seq)).toEqual([2, 3]);
    expect(report.journal_errors[0]?.stored_hash).toBe(entries[1]?.hash);
  });

  test("a dropped entry is reported as a sequence gap", async () => {
    const entries = await threeEntries();
    const report = verifyJournalEntries([entries[0], entries[2]].flatMap((e) => (e ? [e] : [])));

    expect(report.journal_verified).toBe(false);
    expect(report.journal_errors).toHaveLength(1);
    expect(report.journal_errors[0]).toMatchObject({ seq: 3, expected_seq: 2 });
  });

  test("an empty journal verifies with no head", () => {
    expect(verifyJournalEntries([])).toEqual({ journal_verified: true, journal_errors: [], total: 0, head_hash: null });
  });
});
