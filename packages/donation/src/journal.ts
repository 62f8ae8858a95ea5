// packages/donation/src/journal.ts
import { z } from "zod";
import type { Address } from "../../common/src/address.js";
import { sha256Hex, stableStringify } from "../../common/src/stable-json.js";
import type { TokenId } from "../../registry/src/types.js";

export type DonationEvent =
  | { type: "DONATION_RECEIVED"; donor: Address; amount: bigint; token_id: TokenId }
  | { type: "DONATION_VERIFIED"; donor: Address; invoice_id: string; token_id: TokenId }
  | { type: "BASE_LOCATOR_UPDATED"; by: Address; previous: string; next: string }
  | { type: "ADMIN_TRANSFERRED"; previous: Address; next: Address };

export type DonationReceivedEvent = Extract<DonationEvent, { type: "DONATION_RECEIVED" }>;
export type DonationVerifiedEvent = Extract<DonationEvent, { type: "DONATION_VERIFIED" }>;

export type JournalEntryType = DonationEvent["type"];

export const JOURNAL_ENTRY_TYPES: readonly JournalEntryType[] = [
  "DONATION_RECEIVED",
  "DONATION_VERIFIED",
  "BASE_LOCATOR_UPDATED",
  "ADMIN_TRANSFERRED",
];

export const JournalPayloadSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean(), z.null()])
);

export type JournalPayload = z.infer<typeof JournalPayloadSchema>;

export type JournalEntry = {
  seq: number; // dense from 1
  at: string;
  type: JournalEntryType;

  donor: Address | null;
  token_id: TokenId | null;
  payload: JournalPayload;

  prev_hash: string | null;
  hash: string;
};

export type AppendJournalEntryInput = Omit<JournalEntry, "seq" | "prev_hash" | "hash">;

export type JournalQuery = {
  donor?: Address | null;
  limit?: number;
};

export interface DonationJournalStore {
  runInTransaction?<T>(fn: () => Promise<T>): Promise<T>;

  /** Assigns seq, links prev_hash to the current head and computes hash. */
  appendJournalEntry(input: AppendJournalEntryInput): Promise<JournalEntry>;
  listJournalEntries(query?: JournalQuery): Promise<JournalEntry[]>;
}

export function isJournalEntryType(v: unknown): v is JournalEntryType {
  return typeof v === "string" && JOURNAL_ENTRY_TYPES.some((t) => t === v);
}

/** JSON-safe journal input for an event (amounts as decimal strings). */
export function toJournalInput(event: DonationEvent, at: string): AppendJournalEntryInput {
  switch (event.type) {
    case "DONATION_RECEIVED":
      return {
        at,
        type: event.type,
        donor: event.donor,
        token_id: event.token_id,
        payload: { donor: event.donor, amount: event.amount.toString(), token_id: event.token_id },
      };
    case "DONATION_VERIFIED":
      return {
        at,
        type: event.type,
        donor: event.donor,
        token_id: event.token_id,
        payload: { donor: event.donor, invoice_id: event.invoice_id, token_id: event.token_id },
      };
    case "BASE_LOCATOR_UPDATED":
      return {
        at,
        type: event.type,
        donor: null,
        token_id: null,
        payload: { by: event.by, previous: event.previous, next: event.next },
      };
    case "ADMIN_TRANSFERRED":
      return {
        at,
        type: event.type,
        donor: null,
        token_id: null,
        payload: { previous: event.previous, next: event.next },
      };
  }
}

export function computeJournalEntryHash(input: {
  seq: number;
  at: string;
  type: JournalEntryType;
  donor: Address | null;
  token_id: TokenId | null;
  payload: JournalPayload;
  prev_hash: string | null;
}): string {
  return sha256Hex(
    stableStringify({
      seq: input.seq,
      at: input.at,
      type: input.type,
      donor: input.donor ?? null,
      token_id: input.token_id ?? null,
      payload: input.payload ?? null,
      prev_hash: input.prev_hash ?? null,
    })
  );
}

/**
 * Helper for stores: builds the stored entry that follows `head`.
 */
export function chainJournalEntry(
  head: { seq: number; hash: string } | null,
  input: AppendJournalEntryInput
): JournalEntry {
  const seq = (head?.seq ?? 0) + 1;
  const prev_hash = head?.hash ?? null;
  const hash = computeJournalEntryHash({ ...input, seq, prev_hash });
  return { ...input, seq, prev_hash, hash };
}

export type JournalVerifyError = {
  seq: number;
  expected_seq: number;
  expected_hash: string;
  stored_hash: string;
  stored_prev_hash: string | null;
  computed_prev_hash: string | null;
};

export type JournalVerifyReport = {
  journal_verified: boolean;
  journal_errors: JournalVerifyError[];
  total: number;
  head_hash: string | null;
};

export function verifyJournalEntries(entries: JournalEntry[]): JournalVerifyReport {
  const errors: JournalVerifyError[] = [];
  let prevExpected: string | null = null;

  entries.forEach((e, i) => {
    const expected_seq = i + 1;
    const expected = computeJournalEntryHash({
      seq: e.seq,
      at: e.at,
      type: e.type,
      donor: e.donor,
      token_id: e.token_id,
      payload: e.payload,
      prev_hash: prevExpected,
    });

    if (e.seq !== expected_seq || e.prev_hash !== prevExpected || e.hash !== expected) {
      errors.push({
        seq: e.seq,
        expected_seq,
        expected_hash: expected,
        stored_hash: e.hash,
        stored_prev_hash: e.prev_hash,
        computed_prev_hash: prevExpected,
      });
    }

    prevExpected = expected;
  });

  return {
    journal_verified: errors.length === 0,
    journal_errors: errors,
    total: entries.length,
    head_hash: entries.length ? entries[entries.length - 1]?.hash ?? null : null,
  };
}
