// packages/donation/src/sqlite-store.ts
import Database from "better-sqlite3";
import type { Address } from "../../common/src/address.js";
import type { RegistrySettings, TokenId, TokenRecord } from "../../registry/src/types.js";
import type { AppendJournalEntryInput, JournalEntry, JournalQuery } from "./journal.js";
import { JournalPayloadSchema, chainJournalEntry, isJournalEntryType } from "./journal.js";
import type { DonationStore } from "./store.js";
import type { DonationRecord } from "./types.js";

type TokenRow = { token_id: number; owner: string; suffix: string; minted_at: string };
type RecordRow = { donor: string; amount: string; verified: number; invoice_id: string | null };
type JournalRow = {
  seq: number;
  at: string;
  type: string;
  donor: string | null;
  token_id: number | null;
  payload_json: string;
  prev_hash: string | null;
  hash: string;
};

function toTokenRecord(r: TokenRow): TokenRecord {
  return { token_id: Number(r.token_id), owner: r.owner, suffix: r.suffix, minted_at: r.minted_at };
}

function toJournalEntry(r: JournalRow): JournalEntry {
  if (!isJournalEntryType(r.type)) {
    throw new Error(`JOURNAL_TYPE_UNSUPPORTED: seq=${r.seq} type=${r.type}`);
  }
  return {
    seq: Number(r.seq),
    at: r.at,
    type: r.type,
    donor: r.donor ?? null,
    token_id: r.token_id == null ? null : Number(r.token_id),
    payload: JournalPayloadSchema.parse(JSON.parse(r.payload_json)),
    prev_hash: r.prev_hash ?? null,
    hash: r.hash,
  };
}

/**
 * Registry, ledger and journal tables in one SQLite database.
 * Amounts are stored as decimal TEXT (they exceed 64 bits).
 */
export class SqliteDonationStore implements DonationStore {
  private db: Database.Database;
  private txDepth = 0;

  constructor(filename = "donation-ledger.sqlite") {
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  close(): void {
    this.db.close();
  }

  // Async-safe transaction wrapper (better-sqlite3's transaction(fn) cannot await)
  async runInTransaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.txDepth > 0) return fn();

    this.txDepth++;
    try {
      this.db.exec("BEGIN IMMEDIATE;");
      const out = await fn();
      this.db.exec("COMMIT;");
      return out;
    } catch (e) {
      if (this.db.inTransaction) this.db.exec("ROLLBACK;");
      throw e;
    } finally {
      this.txDepth--;
    }
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS registry_settings (
        id            INTEGER PRIMARY KEY CHECK (id = 1),
        base_locator  TEXT NOT NULL,
        administrator TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tokens (
        token_id   INTEGER PRIMARY KEY,
        owner      TEXT NOT NULL,
        suffix     TEXT NOT NULL,
        minted_at  TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tokens_owner
        ON tokens(owner, token_id);

      CREATE TABLE IF NOT EXISTS cumulative_totals (
        donor  TEXT PRIMARY KEY,
        total  TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS invoice_tokens (
        donor     TEXT PRIMARY KEY,
        token_id  INTEGER NOT NULL REFERENCES tokens(token_id)
      );

      CREATE TABLE IF NOT EXISTS donation_records (
        donor       TEXT PRIMARY KEY,
        amount      TEXT NOT NULL,
        verified    INTEGER NOT NULL,
        invoice_id  TEXT
      );

      CREATE TABLE IF NOT EXISTS donor_roster (
        position  INTEGER PRIMARY KEY AUTOINCREMENT,
        donor     TEXT NOT NULL UNIQUE
      );

      CREATE TABLE IF NOT EXISTS donation_journal (
        seq           INTEGER PRIMARY KEY,
        at            TEXT NOT NULL,
        type          TEXT NOT NULL,
        donor         TEXT,
        token_id      INTEGER,
        payload_json  TEXT NOT NULL,
        prev_hash     TEXT,
        hash          TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_journal_donor
        ON donation_journal(donor, seq);
    `);
  }

  // -------- registry --------

  async getSettings(): Promise<RegistrySettings | null> {
    const row = this.db
      .prepare<[], RegistrySettings>(`SELECT base_locator, administrator FROM registry_settings WHERE id = 1;`)
      .get();
    return row ? { base_locator: row.base_locator, administrator: row.administrator } : null;
  }

  async putSettings(settings: RegistrySettings): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO registry_settings (id, base_locator, administrator) VALUES (1, ?, ?)
         ON CONFLICT(id) DO UPDATE SET base_locator = excluded.base_locator,
                                       administrator = excluded.administrator;`
      )
      .run(settings.base_locator, settings.administrator);
  }

  async countTokens(): Promise<number> {
    const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM tokens;`).get();
    return Number(row?.n ?? 0);
  }

  async insertToken(token: TokenRecord): Promise<void> {
    this.db
      .prepare(`INSERT INTO tokens (token_id, owner, suffix, minted_at) VALUES (?, ?, ?, ?);`)
      .run(token.token_id, token.owner, token.suffix, token.minted_at);
  }

  async getToken(token_id: TokenId): Promise<TokenRecord | null> {
    const row = this.db
      .prepare<[number], TokenRow>(`SELECT token_id, owner, suffix, minted_at FROM tokens WHERE token_id = ?;`)
      .get(token_id);
    return row ? toTokenRecord(row) : null;
  }

  async listTokensByOwner(owner: Address): Promise<TokenRecord[]> {
    return this.db
      .prepare<[string], TokenRow>(
        `SELECT token_id, owner, suffix, minted_at FROM tokens WHERE owner = ? ORDER BY token_id ASC;`
      )
      .all(owner)
      .map(toTokenRecord);
  }

  async getCumulativeTotal(donor: Address): Promise<bigint> {
    const row = this.db
      .prepare<[string], { total: string }>(`SELECT total FROM cumulative_totals WHERE donor = ?;`)
      .get(donor);
    return row ? BigInt(row.total) : 0n;
  }

  async putCumulativeTotal(donor: Address, total: bigint): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO cumulative_totals (donor, total) VALUES (?, ?)
         ON CONFLICT(donor) DO UPDATE SET total = excluded.total;`
      )
      .run(donor, total.toString());
  }

  async getInvoiceToken(donor: Address): Promise<TokenId | null> {
    const row = this.db
      .prepare<[string], { token_id: number }>(`SELECT token_id FROM invoice_tokens WHERE donor = ?;`)
      .get(donor);
    return row ? Number(row.token_id) : null;
  }

  async putInvoiceToken(donor: Address, token_id: TokenId): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO invoice_tokens (donor, token_id) VALUES (?, ?)
         ON CONFLICT(donor) DO UPDATE SET token_id = excluded.token_id;`
      )
      .run(donor, token_id);
  }

  // -------- ledger --------

  async getRecord(donor: Address): Promise<DonationRecord | null> {
    const row = this.db
      .prepare<[string], RecordRow>(
        `SELECT donor, amount, verified, invoice_id FROM donation_records WHERE donor = ?;`
      )
      .get(donor);
    if (!row) return null;
    return {
      donor: row.donor,
      amount: BigInt(row.amount),
      verified: row.verified === 1,
      invoice_id: row.invoice_id ?? null,
    };
  }

  async putRecord(record: DonationRecord): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO donation_records (donor, amount, verified, invoice_id) VALUES (?, ?, ?, ?)
         ON CONFLICT(donor) DO UPDATE SET amount = excluded.amount,
                                          verified = excluded.verified,
                                          invoice_id = excluded.invoice_id;`
      )
      .run(record.donor, record.amount.toString(), record.verified ? 1 : 0, record.invoice_id);
  }

  async appendToRoster(donor: Address): Promise<boolean> {
    const info = this.db.prepare(`INSERT OR IGNORE INTO donor_roster (donor) VALUES (?);`).run(donor);
    return info.changes > 0;
  }

  async listRoster(): Promise<Address[]> {
    return this.db
      .prepare<[], { donor: string }>(`SELECT donor FROM donor_roster ORDER BY position ASC;`)
      .all()
      .map((r) => r.donor);
  }

  // -------- journal --------

  async appendJournalEntry(input: AppendJournalEntryInput): Promise<JournalEntry> {
    return this.runInTransaction(async () => {
      const head = this.db
        .prepare<[], { seq: number; hash: string }>(
          `SELECT seq, hash FROM donation_journal ORDER BY seq DESC LIMIT 1;`
        )
        .get();

      const entry = chainJournalEntry(head ?? null, input);

      this.db
        .prepare(
          `INSERT INTO donation_journal
            (seq, at, type, donor, token_id, payload_json, prev_hash, hash)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?);`
        )
        .run(
          entry.seq,
          entry.at,
          entry.type,
          entry.donor,
          entry.token_id,
          JSON.stringify(entry.payload),
          entry.prev_hash,
          entry.hash
        );

      return entry;
    });
  }

  async listJournalEntries(query: JournalQuery = {}): Promise<JournalEntry[]> {
    const limit = Math.max(1, Math.floor(query.limit ?? 1_000_000));

    const rows = query.donor
      ? this.db
          .prepare<[string, number], JournalRow>(
            `SELECT seq, at, type, donor, token_id, payload_json, prev_hash, hash
             FROM donation_journal
             WHERE donor = ?
             ORDER BY seq ASC
             LIMIT ?;`
          )
          .all(query.donor, limit)
      : this.db
          .prepare<[number], JournalRow>(
            `SELECT seq, at, type, donor, token_id, payload_json, prev_hash, hash
             FROM donation_journal
             ORDER BY seq ASC
             LIMIT ?;`
          )
          .all(limit);

    return rows.map(toJournalEntry);
  }
}
