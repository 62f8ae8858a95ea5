// packages/donation/src/cli/donation-ledger.ts
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { isDonationError } from "../../../common/src/errors.js";
import { stableStringify } from "../../../common/src/stable-json.js";
import { loadTokenRegistry } from "../../../registry/src/token-registry.js";
import { DEFAULT_CHARITY_FILE } from "../config.js";
import { loadCharityDescriptor } from "../charity.js";
import { verifyJournalEntries } from "../journal.js";
import { DonationLedger } from "../ledger.js";
import { SqliteDonationStore } from "../sqlite-store.js";

/**
 * Read-only inspection of a donation ledger database.
 */

export type CliIo = {
  out(text: string): void;
  err(text: string): void;
};

const processIo: CliIo = {
  out: (t) => process.stdout.write(t),
  err: (t) => process.stderr.write(t),
};

function usage(): string {
  return `donation-ledger - inspect a donation ledger database

Usage:
  donation-ledger --help
  donation-ledger version

  donation-ledger donations --db <path> [--json]
  donation-ledger token <id> --db <path> [--json]
  donation-ledger journal --db <path> [--json] [--donor <address>]
  donation-ledger verify --db <path> [--json]
  donation-ledger charity [--file <path>]

Examples:
  donation-ledger donations --db ./donations.sqlite
  donation-ledger token 0 --db ./donations.sqlite
  donation-ledger verify --db ./donations.sqlite --json
`;
}

// -------------------- argv parsing --------------------

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function writeJson(io: CliIo, obj: unknown): void {
  io.out(JSON.stringify(JSON.parse(stableStringify(obj)), null, 2) + "\n");
}

function openStore(io: CliIo, dbPath: string): SqliteDonationStore | null {
  const abs = path.resolve(process.cwd(), dbPath);
  if (!fs.existsSync(abs)) {
    io.err(`[donation-ledger] database not found: ${dbPath}\n`);
    return null;
  }
  return new SqliteDonationStore(abs);
}

// -------------------- commands --------------------

async function cmdDonations(io: CliIo, store: SqliteDonationStore, asJson: boolean): Promise<number> {
  const ledger = new DonationLedger(store);
  const all = await ledger.allDonations();

  const rows = await Promise.all(
    all.donors.map(async (donor, i) => ({
      donor,
      amount: all.amounts[i] ?? 0n,
      verified: all.verified[i] ?? false,
      cumulative: await store.getCumulativeTotal(donor),
      invoice_token: await store.getInvoiceToken(donor),
    }))
  );

  if (asJson) {
    writeJson(io, rows);
    return 0;
  }

  if (rows.length === 0) {
    io.out("no donations\n");
    return 0;
  }
  for (const r of rows) {
    io.out(
      `${r.donor} latest=${r.amount} total=${r.cumulative} verified=${r.verified ? "yes" : "no"}` +
        (r.invoice_token === null ? "" : ` invoice_token=${r.invoice_token}`) +
        "\n"
    );
  }
  return 0;
}

async function cmdToken(io: CliIo, store: SqliteDonationStore, rawId: string, asJson: boolean): Promise<number> {
  if (!/^\d+$/.test(rawId)) {
    io.err(`[donation-ledger] token id must be a non-negative integer: ${rawId}\n`);
    return 1;
  }
  const registry = await loadTokenRegistry(store);
  const token = await registry.tokenOf(Number(rawId));

  if (asJson) writeJson(io, token);
  else io.out(`token ${token.id} owner=${token.owner} locator=${token.metadata_locator}\n`);
  return 0;
}

async function cmdJournal(
  io: CliIo,
  store: SqliteDonationStore,
  donor: string | null,
  asJson: boolean
): Promise<number> {
  const entries = await store.listJournalEntries({ donor: donor?.toLowerCase() ?? null });

  if (asJson) {
    writeJson(io, entries);
    return 0;
  }
  for (const e of entries) {
    io.out(`#${e.seq} ${e.at} ${e.type} ${stableStringify(e.payload)}\n`);
  }
  return 0;
}

async function cmdVerify(io: CliIo, store: SqliteDonationStore, asJson: boolean): Promise<number> {
  const report = verifyJournalEntries(await store.listJournalEntries());

  if (asJson) writeJson(io, report);
  else if (report.journal_verified) io.out(`journal OK (${report.total} entries)\n`);
  else {
    io.out(`journal BROKEN (${report.journal_errors.length} of ${report.total} entries)\n`);
    for (const err of report.journal_errors) {
      io.out(`  seq ${err.seq}: stored ${err.stored_hash} expected ${err.expected_hash}\n`);
    }
  }
  return report.journal_verified ? 0 : 1;
}

function cmdCharity(io: CliIo, file: string | null): number {
  writeJson(io, loadCharityDescriptor(file ? path.resolve(process.cwd(), file) : DEFAULT_CHARITY_FILE));
  return 0;
}

export async function run(argv: string[] = process.argv, io: CliIo = processIo): Promise<number> {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.out(usage());
    return 0;
  }

  const cmd = args[0];
  const asJson = args.includes("--json");

  if (cmd === "version") {
    io.out("donation-ledger cli v1\n");
    return 0;
  }

  try {
    if (cmd === "charity") return cmdCharity(io, getFlagValue(args, "--file"));

    if (cmd !== "donations" && cmd !== "token" && cmd !== "journal" && cmd !== "verify") {
      io.err(`Unknown command: ${cmd}\n\n`);
      io.err(usage());
      return 1;
    }

    const dbPath = getFlagValue(args, "--db");
    if (!dbPath) {
      io.err("Missing --db <path>\n\n");
      io.err(usage());
      return 1;
    }

    const store = openStore(io, dbPath);
    if (!store) return 1;

    try {
      if (cmd === "donations") return await cmdDonations(io, store, asJson);
      if (cmd === "journal") return await cmdJournal(io, store, getFlagValue(args, "--donor"), asJson);
      if (cmd === "verify") return await cmdVerify(io, store, asJson);

      const id = args[1];
      if (!id || id.startsWith("--")) {
        io.err("Missing token id.\n\n");
        io.err(usage());
        return 1;
      }
      return await cmdToken(io, store, id, asJson);
    } finally {
      store.close();
    }
  } catch (e) {
    if (isDonationError(e)) {
      io.err(`[donation-ledger] ${e.message}\n`);
      return 1;
    }
    throw e;
  }
}

// Entrypoint: run when this file is the invoked script
const invoked = process.argv[1] ? path.resolve(process.argv[1]) : "";
if (invoked === fileURLToPath(import.meta.url)) {
  void run(process.argv).then(
    (code) => process.exit(code),
    (e: unknown) => {
      console.error("[donation-ledger]", e);
      process.exit(1);
    }
  );
}
