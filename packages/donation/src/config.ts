// packages/donation/src/config.ts
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { AddressSchema, ZERO_ADDRESS } from "../../common/src/address.js";
import { DonationError } from "../../common/src/errors.js";
import { LOG_LEVELS } from "../../common/src/logger.js";
import type { LogLevel } from "../../common/src/logger.js";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../..");

export const DEFAULT_CHARITY_FILE = path.join(repoRoot, "config", "charity.json");

const BooleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const LogLevelSchema = z.custom<LogLevel>(
  (v) => typeof v === "string" && LOG_LEVELS.some((l) => l === v),
  `Expected one of ${LOG_LEVELS.join(", ")}`
);

const EnvSchema = z.object({
  DONATION_DB_PATH: z.string().trim().min(1).default(":memory:"),
  DONATION_BASE_LOCATOR: z.string().trim().min(1),
  DONATION_ADMIN: AddressSchema.refine((a) => a !== ZERO_ADDRESS, "Must not be the zero address"),
  DONATION_PAYOUT: AddressSchema.refine((a) => a !== ZERO_ADDRESS, "Must not be the zero address"),
  DONATION_CHARITY_FILE: z.string().trim().min(1).default(DEFAULT_CHARITY_FILE),
  DONATION_LOG_LEVEL: LogLevelSchema.default("info"),
  DONATION_REQUIRE_PRIOR_DONATION: BooleanFlag.default(false),
});

export type DonationConfig = {
  /** `:memory:` or a file path for SQLite; `memory` selects the non-SQLite store. */
  dbPath: string;
  baseLocator: string;
  administrator: string;
  payout: string;
  charityFile: string;
  logLevel: LogLevel;
  requirePriorDonation: boolean;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): DonationConfig {
  const r = EnvSchema.safeParse(env);
  if (!r.success) {
    const issues = r.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new DonationError("INVALID_CONFIG", issues.join("; "), { details: { issues } });
  }

  const e = r.data;
  return {
    dbPath: e.DONATION_DB_PATH,
    baseLocator: e.DONATION_BASE_LOCATOR,
    administrator: e.DONATION_ADMIN,
    payout: e.DONATION_PAYOUT,
    charityFile: path.resolve(e.DONATION_CHARITY_FILE),
    logLevel: e.DONATION_LOG_LEVEL,
    requirePriorDonation: e.DONATION_REQUIRE_PRIOR_DONATION,
  };
}
