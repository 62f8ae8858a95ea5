// packages/donation/__tests__/config.test.ts
import path from "node:path";
import { describe, expect, test } from "vitest";

import { DEFAULT_CHARITY_FILE, loadConfig } from "../src/config.js";

const BASE_ENV = {
  DONATION_BASE_LOCATOR: "https://x/",
  DONATION_ADMIN: "0x00000000000000000000000000000000000AD000",
  DONATION_PAYOUT: "0x0000000000000000000000000000000000c4a001",
};

describe("loadConfig", () => {
  test("applies defaults and normalizes addresses", () => {
    expect(loadConfig(BASE_ENV)).toEqual({
      dbPath: ":memory:",
      baseLocator: "https://x/",
      administrator: "0x00000000000000000000000000000000000ad000",
      payout: "0x0000000000000000000000000000000000c4a001",
      charityFile: DEFAULT_CHARITY_FILE,
      logLevel: "info",
      requirePriorDonation: false,
    });
  });

  test("reads optional settings", () => {
    const cfg = loadConfig({
      ...BASE_ENV,
      DONATION_DB_PATH: "memory",
      DONATION_LOG_LEVEL: "debug",
      DONATION_REQUIRE_PRIOR_DONATION: "1",
      DONATION_CHARITY_FILE: "charity.json",
    });

    expect(cfg.dbPath).toBe("memory");
    expect(cfg.logLevel).toBe("debug");
    expect(cfg.requirePriorDonation).toBe(true);
    expect(cfg.charityFile).toBe(path.resolve("charity.json"));
  });

  test("rejects a zero payout address", () => {
    expect(() => loadConfig({ ...BASE_ENV, DONATION_PAYOUT: "0x0000000000000000000000000000000000000000" })).toThrow(
      "INVALID_CONFIG: DONATION_PAYOUT: Must not be the zero address"
    );
  });

  test("reports every invalid variable", () => {
    try {
      loadConfig({ DONATION_BASE_LOCATOR: "https://x/", DONATION_ADMIN: "nope", DONATION_LOG_LEVEL: "loud" });
      expect.unreachable();
    } catch (e) {
      expect(e).toMatchObject({ code: "INVALID_CONFIG" });
      const message = e instanceof Error ? e.message : "";
      expect(message).toMatch(/DONATION_ADMIN: /);
      expect(message).toMatch(/DONATION_PAYOUT: /);
      expect(message).toMatch(/DONATION_LOG_LEVEL: Expected one of silent, error, warn, info, debug/);
    }
  });
});
