// packages/registry/src/token-registry.ts
import type { Address } from "../../common/src/address.js";
import { parseAddress } from "../../common/src/address.js";
import { parseAmount } from "../../common/src/amount.js";
import { DonationError } from "../../common/src/errors.js";
import type { Logger } from "../../common/src/logger.js";
import { silentLogger } from "../../common/src/logger.js";
import { transactionRunner } from "../../common/src/transaction.js";
import { composeLocator } from "./locator.js";
import type { RegistryStore } from "./registry-store.js";
import type { RegistrySettings, Token, TokenId, TokenRecord } from "./types.js";

export type TokenRegistryOptions = {
  administrator: string;
  baseLocator: string;
  now?: () => string;
  logger?: Logger;
};

/**
 * Write capability over the registry. Handed out once by createTokenRegistry;
 * whoever holds it is the only minter.
 */
export interface TokenMinter {
  mint(owner: Address, suffix: string): Promise<TokenId>;
  /** Adds to the donor's running total and returns the new total. */
  recordDonation(donor: Address, amount: bigint): Promise<bigint>;
  bindInvoiceToken(donor: Address, token_id: TokenId): Promise<void>;
}

function nowIso(now?: () => string): string {
  return (now ?? (() => new Date().toISOString()))();
}

function isTokenId(id: unknown): id is TokenId {
  return typeof id === "number" && Number.isSafeInteger(id) && id >= 0;
}

export class TokenRegistry {
  constructor(
    private readonly store: RegistryStore,
    private readonly logger: Logger = silentLogger
  ) {}

  private async settings(): Promise<RegistrySettings> {
    const s = await this.store.getSettings();
    if (!s) throw new DonationError("INVALID_CONFIG", "token registry has not been initialized");
    return s;
  }

  private async requireToken(id: TokenId): Promise<TokenRecord> {
    const t = isTokenId(id) ? await this.store.getToken(id) : null;
    if (!t) throw new DonationError("TOKEN_NOT_FOUND", `no token with id ${String(id)}`);
    return t;
  }

  private async requireAdministrator(caller: string, action: string): Promise<RegistrySettings> {
    const s = await this.settings();
    const who = parseAddress(caller, "caller", { allowZero: true });
    if (who !== s.administrator) {
      throw new DonationError("UNAUTHORIZED", `${action} is restricted to the registry administrator`, {
        details: { caller: who },
      });
    }
    return s;
  }

  async baseLocator(): Promise<string> {
    return (await this.settings()).base_locator;
  }

  async administrator(): Promise<Address> {
    return (await this.settings()).administrator;
  }

  /** Returns the previous base. */
  async setBaseLocator(caller: string, newBase: string): Promise<string> {
    if (typeof newBase !== "string") {
      throw new DonationError("INVALID_CONFIG", "base locator must be a string");
    }
    return transactionRunner(this.store)(async () => {
      const s = await this.requireAdministrator(caller, "setBaseLocator");
      await this.store.putSettings({ ...s, base_locator: newBase });
      this.logger.info("base locator updated", { previous: s.base_locator, next: newBase });
      return s.base_locator;
    });
  }

  /** Returns the previous administrator. */
  async transferAdministration(caller: string, next: string): Promise<Address> {
    const nextAdmin = parseAddress(next, "administrator");
    return transactionRunner(this.store)(async () => {
      const s = await this.requireAdministrator(caller, "transferAdministration");
      await this.store.putSettings({ ...s, administrator: nextAdmin });
      this.logger.info("administration transferred", { previous: s.administrator, next: nextAdmin });
      return s.administrator;
    });
  }

  async totalSupply(): Promise<number> {
    return this.store.countTokens();
  }

  async tokenOf(id: TokenId): Promise<Token> {
    const t = await this.requireToken(id);
    const { base_locator } = await this.settings();
    return {
      id: t.token_id,
      owner: t.owner,
      metadata_locator: composeLocator(base_locator, t.token_id, t.suffix),
    };
  }

  // Derived from the current base on every call; never cache across setBaseLocator.
  async locatorOf(id: TokenId): Promise<string> {
    return (await this.tokenOf(id)).metadata_locator;
  }

  async ownerOf(id: TokenId): Promise<Address> {
    return (await this.requireToken(id)).owner;
  }

  async balanceOf(owner: string): Promise<number> {
    return (await this.store.listTokensByOwner(parseAddress(owner, "owner", { allowZero: true }))).length;
  }

  async tokensOfOwner(owner: string): Promise<TokenId[]> {
    const rows = await this.store.listTokensByOwner(parseAddress(owner, "owner", { allowZero: true }));
    return rows.map((r) => r.token_id).sort((a, b) => a - b);
  }

  /** Running sum of every recorded donation; 0n for unknown donors. */
  async getDonations(donor: string): Promise<bigint> {
    return this.store.getCumulativeTotal(parseAddress(donor, "donor", { allowZero: true }));
  }

  async getInvoiceToken(donor: string): Promise<TokenId | null> {
    return this.store.getInvoiceToken(parseAddress(donor, "donor", { allowZero: true }));
  }
}

class RegistryMinter implements TokenMinter {
  constructor(
    private readonly store: RegistryStore,
    private readonly now: (() => string) | undefined,
    private readonly logger: Logger
  ) {}

  async mint(owner: Address, suffix: string): Promise<TokenId> {
    const to = parseAddress(owner, "owner");
    return transactionRunner(this.store)(async () => {
      const token_id = await this.store.countTokens();
      await this.store.insertToken({ token_id, owner: to, suffix, minted_at: nowIso(this.now) });
      this.logger.debug("token minted", { token_id, owner: to, suffix });
      return token_id;
    });
  }

  async recordDonation(donor: Address, amount: bigint): Promise<bigint> {
    const who = parseAddress(donor, "donor");
    const value = parseAmount(amount);
    return transactionRunner(this.store)(async () => {
      const total = (await this.store.getCumulativeTotal(who)) + value;
      await this.store.putCumulativeTotal(who, total);
      return total;
    });
  }

  async bindInvoiceToken(donor: Address, token_id: TokenId): Promise<void> {
    const who = parseAddress(donor, "donor");
    if (!isTokenId(token_id) || token_id >= (await this.store.countTokens())) {
      throw new DonationError("TOKEN_NOT_FOUND", `no token with id ${String(token_id)}`);
    }
    await this.store.putInvoiceToken(who, token_id);
  }
}

/**
 * Initializes registry settings on first use (an existing store keeps its own)
 * and splits the registry into its read/admin surface and the minting capability.
 */
export async function createTokenRegistry(
  store: RegistryStore,
  opts: TokenRegistryOptions
): Promise<{ registry: TokenRegistry; minter: TokenMinter }> {
  const logger = opts.logger ?? silentLogger;

  const existing = await store.getSettings();
  if (!existing) {
    await store.putSettings({
      base_locator: opts.baseLocator,
      administrator: parseAddress(opts.administrator, "administrator"),
    });
  }

  return {
    registry: new TokenRegistry(store, logger),
    minter: new RegistryMinter(store, opts.now, logger),
  };
}

/** Read/admin surface over an already initialized store, without a minter. */
export async function loadTokenRegistry(store: RegistryStore, logger?: Logger): Promise<TokenRegistry> {
  if (!(await store.getSettings())) {
    throw new DonationError("INVALID_CONFIG", "token registry has not been initialized");
  }
  return new TokenRegistry(store, logger);
}
