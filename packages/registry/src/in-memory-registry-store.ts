// packages/registry/src/in-memory-registry-store.ts
import type { Address } from "../../common/src/address.js";
import type { RegistryStore } from "./registry-store.js";
import type { RegistrySettings, TokenId, TokenRecord } from "./types.js";

type RegistryState = {
  settings: RegistrySettings | null;
  tokens: TokenRecord[];
  totals: Map<Address, bigint>;
  invoices: Map<Address, TokenId>;
};

export class InMemoryRegistryStore implements RegistryStore {
  private registry: RegistryState = {
    settings: null,
    tokens: [],
    totals: new Map(),
    invoices: new Map(),
  };
  private txDepth = 0;

  /**
   * Snapshot/restore transaction. Nested calls join the outer one.
   */
  async runInTransaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.txDepth > 0) return fn();

    const restore = this.checkpoint();
    this.txDepth++;
    try {
      return await fn();
    } catch (e) {
      restore();
      throw e;
    } finally {
      this.txDepth--;
    }
  }

  /** Captures current state; the returned function puts it back. Subclasses extend it with their own state. */
  protected checkpoint(): () => void {
    const saved = structuredClone(this.registry);
    return () => {
      this.registry = saved;
    };
  }

  async getSettings(): Promise<RegistrySettings | null> {
    return this.registry.settings ? { ...this.registry.settings } : null;
  }

  async putSettings(settings: RegistrySettings): Promise<void> {
    this.registry.settings = { ...settings };
  }

  async countTokens(): Promise<number> {
    return this.registry.tokens.length;
  }

  async insertToken(token: TokenRecord): Promise<void> {
    if (token.token_id !== this.registry.tokens.length) {
      throw new Error(
        `Token id out of sequence: expected ${this.registry.tokens.length}, got ${token.token_id}`
      );
    }
    this.registry.tokens.push({ ...token });
  }

  async getToken(token_id: TokenId): Promise<TokenRecord | null> {
    const t = this.registry.tokens[token_id];
    return t ? { ...t } : null;
  }

  async listTokensByOwner(owner: Address): Promise<TokenRecord[]> {
    return this.registry.tokens.filter((t) => t.owner === owner).map((t) => ({ ...t }));
  }

  async getCumulativeTotal(donor: Address): Promise<bigint> {
    return this.registry.totals.get(donor) ?? 0n;
  }

  async putCumulativeTotal(donor: Address, total: bigint): Promise<void> {
    this.registry.totals.set(donor, total);
  }

  async getInvoiceToken(donor: Address): Promise<TokenId | null> {
    return this.registry.invoices.get(donor) ?? null;
  }

  async putInvoiceToken(donor: Address, token_id: TokenId): Promise<void> {
    this.registry.invoices.set(donor, token_id);
  }
}
