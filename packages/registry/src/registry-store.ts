// packages/registry/src/registry-store.ts
import type { Address } from "../../common/src/address.js";
import type { RegistrySettings, TokenId, TokenRecord } from "./types.js";

/**
 * Persistence contract for TokenRegistry.
 * - Tokens are append-only; `countTokens()` is also the next token id.
 * - Cumulative totals and the invoice index are keyed by donor.
 */
export interface RegistryStore {
  /**
   * If provided, registry writes run inside it. Nested calls must join the outer unit.
   */
  runInTransaction?<T>(fn: () => Promise<T>): Promise<T>;

  getSettings(): Promise<RegistrySettings | null>;
  putSettings(settings: RegistrySettings): Promise<void>;

  countTokens(): Promise<number>;
  insertToken(token: TokenRecord): Promise<void>;
  getToken(token_id: TokenId): Promise<TokenRecord | null>;
  listTokensByOwner(owner: Address): Promise<TokenRecord[]>;

  getCumulativeTotal(donor: Address): Promise<bigint>;
  putCumulativeTotal(donor: Address, total: bigint): Promise<void>;

  getInvoiceToken(donor: Address): Promise<TokenId | null>;
  putInvoiceToken(donor: Address, token_id: TokenId): Promise<void>;
}
