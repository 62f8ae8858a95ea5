// packages/registry/src/types.ts
import type { Address } from "../../common/src/address.js";

/** Dense, zero-based, never reused. */
export type TokenId = number;

/** What the store keeps per token. The locator is derived, never stored. */
export type TokenRecord = {
  token_id: TokenId;
  owner: Address;
  suffix: string;
  minted_at: string; // ISO
};

export type Token = {
  id: TokenId;
  owner: Address;
  metadata_locator: string;
};

export type RegistrySettings = {
  base_locator: string;
  administrator: Address;
};
