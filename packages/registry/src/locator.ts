// packages/registry/src/locator.ts
import type { TokenId } from "./types.js";

/**
 * Locators are `<base><id><suffix>`; base is registry-wide and mutable,
 * suffix is fixed when the token is minted.
 */
export function composeLocator(base: string, id: TokenId, suffix: string): string {
  return `${base}${id}${suffix}`;
}

export function donationSuffix(amount: bigint): string {
  return `.json?donation=${amount.toString()}`;
}

// invoice IDs go in verbatim; the content service owns any decoding
export function invoiceSuffix(invoiceId: string): string {
  return `.json?invoiceId=${invoiceId}`;
}
