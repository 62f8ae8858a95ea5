// packages/donation/src/payment-rail.ts
import type { Address } from "../../common/src/address.js";
import { parseAddress } from "../../common/src/address.js";
import { parseAmount } from "../../common/src/amount.js";
import type { AmountInput } from "../../common/src/amount.js";

/**
 * Moves the donated asset. The payer must have authorized the pull out of band;
 * `false` means the rail declined.
 */
export interface PaymentRail {
  transferFrom(payer: Address, payee: Address, amount: bigint): boolean | Promise<boolean>;
}

export type PaymentTransfer = {
  payer: Address;
  payee: Address;
  amount: bigint;
};

/**
 * Balances plus one allowance per payer, granted to whoever pulls through this rail.
 * Used by tests and the demos.
 */
export class InMemoryPaymentRail implements PaymentRail {
  private balances = new Map<Address, bigint>();
  private allowances = new Map<Address, bigint>();
  private transfers: PaymentTransfer[] = [];

  credit(account: string, amount: AmountInput): void {
    const who = parseAddress(account, "account");
    this.balances.set(who, this.balanceOf(who) + parseAmount(amount, { allowZero: true }));
  }

  approve(payer: string, amount: AmountInput): void {
    this.allowances.set(parseAddress(payer, "payer"), parseAmount(amount, { allowZero: true }));
  }

  balanceOf(account: string): bigint {
    return this.balances.get(parseAddress(account, "account", { allowZero: true })) ?? 0n;
  }

  allowanceOf(payer: string): bigint {
    return this.allowances.get(parseAddress(payer, "payer", { allowZero: true })) ?? 0n;
  }

  history(): PaymentTransfer[] {
    return this.transfers.map((t) => ({ ...t }));
  }

  transferFrom(payer: Address, payee: Address, amount: bigint): boolean {
    const allowance = this.allowanceOf(payer);
    const balance = this.balanceOf(payer);
    if (amount <= 0n || allowance < amount || balance < amount) return false;

    this.allowances.set(payer, allowance - amount);
    this.balances.set(payer, balance - amount);
    this.balances.set(payee, this.balanceOf(payee) + amount);
    this.transfers.push({ payer, payee, amount });
    return true;
  }
}
