/**
 * Stake custody — where deposited funds come from and withdrawals go.
 *
 * On L1 this is the native-token transfer attached to the call. In process
 * it is a wallet map. collect() must throw InsufficientFunds when the
 * depositor cannot supply the amount.
 */

import { shortAddress, type Address } from "@valpool/protocol";
import { PoolError } from "./errors.js";

export interface StakeCustody {
  collect(from: Address, amount: bigint): void;
  payout(to: Address, amount: bigint): void;
}

export interface InMemoryCustodyOptions {
  /** Dev mode: collect() mints whatever a depositor lacks. */
  mintOnDemand?: boolean;
}

export class InMemoryCustody implements StakeCustody {
  private readonly wallets = new Map<Address, bigint>();
  private readonly mintOnDemand: boolean;

  constructor(opts: InMemoryCustodyOptions = {}) {
    this.mintOnDemand = opts.mintOnDemand ?? false;
  }

  /** Credit an external wallet (test setup). */
  fund(address: Address, amount: bigint): void {
    this.wallets.set(address, this.walletOf(address) + amount);
  }

  walletOf(address: Address): bigint {
    return this.wallets.get(address) ?? 0n;
  }

  collect(from: Address, amount: bigint): void {
    const held = this.walletOf(from);
    if (held < amount) {
      if (!this.mintOnDemand) {
        throw new PoolError(
          "InsufficientFunds",
          `${shortAddress(from)} holds ${held.toString()}, cannot deposit ${amount.toString()}`,
        );
      }
      this.wallets.set(from, 0n);
      return;
    }
    this.wallets.set(from, held - amount);
  }

  payout(to: Address, amount: bigint): void {
    this.fund(to, amount);
  }
}
