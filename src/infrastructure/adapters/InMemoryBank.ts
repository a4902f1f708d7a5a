import type { IWireTransfers } from "../../core/repositories/IWireTransfers";

const isValidAmount = (amount: number): boolean =>
  Number.isSafeInteger(amount) && amount >= 0;

/**
 * Ledger kept in a Map owned by the instance. A transfer whose credit would
 * leave the safe-integer range is refused like an overdraft.
 *
 * Every method is synchronous, so a transfer's check and both writes run
 * without any other caller observing the intermediate state.
 */
export class InMemoryBank implements IWireTransfers {
  private readonly balances = new Map<string, number>();

  constructor(openingBalances: Record<string, number> = {}) {
    for (const [account, amount] of Object.entries(openingBalances)) {
      this.setFunds(account, amount);
    }
  }

  getFunds(account: string): number {
    return this.balances.get(account) ?? 0;
  }

  setFunds(account: string, amount: number): void {
    if (!isValidAmount(amount)) throw new Error("Invalid Amount");
    this.balances.set(account, amount);
  }

  transferFunds(amount: number, fromAccount: string, toAccount: string): boolean {
    if (!isValidAmount(amount)) return false;

    const available = this.getFunds(fromAccount);
    if (available < amount) return false;
    if (amount === 0 || fromAccount === toAccount) return true;

    const credited = this.getFunds(toAccount) + amount;
    if (!Number.isSafeInteger(credited)) return false;

    this.balances.set(fromAccount, available - amount);
    this.balances.set(toAccount, credited);
    return true;
  }

  /** Materialized balances only; accounts never set are absent. */
  accounts(): Record<string, number> {
    return Object.fromEntries(this.balances);
  }
}
