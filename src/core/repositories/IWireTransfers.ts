/**
 * Port for moving funds between accounts.
 *
 * Unknown accounts read as a zero balance. Implementations must apply the
 * sufficiency check and both balance writes of `transferFunds` as one unit.
 */
export interface IWireTransfers {
  getFunds(account: string): number;
  setFunds(account: string, amount: number): void;
  /** Returns false, changing nothing, when `fromAccount` holds less than `amount`. */
  transferFunds(amount: number, fromAccount: string, toAccount: string): boolean;
}
