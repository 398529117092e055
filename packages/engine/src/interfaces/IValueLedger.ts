/**
 * Fungible balances, as seen from the escrow's own account.
 * Implementations throw rather than return a status when a movement fails.
 */
export interface IValueLedger {
  /** Move `amount` out of the escrow's account. */
  transfer(to: string, amount: bigint): Promise<void>;

  /**
   * Move `amount` from `from` to `to` on the escrow's authority.
   * Fails if `from` lacks the balance or has not authorised the escrow.
   */
  transferFrom(from: string, to: string, amount: bigint): Promise<void>;
}
