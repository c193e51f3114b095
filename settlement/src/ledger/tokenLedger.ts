/**
 * Boundary to whatever actually moves tokens. The engine only ever spends
 * through allowances granted to its own address (the domain's verifying
 * contract).
 */
export interface TokenLedger {
  /** Token decimals, snapshotted into offers at creation. */
  decimals(token: string): Promise<number>;
  allowance(token: string, owner: string, spender: string): Promise<bigint>;
  /**
   * Move `amount` of `token` from `owner` to `recipient` on behalf of
   * `spender`. Resolves false when the move is refused.
   */
  transferFrom(
    token: string,
    spender: string,
    owner: string,
    recipient: string,
    amount: bigint
  ): Promise<boolean>;
  /**
   * Run `fn` all-or-nothing: if it throws, every transfer made inside it is
   * undone before the error propagates.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;
}
