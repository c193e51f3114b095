/**
 * ERC20-style ledger held in memory: balances, allowances and decimals per
 * token, with rollback transactions. Transactions are serialized, and a
 * rollback undoes only the transfers its own transaction made, so a mint or
 * approve that lands while a transaction is pending survives it.
 */

import { ethers } from "ethers";
import { KeyedLock } from "../utils/keyedLock.js";
import { normalizeAddress } from "../utils/address.js";
import { InvalidParameterError } from "../utils/errors.js";
import type { TokenLedger } from "./tokenLedger.js";

const TX_KEY = "ledger";

interface TransferRecord {
  allowanceKey: string;
  fromKey: string;
  toKey: string;
  amount: bigint;
  allowanceSpent: boolean;
}

function slot(token: string, owner: string, spender?: string): string {
  const parts = [normalizeAddress(token, "token"), normalizeAddress(owner, "owner")];
  if (spender !== undefined) parts.push(normalizeAddress(spender, "spender"));
  return parts.join(":");
}

export class InMemoryTokenLedger implements TokenLedger {
  private readonly tokenDecimals = new Map<string, number>();
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private readonly lock = new KeyedLock();
  /** Transfers made by the open transaction, if any. */
  private journal: TransferRecord[] | undefined;
  /** Allowance slots re-approved while the open transaction runs. */
  private readonly approvedInTransaction = new Set<string>();

  registerToken(token: string, decimals: number): void {
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
      throw new InvalidParameterError(`Invalid decimals: ${decimals}`);
    }
    this.tokenDecimals.set(normalizeAddress(token, "token"), decimals);
  }

  mint(token: string, owner: string, amount: bigint): void {
    const key = slot(token, owner);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  approve(token: string, owner: string, spender: string, amount: bigint): void {
    const key = slot(token, owner, spender);
    this.allowances.set(key, amount);
    if (this.journal) this.approvedInTransaction.add(key);
  }

  balanceOf(token: string, owner: string): bigint {
    return this.balances.get(slot(token, owner)) ?? 0n;
  }

  async decimals(token: string): Promise<number> {
    const decimals = this.tokenDecimals.get(normalizeAddress(token, "token"));
    if (decimals === undefined) {
      throw new InvalidParameterError(`Unknown token: ${token}`);
    }
    return decimals;
  }

  async allowance(token: string, owner: string, spender: string): Promise<bigint> {
    return this.allowances.get(slot(token, owner, spender)) ?? 0n;
  }

  async transferFrom(
    token: string,
    spender: string,
    owner: string,
    recipient: string,
    amount: bigint
  ): Promise<boolean> {
    const allowanceKey = slot(token, owner, spender);
    const allowed = this.allowances.get(allowanceKey) ?? 0n;
    const fromKey = slot(token, owner);
    const balance = this.balances.get(fromKey) ?? 0n;
    if (allowed < amount || balance < amount) return false;

    // Max allowance is treated as infinite, as ERC20 implementations do
    const allowanceSpent = allowed !== ethers.MaxUint256;
    if (allowanceSpent) {
      this.allowances.set(allowanceKey, allowed - amount);
    }
    this.balances.set(fromKey, balance - amount);
    const toKey = slot(token, recipient);
    this.balances.set(toKey, (this.balances.get(toKey) ?? 0n) + amount);
    this.journal?.push({ allowanceKey, fromKey, toKey, amount, allowanceSpent });
    return true;
  }

  /**
   * Run `fn` with its transfers journaled; if it throws, they are undone newest
   * first and the error is rethrown. transferFrom is expected to be
   * called only from inside a transaction while one is open.
   */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.run(TX_KEY, async () => {
      const journal: TransferRecord[] = [];
      this.journal = journal;
      this.approvedInTransaction.clear();
      try {
        return await fn();
      } catch (err) {
        this.undo(journal);
        throw err;
      } finally {
        this.journal = undefined;
        this.approvedInTransaction.clear();
      }
    });
  }

  private undo(journal: TransferRecord[]): void {
    for (const record of [...journal].reverse()) {
      this.balances.set(record.fromKey, (this.balances.get(record.fromKey) ?? 0n) + record.amount);
      this.balances.set(record.toKey, (this.balances.get(record.toKey) ?? 0n) - record.amount);
      // A fresh approve replaces the spent allowance outright
      if (record.allowanceSpent && !this.approvedInTransaction.has(record.allowanceKey)) {
        this.allowances.set(
          record.allowanceKey,
          (this.allowances.get(record.allowanceKey) ?? 0n) + record.amount
        );
      }
    }
  }
}
