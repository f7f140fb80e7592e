/**
 * Ledger state types.
 *
 * The plain-data shape of a ledger, as exchanged between the ledger
 * engine and a snapshot store. Contains everything needed to resume
 * exactly where a previous session stopped, including the ID counters.
 */

import type { Transaction } from "./financial.js";

/**
 * Full state of a single account.
 */
export interface AccountState {
  readonly accountId: string;
  readonly owner: string;
  readonly balance: number;
  readonly isActive: boolean;
  readonly transactions: readonly Transaction[];
  readonly createdAt: string;

  /** Number of transaction IDs minted so far for this account */
  readonly transactionCounter: number;
}

/**
 * Full state of a ledger.
 * Every key in `accounts` equals the `accountId` of its value.
 */
export interface LedgerState {
  readonly accounts: Readonly<Record<string, AccountState>>;

  /** Number of account IDs minted so far */
  readonly accountCounter: number;
}

/**
 * The state of a ledger that has never been written.
 */
export function emptyLedgerState(): LedgerState {
  return { accounts: {}, accountCounter: 0 };
}
