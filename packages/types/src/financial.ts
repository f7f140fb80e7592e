/**
 * Financial Types
 *
 * Records produced by the ledger when a balance changes.
 *
 * Rules:
 * - Amounts are plain decimal numbers at the API boundary
 * - Transactions are immutable once minted
 * - An account's log is append-only, insertion order = chronological order
 */

/** The two balance-affecting event kinds. */
export const TRANSACTION_KINDS = ["DEPOSIT", "WITHDRAWAL"] as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

/**
 * One balance-affecting event belonging to exactly one account.
 */
export interface Transaction {
  /** `{accountId}-TXN-{nnnn}`, unique within the owning account */
  readonly id: string;

  readonly kind: TransactionKind;

  /** Always > 0 */
  readonly amount: number;

  /** The owning account's balance immediately after this transaction */
  readonly balanceAfter: number;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  readonly description: string | null;
}
