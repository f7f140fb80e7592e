/**
 * @strongbox/ledger — Transaction records and ID minting.
 *
 * Account IDs: ACC-000001, ACC-000002, ...
 * Transaction IDs: {accountId}-TXN-0001, {accountId}-TXN-0002, ...
 *
 * Counters start at 0 and are incremented by the mutation that consumes
 * the new ID, so the first ID minted carries sequence 1.
 */

import type { Transaction, TransactionKind } from "@strongbox/types";

export function formatAccountId(sequence: number): string {
  return `ACC-${String(sequence).padStart(6, "0")}`;
}

export function formatTransactionId(accountId: string, sequence: number): string {
  return `${accountId}-TXN-${String(sequence).padStart(4, "0")}`;
}

/**
 * Read the sequence number back out of a minted ID.
 * Returns undefined for IDs that don't follow the pattern under `prefix`.
 */
export function parseSequence(id: string, prefix: string): number | undefined {
  if (!id.startsWith(prefix)) {
    return undefined;
  }
  const rest = id.slice(prefix.length);
  return /^\d+$/.test(rest) ? Number(rest) : undefined;
}

/**
 * Highest sequence in use among `ids`, or 0.
 */
export function highestSequence(ids: Iterable<string>, prefix: string): number {
  let highest = 0;
  for (const id of ids) {
    const seq = parseSequence(id, prefix);
    if (seq !== undefined && seq > highest) {
      highest = seq;
    }
  }
  return highest;
}

export interface NewTransaction {
  readonly id: string;
  readonly kind: TransactionKind;
  readonly amount: number;
  readonly balanceAfter: number;
  readonly timestamp: string;
  readonly description?: string | null | undefined;
}

/**
 * Build an immutable transaction record.
 */
export function createTransaction(fields: NewTransaction): Transaction {
  return Object.freeze({
    id: fields.id,
    kind: fields.kind,
    amount: fields.amount,
    balanceAfter: fields.balanceAfter,
    timestamp: fields.timestamp,
    description: fields.description ?? null,
  });
}
