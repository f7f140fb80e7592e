/**
 * @strongbox/snapshot-store — Snapshot document codec.
 *
 * Converts between LedgerState and the persisted JSON document:
 *
 *   {
 *     "accounts": {
 *       "ACC-000001": {
 *         "account_id": "ACC-000001", "owner": "Alice", "balance": 1150,
 *         "transactions": [{ "id": "ACC-000001-TXN-0001", "type": "DEPOSIT",
 *           "amount": 1000, "balance_after": 1000,
 *           "timestamp": "2024-01-15T10:00:00.000Z", "description": null }],
 *         "created_at": "2024-01-15T10:00:00.000Z",
 *         "_transaction_counter": 1,
 *         "is_active": true
 *       }
 *     },
 *     "_account_counter": 1
 *   }
 *
 * Counters and `is_active` are optional on read. Decoding also checks the
 * invariants a ledger relies on, so a hand-edited document that breaks
 * them is rejected instead of loaded.
 */

import { z } from "zod";
import { TRANSACTION_KINDS } from "@strongbox/types";
import type { AccountState, LedgerState } from "@strongbox/types";
import { SnapshotStoreError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const TransactionRecordSchema = z.object({
  id: z.string().min(1),
  type: z.enum(TRANSACTION_KINDS),
  amount: z.number().finite().positive(),
  balance_after: z.number().finite().nonnegative(),
  timestamp: z.string().min(1),
  description: z.string().nullish(),
});

export const AccountRecordSchema = z.object({
  account_id: z.string().min(1),
  owner: z.string(),
  balance: z.number().finite().nonnegative(),
  transactions: z.array(TransactionRecordSchema),
  created_at: z.string().min(1),
  _transaction_counter: z.number().int().nonnegative().optional(),
  is_active: z.boolean().optional(),
});

export const SnapshotDocumentSchema = z
  .object({
    accounts: z.record(AccountRecordSchema).default({}),
    _account_counter: z.number().int().nonnegative().optional(),
  })
  .superRefine((doc, ctx) => {
    for (const [key, account] of Object.entries(doc.accounts)) {
      const path = ["accounts", key];

      if (account.account_id !== key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "account_id"],
          message: `account_id "${account.account_id}" does not match its key`,
        });
      }

      const last = account.transactions[account.transactions.length - 1];
      const expected = last === undefined ? 0 : last.balance_after;
      if (account.balance !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "balance"],
          message: `balance ${String(account.balance)} does not match the last balance_after (${String(expected)})`,
        });
      }

      const seen = new Set<string>();
      account.transactions.forEach((txn, index) => {
        if (seen.has(txn.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...path, "transactions", index, "id"],
            message: `duplicate transaction id "${txn.id}"`,
          });
        }
        seen.add(txn.id);
      });
    }
  });

/** The document as written. */
export type SnapshotDocument = z.input<typeof SnapshotDocumentSchema>;

type AccountRecord = z.input<typeof AccountRecordSchema>;

// =============================================================================
// Encode
// =============================================================================

export function encodeSnapshot(state: LedgerState): SnapshotDocument {
  const accounts: Record<string, AccountRecord> = {};

  for (const [id, account] of Object.entries(state.accounts)) {
    accounts[id] = {
      account_id: account.accountId,
      owner: account.owner,
      balance: account.balance,
      transactions: account.transactions.map((txn) => ({
        id: txn.id,
        type: txn.kind,
        amount: txn.amount,
        balance_after: txn.balanceAfter,
        timestamp: txn.timestamp,
        description: txn.description,
      })),
      created_at: account.createdAt,
      _transaction_counter: account.transactionCounter,
      is_active: account.isActive,
    };
  }

  return { accounts, _account_counter: state.accountCounter };
}

/**
 * Render the document text: two-space indented JSON.
 */
export function serializeSnapshot(state: LedgerState): string {
  return JSON.stringify(encodeSnapshot(state), null, 2);
}

// =============================================================================
// Decode
// =============================================================================

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) {
    return "unknown issue";
  }
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

function where(location: string | undefined): string {
  return location === undefined ? "" : ` in ${location}`;
}

/**
 * Validate a parsed document and convert it to a LedgerState.
 *
 * @throws SnapshotStoreError with code DECODE_FAILURE
 */
export function decodeSnapshot(raw: unknown, location?: string): LedgerState {
  const parsed = SnapshotDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotStoreError(
      "DECODE_FAILURE",
      `Invalid snapshot document${where(location)}: ${describeIssue(parsed.error)}`,
      location,
      { cause: parsed.error },
    );
  }

  const doc = parsed.data;
  const accounts: Record<string, AccountState> = {};

  for (const [id, record] of Object.entries(doc.accounts)) {
    accounts[id] = {
      accountId: record.account_id,
      owner: record.owner,
      balance: record.balance,
      isActive: record.is_active ?? true,
      transactions: record.transactions.map((txn) => ({
        id: txn.id,
        kind: txn.type,
        amount: txn.amount,
        balanceAfter: txn.balance_after,
        timestamp: txn.timestamp,
        description: txn.description ?? null,
      })),
      createdAt: record.created_at,
      transactionCounter: record._transaction_counter ?? record.transactions.length,
    };
  }

  return {
    accounts,
    accountCounter: doc._account_counter ?? Object.keys(doc.accounts).length,
  };
}

/**
 * Parse document text and decode it.
 *
 * @throws SnapshotStoreError with code DECODE_FAILURE
 */
export function parseSnapshot(text: string, location?: string): LedgerState {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SnapshotStoreError(
      "DECODE_FAILURE",
      `Invalid JSON${where(location)}: ${reason}`,
      location,
      { cause: err },
    );
  }
  return decodeSnapshot(raw, location);
}
