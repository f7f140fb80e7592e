/**
 * @strongbox/ledger — Types for the ledger engine.
 *
 * Rules:
 * - Records handed out are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Every failure carries a code callers can branch on
 */

import type { Logger } from "pino";
import type { Transaction } from "@strongbox/types";
import type { SnapshotStore } from "@strongbox/snapshot-store";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_FUNDS"
  | "INACTIVE_ACCOUNT"
  | "ACCOUNT_NOT_FOUND"
  | "SAME_ACCOUNT_TRANSFER"
  | "INVALID_OWNER"
  | "INVALID_DECIMALS"
  | "SNAPSHOT_MISMATCH";

/**
 * Structured error from the ledger engine.
 * Always thrown before any state changes.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

export interface InsufficientFundsDetails {
  readonly accountId: string;
  readonly balance: number;
  readonly amount: number;
  /** amount - balance */
  readonly shortfall: number;
}

/**
 * A withdrawal (or the withdrawal leg of a transfer) exceeded the balance.
 */
export class InsufficientFundsError extends LedgerError implements InsufficientFundsDetails {
  public readonly accountId: string;
  public readonly balance: number;
  public readonly amount: number;
  public readonly shortfall: number;

  constructor(details: InsufficientFundsDetails, message: string) {
    super("INSUFFICIENT_FUNDS", message);
    this.name = "InsufficientFundsError";
    this.accountId = details.accountId;
    this.balance = details.balance;
    this.amount = details.amount;
    this.shortfall = details.shortfall;
  }
}

/**
 * Narrow an unknown thrown value to a LedgerError, optionally of one code.
 */
export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  return err instanceof LedgerError && (code === undefined || err.code === code);
}

// ─── Account Change Notifications ────────────────────────────────────────

/**
 * Emitted by an Account after it has changed.
 */
export type AccountChange =
  | { readonly type: "transaction"; readonly accountId: string; readonly transaction: Transaction }
  | { readonly type: "status"; readonly accountId: string; readonly isActive: boolean };

export type AccountListener = (change: AccountChange) => void;

// ─── Ledger Options ──────────────────────────────────────────────────────

/**
 * What to do when the persisted snapshot cannot be decoded on startup.
 *
 * - "fallback": log a warning and start from an empty ledger
 * - "throw": rethrow the decode failure from the constructor
 */
export type CorruptSnapshotPolicy = "fallback" | "throw";

export interface LedgerOptions {
  /** Where state is persisted. Default: a fresh InMemorySnapshotStore. */
  readonly store?: SnapshotStore | undefined;

  /** Default: a silent pino logger. */
  readonly logger?: Logger | undefined;

  /** Fractional digits kept for every amount (0-8). Default: 6. */
  readonly decimals?: number | undefined;

  /** Default: "fallback". */
  readonly onCorruptSnapshot?: CorruptSnapshotPolicy | undefined;

  /** Source of transaction and account timestamps. Default: `() => new Date()`. */
  readonly clock?: (() => Date) | undefined;
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Read-only aggregate over all accounts.
 */
export interface LedgerStats {
  readonly totalAccounts: number;
  readonly activeAccounts: number;
  readonly inactiveAccounts: number;
  readonly totalTransactions: number;
  /** Sum of active balances, as getTotalBalance() */
  readonly totalBalance: number;
}
