/**
 * @strongbox/ledger — Account ledger engine.
 *
 * Accounts with non-negative balances and append-only transaction logs,
 * a registry that mints account IDs, two-phase transfers, and
 * write-through persistence to a snapshot store.
 *
 * Design rules:
 * - Every check runs before any state changes
 * - Balances are tracked as scaled bigints; numbers only at the boundary
 * - Failures are LedgerErrors with a code callers branch on
 */

// Core engine
export { Ledger } from "./ledger.js";
export { Account } from "./account.js";
export type { AccountInit } from "./account.js";

// Transactions and IDs
export {
  createTransaction,
  formatAccountId,
  formatTransactionId,
  parseSequence,
} from "./transaction.js";
export type { NewTransaction } from "./transaction.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  toScaled,
  fromScaled,
  roundToScaled,
  assertPositiveAmount,
  formatMoney,
  DEFAULT_DECIMALS,
  DISPLAY_DECIMALS,
  MAX_DECIMALS,
} from "./money-math.js";

// Display
export {
  formatStatement,
  formatSummary,
  formatTransactionLine,
  formatTimestamp,
  DEFAULT_STATEMENT_SIZE,
} from "./statement.js";

// Types
export type {
  LedgerErrorCode,
  InsufficientFundsDetails,
  AccountChange,
  AccountListener,
  CorruptSnapshotPolicy,
  LedgerOptions,
  LedgerStats,
} from "./types.js";

export { LedgerError, InsufficientFundsError, isLedgerError } from "./types.js";
