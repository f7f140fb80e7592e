/**
 * @strongbox/types — Shared data types for the Strongbox ledger.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

export type { Transaction, TransactionKind } from "./financial.js";
export { TRANSACTION_KINDS } from "./financial.js";

export type { AccountState, LedgerState } from "./state.js";
export { emptyLedgerState } from "./state.js";
