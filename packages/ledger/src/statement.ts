/**
 * @strongbox/ledger — Display formatting.
 *
 * Pure functions from ledger objects to text. Nothing here reads or
 * changes state beyond what the caller passes in.
 */

import type { Transaction } from "@strongbox/types";
import type { Account } from "./account.js";
import { formatMoney } from "./money-math.js";

/** Transactions shown on a statement unless the caller asks otherwise. */
export const DEFAULT_STATEMENT_SIZE = 10;

const RULE_WIDTH = 60;
const SUMMARY_WIDTH = 50;

/**
 * "2024-01-15T10:00:00.000Z" → "2024-01-15 10:00"
 */
export function formatTimestamp(timestamp: string): string {
  return `${timestamp.slice(0, 10)} ${timestamp.slice(11, 16)}`;
}

/**
 * One statement line:
 * "  2024-01-15 10:00 | DEPOSIT    | $   1000.00 | Balance: $   1000.00"
 */
export function formatTransactionLine(txn: Transaction): string {
  return (
    `  ${formatTimestamp(txn.timestamp)} | ${txn.kind.padEnd(10)} | ` +
    `$${formatMoney(txn.amount).padStart(10)} | Balance: $${formatMoney(txn.balanceAfter).padStart(10)}`
  );
}

export function formatStatement(account: Account, limit: number = DEFAULT_STATEMENT_SIZE): string {
  const lines = [
    `Account Statement: ${account.accountId}`,
    `Owner: ${account.owner}`,
    `Current Balance: $${formatMoney(account.balance)}`,
    `Status: ${account.isActive ? "Active" : "Inactive"}`,
    "-".repeat(RULE_WIDTH),
    "Transactions:",
  ];

  const recent = account.recentTransactions(limit);
  if (recent.length === 0) {
    lines.push("  (no transactions)");
  }
  for (const txn of recent) {
    lines.push(formatTransactionLine(txn));
  }

  return lines.join("\n");
}

export function formatSummary(accounts: readonly Account[]): string {
  const lines = ["=".repeat(SUMMARY_WIDTH), "ACCOUNT SUMMARY", "=".repeat(SUMMARY_WIDTH)];

  for (const account of accounts) {
    const status = account.isActive ? "" : " [inactive]";
    lines.push(`${account.accountId}: ${account.owner} - $${formatMoney(account.balance)}${status}`);
  }

  lines.push("", `Total accounts: ${String(accounts.length)}`);
  return lines.join("\n");
}
