/**
 * @strongbox/ledger — Account.
 *
 * Owns a balance and an append-only transaction log.
 *
 * Rules:
 * - balance always equals the balanceAfter of the last transaction (0 if none)
 * - balance never goes negative
 * - Every check runs before any state changes
 * - A failed attempt does not consume a transaction ID
 */

import type { AccountState, Transaction, TransactionKind } from "@strongbox/types";
import {
  assertPositiveAmount,
  formatMoney,
  fromScaled,
  isWithinRange,
  toScaled,
} from "./money-math.js";
import { formatStatement, DEFAULT_STATEMENT_SIZE } from "./statement.js";
import { createTransaction, formatTransactionId, highestSequence } from "./transaction.js";
import type { AccountListener } from "./types.js";
import { InsufficientFundsError, LedgerError } from "./types.js";

export interface AccountInit {
  readonly accountId: string;
  readonly owner: string;
  readonly createdAt: string;
  readonly decimals: number;
  readonly clock: () => Date;
  readonly listener?: AccountListener | undefined;
}

export class Account {
  readonly accountId: string;
  readonly owner: string;
  readonly createdAt: string;

  private _balance = 0n;
  private _isActive = true;
  private readonly _transactions: Transaction[] = [];
  private _transactionCounter = 0;

  private readonly _decimals: number;
  private readonly _clock: () => Date;
  private readonly _listener: AccountListener | undefined;

  constructor(init: AccountInit) {
    this.accountId = init.accountId;
    this.owner = init.owner;
    this.createdAt = init.createdAt;
    this._decimals = init.decimals;
    this._clock = init.clock;
    this._listener = init.listener;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get balance(): number {
    return fromScaled(this._balance, this._decimals);
  }

  /** Balance in units of 10^-decimals. */
  get scaledBalance(): bigint {
    return this._balance;
  }

  get isActive(): boolean {
    return this._isActive;
  }

  /** Number of transaction IDs minted so far. */
  get transactionCounter(): number {
    return this._transactionCounter;
  }

  get transactions(): readonly Transaction[] {
    return [...this._transactions];
  }

  get transactionCount(): number {
    return this._transactions.length;
  }

  /**
   * The last `limit` transactions, oldest first.
   */
  recentTransactions(limit: number = DEFAULT_STATEMENT_SIZE): readonly Transaction[] {
    if (limit <= 0) {
      return [];
    }
    return this._transactions.slice(-limit);
  }

  /**
   * Display text for the last `limit` transactions.
   */
  statement(limit: number = DEFAULT_STATEMENT_SIZE): string {
    return formatStatement(this, limit);
  }

  // ─── Validation ──────────────────────────────────────────────────────

  /**
   * Run every deposit check without changing anything.
   * Returns the scaled amount.
   */
  assertCanDeposit(amount: number): bigint {
    this._assertActive();
    const scaled = assertPositiveAmount(amount, this._decimals, "deposit");
    if (!isWithinRange(this._balance + scaled)) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Deposit of $${formatMoney(amount)} would take ${this.accountId} beyond the maximum balance`,
      );
    }
    return scaled;
  }

  /**
   * Run every withdrawal check without changing anything.
   * Returns the scaled amount.
   */
  assertCanWithdraw(amount: number): bigint {
    this._assertActive();
    const scaled = assertPositiveAmount(amount, this._decimals, "withdrawal");
    if (scaled > this._balance) {
      const balance = this.balance;
      const requested = fromScaled(scaled, this._decimals);
      const shortfall = fromScaled(scaled - this._balance, this._decimals);
      throw new InsufficientFundsError(
        { accountId: this.accountId, balance, amount: requested, shortfall },
        `Insufficient funds in ${this.accountId}: balance $${formatMoney(balance)}, ` +
          `attempted $${formatMoney(requested)}, short $${formatMoney(shortfall)}`,
      );
    }
    return scaled;
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  deposit(amount: number, description?: string): Transaction {
    const scaled = this.assertCanDeposit(amount);
    this._balance += scaled;
    return this._record("DEPOSIT", scaled, description);
  }

  withdraw(amount: number, description?: string): Transaction {
    const scaled = this.assertCanWithdraw(amount);
    this._balance -= scaled;
    return this._record("WITHDRAWAL", scaled, description);
  }

  /** No-op when already active. */
  activate(): void {
    this._setActive(true);
  }

  /** No-op when already inactive. */
  deactivate(): void {
    this._setActive(false);
  }

  // ─── Serialization ───────────────────────────────────────────────────

  toState(): AccountState {
    return {
      accountId: this.accountId,
      owner: this.owner,
      balance: this.balance,
      isActive: this._isActive,
      transactions: [...this._transactions],
      createdAt: this.createdAt,
      transactionCounter: this._transactionCounter,
    };
  }

  /**
   * Rebuild an account from persisted state.
   *
   * Amounts and balances are rounded to the ledger's decimals, so a
   * document holding 0.30000000000000004 loads as 0.3. The counter is
   * raised to the highest sequence already in the log, so state written
   * with a separately numbered opening deposit (`…-TXN-0000`) or without
   * a counter never reissues an ID.
   *
   * @throws LedgerError INVALID_AMOUNT for a value beyond the safe range
   */
  static fromState(state: AccountState, init: Omit<AccountInit, "accountId" | "owner" | "createdAt">): Account {
    const account = new Account({
      ...init,
      accountId: state.accountId,
      owner: state.owner,
      createdAt: state.createdAt,
    });

    account._balance = toScaled(state.balance, init.decimals);
    account._isActive = state.isActive;
    for (const txn of state.transactions) {
      account._transactions.push(
        createTransaction({
          ...txn,
          amount: fromScaled(toScaled(txn.amount, init.decimals), init.decimals),
          balanceAfter: fromScaled(toScaled(txn.balanceAfter, init.decimals), init.decimals),
        }),
      );
    }

    const prefix = `${state.accountId}-TXN-`;
    account._transactionCounter = Math.max(
      state.transactionCounter,
      highestSequence(state.transactions.map((t) => t.id), prefix),
    );

    return account;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertActive(): void {
    if (!this._isActive) {
      throw new LedgerError("INACTIVE_ACCOUNT", `Account is inactive: ${this.accountId}`);
    }
  }

  private _record(kind: TransactionKind, scaled: bigint, description: string | undefined): Transaction {
    this._transactionCounter += 1;

    const transaction = createTransaction({
      id: formatTransactionId(this.accountId, this._transactionCounter),
      kind,
      amount: fromScaled(scaled, this._decimals),
      balanceAfter: this.balance,
      timestamp: this._clock().toISOString(),
      description,
    });
    this._transactions.push(transaction);

    this._listener?.({ type: "transaction", accountId: this.accountId, transaction });
    return transaction;
  }

  private _setActive(isActive: boolean): void {
    if (this._isActive === isActive) {
      return;
    }
    this._isActive = isActive;
    this._listener?.({ type: "status", accountId: this.accountId, isActive });
  }
}
