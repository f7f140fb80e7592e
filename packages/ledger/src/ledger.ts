/**
 * @strongbox/ledger — Core Ledger class.
 *
 * Account registry plus transfer orchestration. Every mutation is written
 * through to the snapshot store before the call returns; construction
 * reads the store back.
 *
 * API surface:
 * - createAccount() — Open an account, optionally with an initial deposit
 * - getAccount() / findAccount() / hasAccount() / getAccounts()
 * - deposit() / withdraw() — Single-account mutations by ID
 * - transfer() — Two-phase move between two accounts
 * - activateAccount() / deactivateAccount()
 * - getTotalBalance() / stats() / summary()
 * - toState() / stateHash() / save()
 *
 * Accounts are never removed.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AccountState, LedgerState, Transaction } from "@strongbox/types";
import {
  InMemorySnapshotStore,
  computeStateHash,
  isSnapshotStoreError,
} from "@strongbox/snapshot-store";
import type { SnapshotStore } from "@strongbox/snapshot-store";
import { Account } from "./account.js";
import {
  DEFAULT_DECIMALS,
  MAX_DECIMALS,
  formatMoney,
  fromScaled,
  toScaled,
} from "./money-math.js";
import { formatSummary } from "./statement.js";
import { formatAccountId, highestSequence } from "./transaction.js";
import type {
  AccountChange,
  CorruptSnapshotPolicy,
  LedgerOptions,
  LedgerStats,
} from "./types.js";
import { LedgerError, isLedgerError } from "./types.js";

const ACCOUNT_ID_PREFIX = "ACC-";

/**
 * Account registry with write-through snapshot persistence.
 *
 * Single writer: every operation is synchronous, so no two mutations or
 * snapshot writes ever interleave.
 */
export class Ledger {
  private readonly _accounts = new Map<string, Account>();
  private _accountCounter = 0;

  private readonly _store: SnapshotStore;
  private readonly _log: Logger;
  private readonly _decimals: number;
  private readonly _clock: () => Date;

  /** While set, account changes are not persisted one by one. */
  private _batching = false;

  constructor(options: LedgerOptions = {}) {
    const decimals = options.decimals ?? DEFAULT_DECIMALS;
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
      throw new LedgerError(
        "INVALID_DECIMALS",
        `decimals must be an integer between 0 and ${String(MAX_DECIMALS)}, got: ${String(decimals)}`,
      );
    }

    this._decimals = decimals;
    this._store = options.store ?? new InMemorySnapshotStore();
    this._log = (options.logger ?? pino({ level: "silent" })).child({ component: "ledger" });
    this._clock = options.clock ?? (() => new Date());

    this._hydrate(options.onCorruptSnapshot ?? "fallback");
  }

  // ─── Account Management ──────────────────────────────────────────────

  /**
   * Open a new account.
   *
   * A positive initial deposit is recorded through the normal deposit
   * path, so it becomes the account's first transaction.
   */
  createAccount(owner: string, initialDeposit = 0): Account {
    if (owner.trim() === "") {
      throw new LedgerError("INVALID_OWNER", "Account owner must not be empty");
    }

    const initial = toScaled(initialDeposit, this._decimals);
    if (initial < 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Invalid initial deposit: amount cannot be negative ($${formatMoney(initialDeposit)})`,
      );
    }

    const account = this._batch(() => {
      this._accountCounter += 1;
      const created = this._newAccount(formatAccountId(this._accountCounter), owner);
      this._accounts.set(created.accountId, created);

      if (initial > 0n) {
        created.deposit(initialDeposit, "Initial deposit");
      }
      return created;
    });

    this._log.info(
      { accountId: account.accountId, owner, initialBalance: account.balance },
      "Account created",
    );
    return account;
  }

  /**
   * Get an account by ID. Throws ACCOUNT_NOT_FOUND if absent.
   */
  getAccount(accountId: string): Account {
    const account = this._accounts.get(accountId);
    if (account === undefined) {
      throw new LedgerError("ACCOUNT_NOT_FOUND", `Account not found: ${accountId}`);
    }
    return account;
  }

  /**
   * Get an account by ID, or undefined.
   */
  findAccount(accountId: string): Account | undefined {
    return this._accounts.get(accountId);
  }

  hasAccount(accountId: string): boolean {
    return this._accounts.has(accountId);
  }

  /**
   * All accounts in creation order.
   */
  getAccounts(): readonly Account[] {
    return [...this._accounts.values()];
  }

  get accountCount(): number {
    return this._accounts.size;
  }

  activateAccount(accountId: string): Account {
    const account = this.getAccount(accountId);
    account.activate();
    return account;
  }

  deactivateAccount(accountId: string): Account {
    const account = this.getAccount(accountId);
    account.deactivate();
    return account;
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  deposit(accountId: string, amount: number, description?: string): Transaction {
    return this.getAccount(accountId).deposit(amount, description);
  }

  withdraw(accountId: string, amount: number, description?: string): Transaction {
    return this.getAccount(accountId).withdraw(amount, description);
  }

  /**
   * Move `amount` from one account to another.
   *
   * Two-phase:
   * 1. Validate the withdrawal leg, then the deposit leg. Any failure
   *    here leaves both accounts untouched.
   * 2. Withdraw from the source, deposit to the destination, persist once.
   *
   * @returns [withdrawal, deposit]
   */
  transfer(
    fromId: string,
    toId: string,
    amount: number,
    description?: string,
  ): readonly [Transaction, Transaction] {
    const from = this.getAccount(fromId);
    const to = this.getAccount(toId);

    if (fromId === toId) {
      throw new LedgerError(
        "SAME_ACCOUNT_TRANSFER",
        `Cannot transfer from an account to itself: ${fromId}`,
      );
    }

    // Phase 1
    from.assertCanWithdraw(amount);
    to.assertCanDeposit(amount);

    // Phase 2
    const suffix = description !== undefined && description !== "" ? `: ${description}` : "";
    const result = this._batch(() => {
      const withdrawal = from.withdraw(amount, `Transfer to ${toId}${suffix}`);
      const deposit = to.deposit(amount, `Transfer from ${fromId}${suffix}`);
      return [withdrawal, deposit] as const;
    });

    this._log.info({ from: fromId, to: toId, amount }, "Transfer completed");
    return result;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Sum of balances over active accounts. Inactive accounts are left out.
   */
  getTotalBalance(): number {
    let total = 0n;
    for (const account of this._accounts.values()) {
      if (account.isActive) {
        total += account.scaledBalance;
      }
    }
    return fromScaled(total, this._decimals);
  }

  stats(): LedgerStats {
    let activeAccounts = 0;
    let totalTransactions = 0;

    for (const account of this._accounts.values()) {
      if (account.isActive) {
        activeAccounts += 1;
      }
      totalTransactions += account.transactionCount;
    }

    return {
      totalAccounts: this._accounts.size,
      activeAccounts,
      inactiveAccounts: this._accounts.size - activeAccounts,
      totalTransactions,
      totalBalance: this.getTotalBalance(),
    };
  }

  /**
   * Display text listing every account and its balance.
   */
  summary(): string {
    return formatSummary(this.getAccounts());
  }

  get decimals(): number {
    return this._decimals;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * The full state, as written to the snapshot store.
   */
  toState(): LedgerState {
    const accounts: Record<string, AccountState> = {};
    for (const [id, account] of this._accounts) {
      accounts[id] = account.toState();
    }
    return { accounts, accountCounter: this._accountCounter };
  }

  /**
   * SHA-256 over the canonical state. Equal hashes mean equal ledgers.
   */
  stateHash(): string {
    return computeStateHash(this.toState());
  }

  /**
   * Write the current state to the store.
   * Mutations already do this; call it for an explicit final flush.
   */
  save(): void {
    this._store.save(this.toState());
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private readonly _onAccountChange = (change: AccountChange): void => {
    if (change.type === "transaction") {
      const txn = change.transaction;
      this._log.info(
        {
          accountId: change.accountId,
          transactionId: txn.id,
          kind: txn.kind,
          amount: txn.amount,
          balance: txn.balanceAfter,
        },
        txn.kind === "DEPOSIT" ? "Deposit recorded" : "Withdrawal recorded",
      );
    } else {
      this._log.info(
        { accountId: change.accountId, isActive: change.isActive },
        change.isActive ? "Account activated" : "Account deactivated",
      );
    }

    if (!this._batching) {
      this.save();
    }
  };

  /**
   * Run several changes and persist once at the end.
   */
  private _batch<T>(fn: () => T): T {
    this._batching = true;
    let result: T;
    try {
      result = fn();
    } finally {
      this._batching = false;
    }
    this.save();
    return result;
  }

  private _newAccount(accountId: string, owner: string): Account {
    return new Account({
      accountId,
      owner,
      createdAt: this._clock().toISOString(),
      decimals: this._decimals,
      clock: this._clock,
      listener: this._onAccountChange,
    });
  }

  private _hydrate(policy: CorruptSnapshotPolicy): void {
    try {
      this._restore(this._store.load());
    } catch (err) {
      if (policy === "fallback" && isSnapshotStoreError(err, "DECODE_FAILURE")) {
        this._log.warn({ err }, "Snapshot unreadable, starting with an empty ledger");
        return;
      }
      throw err;
    }

    this._log.info(
      { accounts: this._accounts.size, accountCounter: this._accountCounter },
      "Ledger loaded",
    );
  }

  /**
   * Replace in-memory state with `state`. All-or-nothing: accounts are
   * built first and only installed once every one of them is valid.
   *
   * A readable document this ledger cannot hold (a balance beyond the safe
   * range at its decimals) is SNAPSHOT_MISMATCH, never DECODE_FAILURE, so
   * the empty-ledger fallback cannot overwrite it.
   */
  private _restore(state: LedgerState): void {
    const restored: Account[] = [];

    try {
      for (const accountState of Object.values(state.accounts)) {
        restored.push(
          Account.fromState(accountState, {
            decimals: this._decimals,
            clock: this._clock,
            listener: this._onAccountChange,
          }),
        );
      }
    } catch (err) {
      if (isLedgerError(err)) {
        throw new LedgerError(
          "SNAPSHOT_MISMATCH",
          `Snapshot does not fit this ledger: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }

    for (const account of restored) {
      this._accounts.set(account.accountId, account);
    }

    this._accountCounter = Math.max(
      state.accountCounter,
      highestSequence(this._accounts.keys(), ACCOUNT_ID_PREFIX),
    );
  }
}
