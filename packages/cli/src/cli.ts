/**
 * @strongbox/cli — Command runner.
 *
 * One invocation runs one command against the ledger persisted at
 * STRONGBOX_DATA_FILE and returns the process exit code:
 *
 *   0  success
 *   1  the ledger or the snapshot store rejected the operation
 *   2  bad command line
 */

import { parseArgs } from "node:util";
import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import { Ledger, formatMoney, isLedgerError } from "@strongbox/ledger";
import { FileSnapshotStore, isSnapshotStoreError } from "@strongbox/snapshot-store";
import type { SnapshotStore } from "@strongbox/snapshot-store";
import type { AppConfig } from "./config.js";

// =============================================================================
// Types
// =============================================================================

export interface Output {
  write(chunk: string): unknown;
}

export interface CliContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly stdout: Output;
  readonly stderr: Output;

  /** Force colour on or off. Default: chalk's own detection. */
  readonly color?: boolean | undefined;

  /** Default: a FileSnapshotStore at config.STRONGBOX_DATA_FILE */
  readonly store?: SnapshotStore | undefined;

  readonly clock?: (() => Date) | undefined;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * A malformed command line. Never reaches the ledger.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// =============================================================================
// Command Table
// =============================================================================

interface CommandSpec {
  readonly args: string;
  readonly min: number;
  readonly max: number;
  readonly summary: string;
}

const COMMANDS = {
  create: { args: "<owner> [initial]", min: 1, max: 2, summary: "Open an account" },
  deposit: { args: "<id> <amount> [description]", min: 2, max: 3, summary: "Deposit into an account" },
  withdraw: { args: "<id> <amount> [description]", min: 2, max: 3, summary: "Withdraw from an account" },
  transfer: {
    args: "<from> <to> <amount> [description]",
    min: 3,
    max: 4,
    summary: "Move funds between two accounts",
  },
  statement: { args: "<id>", min: 1, max: 1, summary: "Show recent transactions" },
  summary: { args: "", min: 0, max: 0, summary: "List every account" },
  total: { args: "", min: 0, max: 0, summary: "Total balance of active accounts" },
  stats: { args: "", min: 0, max: 0, summary: "Account and transaction counts" },
  deactivate: { args: "<id>", min: 1, max: 1, summary: "Freeze an account" },
  activate: { args: "<id>", min: 1, max: 1, summary: "Unfreeze an account" },
} as const satisfies Record<string, CommandSpec>;

type CommandName = keyof typeof COMMANDS;

function isCommand(name: string): name is CommandName {
  return Object.hasOwn(COMMANDS, name);
}

export function usage(): string {
  const lines = ["Usage: strongbox <command> [arguments]", "", "Commands:"];
  for (const [name, spec] of Object.entries(COMMANDS)) {
    lines.push(`  ${`${name} ${spec.args}`.padEnd(42)}${spec.summary}`);
  }
  lines.push(
    "",
    "Options:",
    `  ${"-n, --limit <count>".padEnd(42)}Transactions shown by statement`,
    `  ${"-h, --help".padEnd(42)}Show this help`,
  );
  return lines.join("\n");
}

// =============================================================================
// Argument Parsing
// =============================================================================

interface Invocation {
  readonly help: boolean;
  readonly command: CommandName | undefined;
  readonly positionals: readonly string[];
  readonly limit: number | undefined;
}

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        help: { type: "boolean", short: "h" },
        limit: { type: "string", short: "n" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function parseInvocation(argv: readonly string[]): Invocation {
  const parsed = parseCommandLine(argv);
  const [name, ...positionals] = parsed.positionals;
  const help = parsed.values.help ?? false;

  if (name === undefined) {
    if (help) {
      return { help, command: undefined, positionals: [], limit: undefined };
    }
    throw new UsageError("No command given");
  }
  if (!isCommand(name)) {
    throw new UsageError(`Unknown command "${name}"`);
  }

  const spec: CommandSpec = COMMANDS[name];
  if (!help && (positionals.length < spec.min || positionals.length > spec.max)) {
    throw new UsageError(`${name} expects ${spec.args === "" ? "no arguments" : spec.args}`);
  }

  if (parsed.values.limit !== undefined && name !== "statement" && !help) {
    throw new UsageError("--limit only applies to statement");
  }

  const limit = parsed.values.limit === undefined ? undefined : parseLimit(parsed.values.limit);
  return { help, command: name, positionals, limit };
}

/** Plain decimal notation only: no hex, binary or exponent forms. */
function parseAmountArg(text: string): number {
  if (!/^-?\d+(\.\d+)?$/.test(text)) {
    throw new UsageError(`Invalid amount: "${text}"`);
  }
  return Number(text);
}

function parseLimit(text: string): number {
  if (!/^\d+$/.test(text) || Number(text) < 1) {
    throw new UsageError(`Invalid limit: "${text}"`);
  }
  return Number(text);
}

/** Positional `index`, already checked against the command's arity. */
function arg(positionals: readonly string[], index: number): string {
  const value = positionals[index];
  if (value === undefined) {
    throw new UsageError(`Missing argument ${String(index + 1)}`);
  }
  return value;
}

// =============================================================================
// Runner
// =============================================================================

/**
 * Run one command. Never throws for ledger, store or usage errors; those
 * are written to stderr and reflected in the exit code.
 */
export function runCli(argv: readonly string[], ctx: CliContext): number {
  const paint: ChalkInstance =
    ctx.color === undefined ? chalk : new Chalk({ level: ctx.color ? 1 : 0 });
  const out = (line: string): void => {
    ctx.stdout.write(`${line}\n`);
  };
  const fail = (message: string): void => {
    ctx.stderr.write(`${paint.red(`Error: ${message}`)}\n`);
  };

  try {
    const invocation = parseInvocation(argv);
    if (invocation.help || invocation.command === undefined) {
      out(usage());
      return EXIT_OK;
    }

    const ledger = new Ledger({
      store:
        ctx.store ??
        new FileSnapshotStore({ filePath: ctx.config.STRONGBOX_DATA_FILE, logger: ctx.logger }),
      logger: ctx.logger,
      decimals: ctx.config.STRONGBOX_DECIMALS,
      onCorruptSnapshot: ctx.config.STRONGBOX_ON_CORRUPT,
      clock: ctx.clock,
    });

    execute(ledger, invocation.command, invocation, ctx.config, out, paint);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof UsageError) {
      fail(err.message);
      ctx.stderr.write(`Run "strongbox --help" for usage.\n`);
      return EXIT_USAGE;
    }
    if (isLedgerError(err) || isSnapshotStoreError(err)) {
      ctx.logger.debug({ err }, "Command failed");
      fail(err.message);
      return EXIT_FAILURE;
    }
    throw err;
  }
}

function execute(
  ledger: Ledger,
  command: CommandName,
  invocation: Invocation,
  config: AppConfig,
  out: (line: string) => void,
  paint: ChalkInstance,
): void {
  const p = invocation.positionals;

  switch (command) {
    case "create": {
      const initial = p[1] === undefined ? 0 : parseAmountArg(p[1]);
      const account = ledger.createAccount(arg(p, 0), initial);
      out(
        paint.green(
          `Created ${account.accountId} for ${account.owner} with balance $${formatMoney(account.balance)}`,
        ),
      );
      return;
    }

    case "deposit": {
      const txn = ledger.deposit(arg(p, 0), parseAmountArg(arg(p, 1)), p[2]);
      out(
        paint.green(
          `Deposited $${formatMoney(txn.amount)} to ${arg(p, 0)} (${txn.id}). ` +
            `Balance: $${formatMoney(txn.balanceAfter)}`,
        ),
      );
      return;
    }

    case "withdraw": {
      const txn = ledger.withdraw(arg(p, 0), parseAmountArg(arg(p, 1)), p[2]);
      out(
        paint.green(
          `Withdrew $${formatMoney(txn.amount)} from ${arg(p, 0)} (${txn.id}). ` +
            `Balance: $${formatMoney(txn.balanceAfter)}`,
        ),
      );
      return;
    }

    case "transfer": {
      const [withdrawal] = ledger.transfer(arg(p, 0), arg(p, 1), parseAmountArg(arg(p, 2)), p[3]);
      out(
        paint.green(
          `Transferred $${formatMoney(withdrawal.amount)} from ${arg(p, 0)} to ${arg(p, 1)}`,
        ),
      );
      return;
    }

    case "statement":
      out(
        ledger
          .getAccount(arg(p, 0))
          .statement(invocation.limit ?? config.STRONGBOX_STATEMENT_SIZE),
      );
      return;

    case "summary":
      out(ledger.summary());
      return;

    case "total":
      out(`Total balance (active accounts): $${formatMoney(ledger.getTotalBalance())}`);
      return;

    case "stats": {
      const stats = ledger.stats();
      out(
        `Accounts: ${String(stats.totalAccounts)} ` +
          `(${String(stats.activeAccounts)} active, ${String(stats.inactiveAccounts)} inactive)`,
      );
      out(`Transactions: ${String(stats.totalTransactions)}`);
      out(`Total balance: $${formatMoney(stats.totalBalance)}`);
      return;
    }

    case "deactivate":
      ledger.deactivateAccount(arg(p, 0));
      out(paint.yellow(`Deactivated ${arg(p, 0)}`));
      return;

    case "activate":
      ledger.activateAccount(arg(p, 0));
      out(paint.green(`Activated ${arg(p, 0)}`));
      return;
  }
}
