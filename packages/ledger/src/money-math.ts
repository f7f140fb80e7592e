/**
 * @strongbox/ledger — Deterministic monetary arithmetic.
 *
 * Public amounts are plain numbers. Internally every amount and balance is
 * a bigint scaled by the ledger's decimals, so sums never drift.
 *
 * Rules:
 * - No floating-point accumulation
 * - Numbers are rounded half away from zero to the configured decimals
 *   on the way in, so 0.1 + 0.2 enters as 0.3
 * - Display is always two fractional digits, rounded the same way
 */

import { LedgerError } from "./types.js";

/** Fractional digits in user-facing text. */
export const DISPLAY_DECIMALS = 2;

/** Default fractional digits kept by a ledger. */
export const DEFAULT_DECIMALS = 6;

export const MAX_DECIMALS = 8;

const MAX_SCALED = BigInt(Number.MAX_SAFE_INTEGER);

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  // Optional minus, digits, optional decimal point + digits
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the ledger keeps ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Round a number half away from zero to `decimals` fractional digits and
 * return it scaled. Works on the shortest decimal text of the number, so
 * 1.005 rounds to 1.01 at two decimals even though its binary value is
 * slightly below.
 *
 * 0.30000000000000004 with decimals=6 → 300000n
 * -2.5 with decimals=0 → -3n
 */
export function roundToScaled(amount: number, decimals: number): bigint {
  const negative = amount < 0;
  const text = String(Math.abs(amount));

  let scaled: bigint;
  if (/^\d+(\.\d+)?$/.test(text)) {
    const [intPart = "0", fracPart = ""] = text.split(".");
    const kept = BigInt(intPart + fracPart.padEnd(decimals, "0").slice(0, decimals));
    scaled = (fracPart[decimals] ?? "0") >= "5" ? kept + 1n : kept;
  } else {
    // Exponent notation (tiny values) falls back to toFixed
    scaled = parseAmount(Math.abs(amount).toFixed(decimals), decimals);
  }

  return negative ? -scaled : scaled;
}

/**
 * Convert a number to its scaled bigint form, rounding to `decimals`.
 * Throws INVALID_AMOUNT when the number is not finite or out of range.
 */
export function toScaled(amount: number, decimals: number): bigint {
  if (!Number.isFinite(amount)) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be a finite number, got: ${String(amount)}`);
  }

  if (Math.abs(amount) * 10 ** decimals > Number.MAX_SAFE_INTEGER) {
    throw new LedgerError("INVALID_AMOUNT", `Amount is out of range: ${String(amount)}`);
  }

  return roundToScaled(amount, decimals);
}

/**
 * Convert a scaled bigint back to a number.
 */
export function fromScaled(scaled: bigint, decimals: number): number {
  return Number(formatAmount(scaled, decimals));
}

/**
 * Validate an amount supplied to a mutating operation.
 * Returns the scaled value; throws INVALID_AMOUNT unless amount > 0 and
 * still non-zero once rounded.
 */
export function assertPositiveAmount(amount: number, decimals: number, operation: string): bigint {
  const scaled = toScaled(amount, decimals);
  if (amount <= 0) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Invalid ${operation}: amount must be positive, got ${String(amount)}`,
    );
  }
  if (scaled === 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Invalid ${operation}: amount ${String(amount)} rounds to zero at ${String(decimals)} decimal places`,
    );
  }
  return scaled;
}

/**
 * Check that a scaled balance still converts to a number without loss.
 */
export function isWithinRange(scaled: bigint): boolean {
  return scaled <= MAX_SCALED && scaled >= -MAX_SCALED;
}

/**
 * Render an amount with two fractional digits.
 *
 * 1000 → "1000.00"
 * 1.005 → "1.01"
 */
export function formatMoney(amount: number): string {
  return formatAmount(roundToScaled(amount, DISPLAY_DECIMALS), DISPLAY_DECIMALS);
}
