/**
 * @tally/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint scaled by 10^6.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings with at most 6 fractional digits
 * - Results are canonical: at least 2 fractional digits, no trailing zeros beyond that
 */

import type { Amount } from "@tally/types";
import { ValidationError } from "./types.js";

/** Fractional digits carried by every scaled amount. */
export const AMOUNT_SCALE = 6;

const MIN_DISPLAY_DECIMALS = 2;

// ─── Conversion ──────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by 10^6.
 *
 * "100.50" → 100500000n
 * "-0.25" → -250000n
 */
export function parseAmount(amount: string): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > AMOUNT_SCALE) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(AMOUNT_SCALE)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(AMOUNT_SCALE, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a canonical decimal string.
 *
 * 100500000n → "100.50"
 * 1234567n → "1.234567"
 * 0n → "0.00"
 */
export function formatAmount(scaled: bigint): Amount {
  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(AMOUNT_SCALE + 1, "0");
  const intPart = str.slice(0, str.length - AMOUNT_SCALE);
  let fracPart = str.slice(str.length - AMOUNT_SCALE);

  while (fracPart.length > MIN_DISPLAY_DECIMALS && fracPart.endsWith("0")) {
    fracPart = fracPart.slice(0, -1);
  }

  const result = `${intPart}.${fracPart}`;
  return negative ? `-${result}` : result;
}

/** Normalize any valid amount to its canonical string. */
export function normalizeAmount(amount: Amount): Amount {
  return formatAmount(parseAmount(amount));
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function negateAmount(amount: Amount): Amount {
  return formatAmount(-parseAmount(amount));
}

/** Sum a list of amounts. An empty list sums to "0.00". */
export function sumAmounts(amounts: Iterable<Amount>): Amount {
  let total = 0n;
  for (const amount of amounts) {
    total += parseAmount(amount);
  }
  return formatAmount(total);
}

// ─── Comparison ──────────────────────────────────────────────────────────

/**
 * Compare two amounts by value. Returns -1, 0, or 1.
 */
export function compareAmounts(a: Amount, b: Amount): -1 | 0 | 1 {
  const va = parseAmount(a);
  const vb = parseAmount(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function isZeroAmount(amount: Amount): boolean {
  return parseAmount(amount) === 0n;
}

export function isPositiveAmount(amount: Amount): boolean {
  return parseAmount(amount) > 0n;
}

/** True when `|a - b| < tolerance`. */
export function withinTolerance(a: Amount, b: Amount, tolerance: Amount): boolean {
  const diff = parseAmount(a) - parseAmount(b);
  const abs = diff < 0n ? -diff : diff;
  return abs < parseAmount(tolerance);
}
