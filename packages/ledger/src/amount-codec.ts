/**
 * @tally/ledger — Amount codec.
 *
 * Converts decimal amounts to and from the exact numerator/denominator
 * pair stored on each split.
 *
 * Rules:
 * - The denominator is always a power of ten between 10^minScale and 10^maxScale
 * - Digits beyond maxScale round half-up (away from zero)
 * - A missing or zero denominator reads as 1
 */

import type { Amount } from "@tally/types";
import { AMOUNT_SCALE, formatAmount } from "./money-math.js";
import { ValidationError } from "./types.js";

export interface Fraction {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

const AMOUNT_PATTERN = /^(-?)(\d+)(?:\.(\d+))?$/;

function assertScale(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > AMOUNT_SCALE) {
    throw new RangeError(`${name} must be an integer between 0 and ${String(AMOUNT_SCALE)}, got ${String(value)}`);
  }
}

/**
 * Encode a decimal amount as an exact fraction.
 *
 * The scale is the amount's own number of fractional digits, clamped to
 * [minScale, maxScale]:
 *
 *   "100"       → 10000 / 100
 *   "12.345"    → 12345 / 1000
 *   "0.1234567" → 123457 / 1000000
 */
export function toFraction(amount: Amount, minScale = 2, maxScale = AMOUNT_SCALE): Fraction {
  assertScale("minScale", minScale);
  assertScale("maxScale", maxScale);
  if (minScale > maxScale) {
    throw new RangeError(`minScale (${String(minScale)}) exceeds maxScale (${String(maxScale)})`);
  }

  const match = AMOUNT_PATTERN.exec(typeof amount === "string" ? amount.trim() : "");
  if (match === null) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const negative = match[1] === "-";
  const intPart = match[2] ?? "0";
  const fracPart = match[3] ?? "";
  const scale = Math.min(Math.max(fracPart.length, minScale), maxScale);

  let magnitude = BigInt(intPart + fracPart.slice(0, scale).padEnd(scale, "0"));
  const firstDropped = fracPart.charAt(scale);
  if (firstDropped !== "" && firstDropped >= "5") {
    magnitude += 1n;
  }

  return {
    numerator: negative ? -magnitude : magnitude,
    denominator: 10n ** BigInt(scale),
  };
}

/**
 * Value of a fraction scaled by 10^6, rounded half-up (away from zero).
 * Exact for every power-of-ten denominator up to 10^6.
 */
export function fractionToScaled(numerator: bigint, denominator?: bigint | null): bigint {
  let num = numerator;
  let den = denominator === undefined || denominator === null || denominator === 0n ? 1n : denominator;
  if (den < 0n) {
    num = -num;
    den = -den;
  }

  const product = num * 10n ** BigInt(AMOUNT_SCALE);
  const quotient = product / den;
  const remainder = product % den;
  const absRemainder = remainder < 0n ? -remainder : remainder;

  if (absRemainder * 2n >= den) {
    return product < 0n ? quotient - 1n : quotient + 1n;
  }
  return quotient;
}

/**
 * Decode a stored fraction back to a canonical decimal amount.
 *
 *   10000 / 100 → "100.00"
 *   -5 / 0      → "-5.00"
 */
export function fromFraction(numerator: bigint, denominator?: bigint | null): Amount {
  return formatAmount(fractionToScaled(numerator, denominator));
}

/**
 * Exact sum of decimal amounts, scaled to the longest fractional part
 * present. Nothing is rounded.
 *
 *   ["1.0000004", "-1.0000001"] → 3 / 10000000
 */
export function sumExact(amounts: Iterable<Amount>): Fraction {
  const parts: { readonly negative: boolean; readonly digits: string; readonly scale: number }[] = [];
  let scale = 0;
  for (const amount of amounts) {
    const match = AMOUNT_PATTERN.exec(typeof amount === "string" ? amount.trim() : "");
    if (match === null) {
      throw new ValidationError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
    }
    const fracPart = match[3] ?? "";
    parts.push({ negative: match[1] === "-", digits: (match[2] ?? "0") + fracPart, scale: fracPart.length });
    scale = Math.max(scale, fracPart.length);
  }

  let numerator = 0n;
  for (const part of parts) {
    const magnitude = BigInt(part.digits) * 10n ** BigInt(scale - part.scale);
    numerator += part.negative ? -magnitude : magnitude;
  }
  return { numerator, denominator: 10n ** BigInt(scale) };
}

/**
 * Exact decimal text of a power-of-ten fraction, at least 2 decimals.
 *
 *   3 / 10000000 → "0.0000003"
 */
export function fractionToDecimal(fraction: Fraction): Amount {
  const scale = fraction.denominator.toString().length - 1;
  if (scale <= AMOUNT_SCALE) {
    return fromFraction(fraction.numerator, fraction.denominator);
  }
  const negative = fraction.numerator < 0n;
  const digits = (negative ? -fraction.numerator : fraction.numerator).toString().padStart(scale + 1, "0");
  const fracPart = digits.slice(digits.length - scale).replace(/0+$/, "").padEnd(2, "0");
  return `${negative ? "-" : ""}${digits.slice(0, digits.length - scale)}.${fracPart}`;
}
