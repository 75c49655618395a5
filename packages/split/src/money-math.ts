/**
 * @splitrelay/split — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint cents internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations on amounts
 * - Amounts leaving this module always carry exactly 2 fractional digits
 * - Rounding is half-up on the decimal representation
 */

import { SplitError } from "./types.js";

/** Fractional digits carried by every amount handed to the ledger. */
export const MONEY_DECIMALS = 2;

/** Largest accepted difference between a sum of shares and the cost. */
export const BALANCE_TOLERANCE = 1n;

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const EXPONENT_PATTERN = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number = MONEY_DECIMALS): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new SplitError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new SplitError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new SplitError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(decimals)} allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Parse an amount without throwing. Returns undefined for anything
 * that is not a well-formed decimal string.
 */
export function safeParseAmount(amount: unknown, decimals: number = MONEY_DECIMALS): bigint | undefined {
  if (typeof amount !== "string") {
    return undefined;
  }
  try {
    return parseAmount(amount, decimals);
  } catch {
    return undefined;
  }
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n → "100.50"
 * 5n → "0.05"
 * -5025n → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number = MONEY_DECIMALS): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Round a decimal string of any precision to `decimals` places,
 * half-up (ties move away from zero).
 *
 * "10.005" → "10.01"
 * "10.004" → "10.00"
 * "67.5" → "67.50"
 */
export function roundAmount(amount: string, decimals: number = MONEY_DECIMALS): string {
  const trimmed = amount.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new SplitError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  const kept = BigInt(intPart + fracPart.slice(0, decimals).padEnd(decimals, "0"));
  const nextDigit = fracPart.charAt(decimals);
  const rounded = nextDigit !== "" && nextDigit >= "5" ? kept + 1n : kept;

  return formatAmount(negative ? -rounded : rounded, decimals);
}

/**
 * Rewrite a number's exponent form ("1e+21", "1.5e-7") as plain digits.
 * Anything else is returned unchanged.
 */
export function expandExponent(repr: string): string {
  const match = EXPONENT_PATTERN.exec(repr);
  if (match === null) {
    return repr;
  }

  const [, sign = "", intPart = "", fracPart = "", exponent = "0"] = match;
  const digits = intPart + fracPart;
  const point = intPart.length + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${"0".repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Normalize an amount given as a number or a decimal string into a
 * 2-decimal string. Numbers are read through their shortest decimal
 * representation, so 0.1 + 0.2 drift never reaches the cents.
 */
export function normalizeAmount(value: number | string): string {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new SplitError("INVALID_AMOUNT", `Amount must be finite, got ${String(value)}`);
    }
    return roundAmount(expandExponent(String(value)));
  }
  return roundAmount(value);
}

/**
 * Sum a list of 2-decimal amounts. Returns undefined if any is malformed.
 */
export function sumAmounts(amounts: readonly unknown[]): bigint | undefined {
  let total = 0n;
  for (const amount of amounts) {
    const scaled = safeParseAmount(amount);
    if (scaled === undefined) {
      return undefined;
    }
    total += scaled;
  }
  return total;
}

/**
 * Whether two scaled amounts differ by no more than the tolerance.
 */
export function withinTolerance(a: bigint, b: bigint, tolerance: bigint = BALANCE_TOLERANCE): boolean {
  const diff = a - b;
  return (diff < 0n ? -diff : diff) <= tolerance;
}
