/**
 * Conversions between atomic token amounts and human-readable decimals.
 */

const INTEGER_REGEX = /^\d+$/;
const DECIMAL_REGEX = /^(\d+)(?:\.(\d*))?$/;

// Fractional digits kept after trimming trailing zeros.
const MIN_FRACTION_DIGITS = 2;

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new RangeError(`Invalid decimals: ${decimals}`);
  }
}

/**
 * Converts atomic units to a human-readable decimal string.
 *
 * A zero remainder prints every fractional digit ("0" at 6 decimals is
 * "0.000000"); otherwise trailing zeros are trimmed down to two digits
 * ("1000" at 6 decimals is "0.001", "1500000" is "1.50").
 *
 * @param atomic - Non-negative integer amount in base units
 * @param decimals - Token decimal precision
 * @returns The formatted amount
 */
export function toHuman(atomic: string | bigint, decimals: number): string {
  assertDecimals(decimals);

  let value: bigint;
  if (typeof atomic === "bigint") {
    value = atomic;
  } else {
    const trimmed = atomic.trim();
    if (!INTEGER_REGEX.test(trimmed)) {
      throw new RangeError(`Invalid atomic amount: ${atomic}`);
    }
    value = BigInt(trimmed);
  }
  if (value < 0n) {
    throw new RangeError(`Invalid atomic amount: ${atomic}`);
  }

  if (decimals === 0) {
    return value.toString();
  }

  const divisor = 10n ** BigInt(decimals);
  const whole = value / divisor;
  const fraction = value % divisor;

  if (fraction === 0n) {
    return `${whole}.${"0".repeat(decimals)}`;
  }

  const padded = fraction.toString().padStart(decimals, "0");
  let trimmed = padded.replace(/0+$/, "");
  if (trimmed.length < MIN_FRACTION_DIGITS) {
    trimmed = padded.slice(0, MIN_FRACTION_DIGITS);
  }
  return `${whole}.${trimmed}`;
}

/**
 * Converts a human-readable decimal string back to atomic units.
 *
 * @param human - Non-negative decimal such as "1.50"
 * @param decimals - Token decimal precision
 * @returns The amount in base units
 */
export function toAtomic(human: string, decimals: number): bigint {
  assertDecimals(decimals);

  const match = DECIMAL_REGEX.exec(human.trim());
  if (!match) {
    throw new RangeError(`Invalid decimal amount: ${human}`);
  }

  const [, whole, fraction = ""] = match;
  if (fraction.length > decimals) {
    throw new RangeError(`Amount ${human} has more than ${decimals} fractional digits`);
  }

  return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction.padEnd(decimals, "0") || "0");
}
