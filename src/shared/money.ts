// ──────────────────────────────────────────
// Shared: Fixed-point money helpers (integer cents)
// ──────────────────────────────────────────

/** Monetary amount as an integer number of cents. */
export type Cents = number;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parse a non-negative decimal amount ("100", "12.5", "0.07") into cents
 * without going through binary floating point. Numbers are accepted only when
 * their shortest decimal form has at most two fractional digits.
 *
 * @throws RangeError when the value is negative, malformed, has more than two
 * fractional digits or overflows a safe integer.
 */
export function toCents(value: string | number): Cents {
  const text = typeof value === 'number' ? numberToDecimalString(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new RangeError(`Invalid monetary amount: "${String(value)}"`);
  }

  const [, whole, fraction = ''] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`Monetary amount out of range: "${String(value)}"`);
  }
  return cents;
}

function numberToDecimalString(value: number): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Invalid monetary amount: ${value}`);
  }
  return String(value);
}

export function isValidCents(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function formatCents(cents: Cents): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.trunc(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/** Currency units as a number, for formats that store numeric cells. */
export function centsToUnits(cents: Cents): number {
  return cents / 100;
}

export function unitsToCents(units: number): Cents {
  return Math.round(units * 100);
}
