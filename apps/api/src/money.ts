import { ValidationError } from './errors.js';

const AMOUNT_RE = /^([+-])?(\d*)(?:\.(\d{1,2}))?$/;

/**
 * Parses a decimal amount ('1,234.5', '-40', 12.3) into signed integer cents.
 * More than two fraction digits is rejected rather than rounded.
 */
export function parseAmountToCents(input: string | number): number {
  const raw = String(input).trim().replace(/,/g, '');
  const m = AMOUNT_RE.exec(raw);
  if (!m || (!m[2] && !m[3])) {
    throw new ValidationError(`Invalid amount '${String(input)}'`);
  }
  const whole = Number(m[2] || '0');
  const frac = Number((m[3] ?? '').padEnd(2, '0'));
  const cents = whole * 100 + frac;
  if (!Number.isSafeInteger(cents)) {
    throw new ValidationError(`Amount out of range '${String(input)}'`);
  }
  return m[1] === '-' ? -cents : cents;
}

export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const frac = `${abs % 100}`.padStart(2, '0');
  return `${sign}${whole}.${frac}`;
}
