import { ValidationError } from './errors/index.js';

const DECIMAL_RE = /^(\d+)(?:\.(\d{1,2}))?$/;

// "10.5" -> 1050. Two decimal places at most, never negative.
export function parseMoney(value: string | number): number {
  const text = typeof value === 'number' ? String(value) : value.trim();
  const match = DECIMAL_RE.exec(text);
  if (!match) {
    throw new ValidationError(`Invalid amount '${value}'. Expected a decimal with at most 2 places.`);
  }

  const [, whole, fraction = ''] = match;
  return Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
}

// 1050 -> "10.50"
export function formatMoney(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
}

export function lineTotal(price: number, qty: number): number {
  return price * qty;
}
