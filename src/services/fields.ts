import { ValidationError } from '../errors.js';
import type { FlatField, FlatRecord, YesNo } from '../types.js';

const INT4_MAX = 2_147_483_647;

export function normalizeString(value: unknown): string | null {
  if (value == null) return null;
  const str = String(value).trim();
  return str.length ? str : null;
}

export function readText(record: FlatRecord, field: FlatField, key: string, maxLength: number): string | null {
  const value = normalizeString(record[field]);
  if (value !== null && value.length > maxLength) {
    throw new ValidationError(key, field, `longer than ${maxLength} characters`);
  }
  return value;
}

export function parseInteger(raw: string, min = 0, max = INT4_MAX): number | null {
  if (!/^[+-]?\d+$/.test(raw)) return null;
  const parsed = Number(raw);
  if (!Number.isSafeInteger(parsed) || parsed < min || parsed > max) return null;
  return parsed;
}

export function readInteger(
  record: FlatRecord,
  field: FlatField,
  key: string,
  options: { min?: number; required: true }
): number;
export function readInteger(
  record: FlatRecord,
  field: FlatField,
  key: string,
  options: { min?: number; required?: false }
): number | null;
export function readInteger(
  record: FlatRecord,
  field: FlatField,
  key: string,
  options: { min?: number; required?: boolean }
): number | null {
  const raw = normalizeString(record[field]);
  if (raw === null) {
    if (options.required) {
      throw new ValidationError(key, field, 'is required');
    }
    return null;
  }
  const min = options.min ?? 0;
  const parsed = parseInteger(raw, min);
  if (parsed === null) {
    throw new ValidationError(key, field, `${JSON.stringify(raw)} is not an integer between ${min} and ${INT4_MAX}`);
  }
  return parsed;
}

export type DecimalBounds = {
  /** Bounds in hundredths, inclusive. */
  minCents: number;
  maxCents: number;
};

/**
 * Parses a two-decimal value into hundredths. Returns null for anything with
 * more than two fractional digits or that is not a plain decimal number.
 */
export function parseCents(raw: string): number | null {
  const match = /^([+-]?)(\d+)(?:\.(\d{1,2}))?$/.exec(raw);
  if (!match) return null;
  const [, sign, whole, fraction = ''] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  if (!Number.isSafeInteger(cents)) return null;
  return sign === '-' ? -cents : cents;
}

export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
}

export function readDecimal(
  record: FlatRecord,
  field: FlatField,
  key: string,
  options: DecimalBounds & { required: true }
): string;
export function readDecimal(
  record: FlatRecord,
  field: FlatField,
  key: string,
  options: DecimalBounds & { required?: false }
): string | null;
export function readDecimal(
  record: FlatRecord,
  field: FlatField,
  key: string,
  options: DecimalBounds & { required?: boolean }
): string | null {
  const raw = normalizeString(record[field]);
  if (raw === null) {
    if (options.required) {
      throw new ValidationError(key, field, 'is required');
    }
    return null;
  }
  const cents = parseCents(raw);
  if (cents === null) {
    throw new ValidationError(key, field, `${JSON.stringify(raw)} is not a decimal with at most 2 fractional digits`);
  }
  if (cents < options.minCents || cents > options.maxCents) {
    throw new ValidationError(
      key,
      field,
      `${formatCents(cents)} is outside ${formatCents(options.minCents)}..${formatCents(options.maxCents)}`
    );
  }
  return formatCents(cents);
}

const YES_VALUES = new Set(['yes', 'y', 'true', '1']);
const NO_VALUES = new Set(['no', 'n', 'false', '0']);

export function readYesNo(record: FlatRecord, field: FlatField, key: string): YesNo {
  const raw = normalizeString(record[field]);
  const lowered = raw?.toLowerCase();
  if (lowered !== undefined && YES_VALUES.has(lowered)) return 'Yes';
  if (lowered !== undefined && NO_VALUES.has(lowered)) return 'No';
  throw new ValidationError(key, field, `${JSON.stringify(raw)} is not a yes/no value`);
}
