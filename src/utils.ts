import _ from 'lodash';

export type FlatObject = Record<string, unknown>;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function isPlainObject(value: unknown): value is FlatObject {
  return _.isPlainObject(value);
}

export function asObject(value: unknown): FlatObject | undefined {
  return isPlainObject(value) ? value : undefined;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Reads a stat value the way the data source reports it: plain numbers, or
 * strings such as "3.45" and ".285". Placeholders like "-.--" count as absent.
 */
export function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

// Accent-folded, trimmed, lower-cased. "José Ramírez " and "jose ramirez" compare equal.
export function normalizeName(name: string): string {
  return _.deburr(name).trim().toLowerCase();
}

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return date.toISOString().slice(0, 10) === value;
}

function isoToEpochDay(value: string): number {
  if (!isIsoDate(value)) {
    throw new Error(`Invalid calendar date "${value}" (expected YYYY-MM-DD)`);
  }
  return Math.round(Date.parse(`${value}T00:00:00Z`) / MS_PER_DAY);
}

export function addDays(value: string, days: number): string {
  const epochDay = isoToEpochDay(value) + days;
  return new Date(epochDay * MS_PER_DAY).toISOString().slice(0, 10);
}

export function daysBetween(from: string, to: string): number {
  return isoToEpochDay(to) - isoToEpochDay(from);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
