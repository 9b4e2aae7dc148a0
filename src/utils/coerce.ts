/**
 * Value coercion shared by the extractors and the normalizer.
 */
import type { JsonValue } from '../types/json.types';

type Coercible = JsonValue | undefined;

/**
 * Loose numeric coercion: strips everything except digits and dots.
 * "$1,200/mo" -> 1200, "2.5 baths" -> 2.5, "n/a" -> null.
 */
export function toNumber(value: Coercible): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const cleaned = value.replace(/[^\d.]/g, '');
  if (!/\d/.test(cleaned)) return null;

  const parsed = parseFloat(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toInteger(value: Coercible): number | null {
  const n = toNumber(value);
  return n === null ? null : Math.trunc(n);
}

/**
 * Coordinates keep their sign, so they bypass the digit-only cleanup.
 */
export function toCoordinate(value: Coercible): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const match = value.trim().match(/^-?\d+(?:\.\d+)?/);
  return match ? parseFloat(match[0]) : null;
}

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function isoFromParts(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

export function monthNumber(name: string): number | null {
  return MONTHS[name.slice(0, 3).toLowerCase()] ?? null;
}

/**
 * Normalize dates to YYYY-MM-DD. Epoch numbers (seconds or milliseconds) are
 * converted; unrecognized strings are returned unchanged.
 */
export function toIsoDate(value: Coercible): string | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 1e9) return null;
    const ms = value < 1e11 ? value * 1000 : value;
    return new Date(ms).toISOString().slice(0, 10);
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (!text) return null;

  const iso = text.match(/^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;

  const named = text.match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/);
  if (named) {
    const month = monthNumber(named[1]);
    if (month !== null) {
      const date = isoFromParts(parseInt(named[3], 10), month, parseInt(named[2], 10));
      if (date) return date;
    }
  }

  const slashed = text.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (slashed) {
    const date = isoFromParts(parseInt(slashed[3], 10), parseInt(slashed[1], 10), parseInt(slashed[2], 10));
    if (date) return date;
  }

  return text;
}

/**
 * Five-digit postal code. Numeric input that lost its leading zeros is padded.
 */
export function toPostalCode(value: Coercible): string | null {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0 || value > 99999) return null;
    return pad(value, 5);
  }
  if (typeof value !== 'string') return null;
  const match = value.match(/\b(\d{5})(?:-\d{4})?\b/);
  if (match) return match[1];
  const short = value.trim().match(/^\d{3,4}$/);
  return short ? short[0].padStart(5, '0') : null;
}

/**
 * Collapse whitespace and trim; blank strings become null.
 */
export function cleanText(value: Coercible): string | null {
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : null;
  if (typeof value !== 'string') return null;
  const text = value.replace(/\s+/g, ' ').trim();
  return text.length > 0 ? text : null;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
