import type { PartialAddress } from '../types/listing.types';
import { toPostalCode } from './coerce';

// "<number> <street tokens>, <city>, <ST> <zip>"
const ADDRESS_LINE_RE =
  /(?<![\d,$.])(\d+[A-Za-z]?(?:[ \t]+[A-Za-z0-9.#'\-]+)+),[ \t]*([A-Za-z][A-Za-z .'\-]*?),[ \t]*([A-Z]{2})[ \t]*(\d{5})(?:-\d{4})?\b/;

const UNIT_SUFFIX_RE = /^(.*?)[ \t,]+(?:(?:apt|unit|suite|ste)\.?[ \t]*#?|#)[ \t]*([A-Za-z0-9\-]+)$/i;

export function splitStreetUnit(street: string): { street: string; unit: string | null } {
  const match = street.trim().match(UNIT_SUFFIX_RE);
  if (!match || !match[1]) return { street: street.trim(), unit: null };
  return { street: match[1].trim(), unit: match[2] };
}

/**
 * Parse the first single-line US address found in `text`.
 */
export function parseAddressLine(text: string): PartialAddress | null {
  const match = text.match(ADDRESS_LINE_RE);
  if (!match) return null;

  const { street, unit } = splitStreetUnit(match[1]);
  const address: PartialAddress = {
    street,
    city: match[2].trim(),
    state: match[3],
  };
  const postalCode = toPostalCode(match[4]);
  if (postalCode) address.postalCode = postalCode;
  if (unit) address.unit = unit;
  return address;
}
