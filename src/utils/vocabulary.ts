import { LISTING_STATUSES, PROPERTY_TYPES } from '../config/extraction';
import type { ListingStatus, PropertyType } from '../types/listing.types';

export interface SynonymEntry<T extends string> {
  readonly match: string;
  readonly value: T;
}

/**
 * "SingleFamilyResidence", "SINGLE_FAMILY" and "single-family" all become
 * "single family".
 */
export function normalizeLabel(raw: string): string {
  return raw
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/**
 * First table entry whose match phrase occurs as whole words in the label.
 */
export function matchVocabulary<T extends string>(raw: string, table: readonly SynonymEntry<T>[]): T | null {
  const label = normalizeLabel(raw);
  if (!label) return null;
  const padded = ` ${label} `;
  for (const entry of table) {
    if (padded.includes(` ${entry.match} `)) return entry.value;
  }
  return null;
}

export function isPropertyType(value: string | null): value is PropertyType {
  return PROPERTY_TYPES.some((type) => type === value);
}

export function isListingStatus(value: string | null): value is ListingStatus {
  return LISTING_STATUSES.some((status) => status === value);
}
