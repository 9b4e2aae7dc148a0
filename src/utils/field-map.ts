import {
  FIELD_KEYS,
  type FieldKey,
  type FieldSlots,
  type ListingFields,
  type PartialFieldMap,
} from '../types/listing.types';

/**
 * Empty means absent for write-once purposes: null, blank strings, empty
 * lists and non-finite numbers.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (typeof value === 'number') return !Number.isFinite(value);
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

export function setIfEmpty<K extends FieldKey>(
  target: PartialFieldMap,
  key: K,
  value: ListingFields[K] | null | undefined
): boolean {
  if (value === null || value === undefined) return false;
  if (isEmptyValue(value) || !isEmptyValue(target[key])) return false;
  target[key] = value;
  return true;
}

/**
 * Copy every non-empty field of `source` into the empty fields of `target`.
 */
export function fillMissing(target: PartialFieldMap, source: PartialFieldMap): FieldKey[] {
  const written: FieldKey[] = [];
  for (const key of FIELD_KEYS) {
    if (setIfEmpty(target, key, source[key])) written.push(key);
  }
  return written;
}

function fillSlot<K extends FieldKey>(slots: FieldSlots, key: K, value: ListingFields[K] | undefined): boolean {
  if (value === undefined || isEmptyValue(value) || !isEmptyValue(slots[key])) return false;
  slots[key] = value;
  return true;
}

/**
 * Write-once fill of record slots. Returns the keys that were written.
 */
export function fillSlots(slots: FieldSlots, source: PartialFieldMap): FieldKey[] {
  const written: FieldKey[] = [];
  for (const key of FIELD_KEYS) {
    if (fillSlot(slots, key, source[key])) written.push(key);
  }
  return written;
}

export function emptySlots(): FieldSlots {
  return {
    externalId: null,
    street: null,
    unit: null,
    city: null,
    state: null,
    postalCode: null,
    latitude: null,
    longitude: null,
    beds: null,
    baths: null,
    interiorArea: null,
    lotSize: null,
    yearBuilt: null,
    propertyType: null,
    subtype: null,
    condition: null,
    listPrice: null,
    status: null,
    listDate: null,
    daysOnMarket: null,
    listingType: null,
    title: null,
    description: null,
    images: null,
    agents: null,
    priceHistory: null,
    similarUrls: null,
    views: null,
    saves: null,
    shares: null,
    hoaFee: null,
    annualPropertyTax: null,
    walkScore: null,
    transitScore: null,
    bikeScore: null,
  };
}
