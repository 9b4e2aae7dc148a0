/**
 * Canonical listing types shared by every extraction stage
 */
import type { RowSet } from './rows.types';

export type SourceId = 'zillow' | 'redfin' | 'unknown';

export type ListingStatus =
  | 'active'
  | 'pending'
  | 'contingent'
  | 'sold'
  | 'withdrawn'
  | 'blocked'
  | 'unknown';

export type PropertyType =
  | 'single_family'
  | 'condo'
  | 'townhouse'
  | 'multi_family'
  | 'apartment'
  | 'manufactured'
  | 'land'
  | 'other';

export type PriceEventType = 'listed' | 'sold' | 'price_change' | 'pending' | 'delisted' | 'other';

export type ListingType = 'sale' | 'rent';

export interface AgentInfo {
  name: string | null;
  phone: string | null;
  brokerage: string | null;
  email: string | null;
}

export interface PriceEvent {
  eventDate: string | null;
  eventType: string | null;
  price: number | null;
  notes: string | null;
}

/**
 * Every field an extractor may fill. Status, property type and dates hold
 * raw strings until the normalizer maps them onto their vocabularies.
 */
export interface ListingFields {
  externalId: string;

  street: string;
  unit: string;
  city: string;
  state: string;
  postalCode: string;
  latitude: number;
  longitude: number;

  beds: number;
  baths: number;
  interiorArea: number;
  lotSize: number;
  yearBuilt: number;
  propertyType: string;
  subtype: string;
  condition: string;

  listPrice: number;
  status: string;
  listDate: string;
  daysOnMarket: number;
  listingType: ListingType;

  title: string;
  description: string;

  images: string[];
  agents: AgentInfo[];
  priceHistory: PriceEvent[];
  similarUrls: string[];

  views: number;
  saves: number;
  shares: number;

  hoaFee: number;
  annualPropertyTax: number;

  walkScore: number;
  transitScore: number;
  bikeScore: number;
}

export type FieldKey = keyof ListingFields;

export type PartialFieldMap = Partial<ListingFields>;

export type FieldSlots = { [K in FieldKey]: ListingFields[K] | null };

export const FIELD_KEYS: readonly FieldKey[] = [
  'externalId',
  'street',
  'unit',
  'city',
  'state',
  'postalCode',
  'latitude',
  'longitude',
  'beds',
  'baths',
  'interiorArea',
  'lotSize',
  'yearBuilt',
  'propertyType',
  'subtype',
  'condition',
  'listPrice',
  'status',
  'listDate',
  'daysOnMarket',
  'listingType',
  'title',
  'description',
  'images',
  'agents',
  'priceHistory',
  'similarUrls',
  'views',
  'saves',
  'shares',
  'hoaFee',
  'annualPropertyTax',
  'walkScore',
  'transitScore',
  'bikeScore',
];

export const ADDRESS_KEYS = ['street', 'unit', 'city', 'state', 'postalCode'] as const;

export type AddressKey = (typeof ADDRESS_KEYS)[number];

export type PartialAddress = Partial<Pick<ListingFields, AddressKey | 'externalId'>>;

export interface RecordIdentity {
  listingId: string;
  propertyId: string;
  locationId: string | null;
}

/**
 * Working state for one document. Created by the cascade merger, completed
 * by the normalizer and consumed by the table projector.
 */
export interface CanonicalRecord {
  sourceId: SourceId;
  sourceUrl: string;
  blocked: boolean;
  fields: FieldSlots;
  provenance: Partial<Record<FieldKey, string>>;
  derived: {
    pricePerUnitArea: number | null;
    /** Image URLs that survived the media resolver, in display order */
    media: string[] | null;
  };
  identity: RecordIdentity | null;
}

export interface ListingDocument {
  sourceUrl: string;
  html: string;
  renderedText?: string;
}

export interface ListingExtractionResult {
  record: CanonicalRecord;
  rows: RowSet;
  metadata: {
    sourceId: SourceId;
    source: string;
    extractedAt: Date;
    blocked: boolean;
    strategiesUsed: string[];
    errors?: string[];
  };
}
