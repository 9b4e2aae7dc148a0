/**
 * Relational row shapes. Field names are the persisted contract that
 * downstream joins rely on, so they stay snake_case.
 */
import type { ListingStatus, ListingType, PropertyType, SourceId } from './listing.types';

export interface ListingRow {
  listing_id: string;
  property_id: string;
  location_id: string | null;
  source_id: SourceId;
  source_url: string;
  external_id: string | null;
  scraped_timestamp: string;
  listing_type: ListingType | null;
  status: ListingStatus;
  list_date: string | null;
  days_on_market: number | null;
  list_price: number | null;
  price_per_unit_area: number | null;
  title: string | null;
  description: string | null;
}

export interface PropertyRow {
  property_id: string;
  listing_id: string;
  street_address: string | null;
  unit_number: string | null;
  city: string | null;
  state: string | null;
  postal_code: string | null;
  latitude: number | null;
  longitude: number | null;
  beds: number | null;
  baths: number | null;
  interior_area: number | null;
  lot_size: number | null;
  year_built: number | null;
  property_type: PropertyType | null;
  property_subtype: string | null;
  condition: string | null;
}

export interface MediaRow {
  listing_id: string;
  property_id: string;
  media_url: string;
  media_type: 'image';
  caption: string | null;
  display_order: number;
  is_primary: boolean;
}

export interface AgentRow {
  listing_id: string;
  agent_name: string | null;
  phone: string | null;
  brokerage: string | null;
  email: string | null;
}

export interface PriceHistoryRow {
  listing_id: string;
  property_id: string;
  event_date: string | null;
  event_type: string | null;
  price: number | null;
  notes: string | null;
}

export interface LocationRow {
  location_id: string;
  street_address: string | null;
  unit_number: string | null;
  city: string | null;
  state: string | null;
  postal_code: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface EngagementRow {
  listing_id: string;
  views: number | null;
  saves: number | null;
  shares: number | null;
}

export interface FinancialRow {
  listing_id: string;
  property_id: string;
  hoa_fee: number | null;
  annual_property_tax: number | null;
}

export interface CommunityRow {
  listing_id: string;
  property_id: string;
  walk_score: number | null;
  transit_score: number | null;
  bike_score: number | null;
}

export interface SimilarPropertyRow {
  listing_id: string;
  similar_url: string;
}

export interface RowSet {
  listings: ListingRow[];
  properties: PropertyRow[];
  media: MediaRow[];
  agents: AgentRow[];
  price_history: PriceHistoryRow[];
  locations: LocationRow[];
  engagement: EngagementRow[];
  financials: FinancialRow[];
  community_attributes: CommunityRow[];
  similar_properties: SimilarPropertyRow[];
}

export type TableName = keyof RowSet;

export const TABLE_NAMES: readonly TableName[] = [
  'listings',
  'properties',
  'media',
  'agents',
  'price_history',
  'locations',
  'engagement',
  'financials',
  'community_attributes',
  'similar_properties',
];
