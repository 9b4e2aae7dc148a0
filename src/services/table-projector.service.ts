import type { CanonicalRecord } from '../types/listing.types';
import type {
  AgentRow,
  CommunityRow,
  EngagementRow,
  FinancialRow,
  ListingRow,
  LocationRow,
  MediaRow,
  PriceHistoryRow,
  PropertyRow,
  RowSet,
  SimilarPropertyRow,
} from '../types/rows.types';
import { ExtractionInputError } from '../utils/errors';
import { isListingStatus, isPropertyType } from '../utils/vocabulary';

function anyPresent(...values: Array<number | null>): boolean {
  return values.some((value) => value !== null);
}

/**
 * TableProjector
 * Flattens a normalized record into the relational row set. Every table key
 * is always present; foreign keys come from the record's identity.
 */
export class TableProjectorService {
  project(record: CanonicalRecord, processedAt: Date): RowSet {
    const { identity, fields } = record;
    if (!identity) {
      throw new ExtractionInputError('Record must be normalized before projection');
    }
    const { listingId, propertyId, locationId } = identity;

    const listing: ListingRow = {
      listing_id: listingId,
      property_id: propertyId,
      location_id: locationId,
      source_id: record.sourceId,
      source_url: record.sourceUrl,
      external_id: fields.externalId,
      scraped_timestamp: processedAt.toISOString(),
      listing_type: fields.listingType,
      status: isListingStatus(fields.status) ? fields.status : 'unknown',
      list_date: fields.listDate,
      days_on_market: fields.daysOnMarket,
      list_price: fields.listPrice,
      price_per_unit_area: record.derived.pricePerUnitArea,
      title: fields.title,
      description: fields.description,
    };

    const property: PropertyRow = {
      property_id: propertyId,
      listing_id: listingId,
      street_address: fields.street,
      unit_number: fields.unit,
      city: fields.city,
      state: fields.state,
      postal_code: fields.postalCode,
      latitude: fields.latitude,
      longitude: fields.longitude,
      beds: fields.beds,
      baths: fields.baths,
      interior_area: fields.interiorArea,
      lot_size: fields.lotSize,
      year_built: fields.yearBuilt,
      property_type: isPropertyType(fields.propertyType) ? fields.propertyType : fields.propertyType ? 'other' : null,
      property_subtype: fields.subtype,
      condition: fields.condition,
    };

    const media: MediaRow[] = (record.derived.media ?? []).map((url, index): MediaRow => ({
      listing_id: listingId,
      property_id: propertyId,
      media_url: url,
      media_type: 'image',
      caption: null,
      display_order: index,
      is_primary: index === 0,
    }));

    const agents: AgentRow[] = (fields.agents ?? []).map((agent) => ({
      listing_id: listingId,
      agent_name: agent.name,
      phone: agent.phone,
      brokerage: agent.brokerage,
      email: agent.email,
    }));

    const priceHistory: PriceHistoryRow[] = (fields.priceHistory ?? []).map((event) => ({
      listing_id: listingId,
      property_id: propertyId,
      event_date: event.eventDate,
      event_type: event.eventType,
      price: event.price,
      notes: event.notes,
    }));

    const locations: LocationRow[] = locationId
      ? [
          {
            location_id: locationId,
            street_address: fields.street,
            unit_number: fields.unit,
            city: fields.city,
            state: fields.state,
            postal_code: fields.postalCode,
            latitude: fields.latitude,
            longitude: fields.longitude,
          },
        ]
      : [];

    const engagement: EngagementRow[] = anyPresent(fields.views, fields.saves, fields.shares)
      ? [{ listing_id: listingId, views: fields.views, saves: fields.saves, shares: fields.shares }]
      : [];

    const financials: FinancialRow[] = anyPresent(fields.hoaFee, fields.annualPropertyTax)
      ? [
          {
            listing_id: listingId,
            property_id: propertyId,
            hoa_fee: fields.hoaFee,
            annual_property_tax: fields.annualPropertyTax,
          },
        ]
      : [];

    const community: CommunityRow[] = anyPresent(fields.walkScore, fields.transitScore, fields.bikeScore)
      ? [
          {
            listing_id: listingId,
            property_id: propertyId,
            walk_score: fields.walkScore,
            transit_score: fields.transitScore,
            bike_score: fields.bikeScore,
          },
        ]
      : [];

    const similar: SimilarPropertyRow[] = [...new Set(fields.similarUrls ?? [])].map((url) => ({
      listing_id: listingId,
      similar_url: url,
    }));

    return {
      listings: [listing],
      properties: [property],
      media,
      agents,
      price_history: priceHistory,
      locations,
      engagement,
      financials,
      community_attributes: community,
      similar_properties: similar,
    };
  }
}
