import { describe, expect, it } from 'vitest';
import type { RowSet } from '../types/rows.types';
import { planTableWrites } from './row-storage.service';

function rowSet(overrides: Partial<RowSet> = {}): RowSet {
  return {
    listings: [
      {
        listing_id: 'listing-1',
        property_id: 'property-1',
        location_id: null,
        source_id: 'zillow',
        source_url: 'https://www.zillow.com/homedetails/x/1_zpid/',
        external_id: '1',
        scraped_timestamp: '2024-06-01T00:00:00.000Z',
        listing_type: 'sale',
        status: 'active',
        list_date: null,
        days_on_market: null,
        list_price: 450000,
        price_per_unit_area: null,
        title: null,
        description: null,
      },
    ],
    properties: [],
    media: [],
    agents: [],
    price_history: [],
    locations: [],
    engagement: [],
    financials: [],
    community_attributes: [],
    similar_properties: [],
    ...overrides,
  };
}

describe('planTableWrites', () => {
  it('upserts parent rows on their identity key', () => {
    const [listings] = planTableWrites(rowSet());
    expect(listings.table).toBe('listings');
    expect(listings.operations).toHaveLength(1);
    expect(listings.operations[0]).toMatchObject({
      replaceOne: { filter: { listing_id: 'listing-1' }, upsert: true },
    });
  });

  it('replaces child rows per listing and skips empty parent tables', () => {
    const plans = planTableWrites(
      rowSet({
        media: [
          {
            listing_id: 'listing-1',
            property_id: 'property-1',
            media_url: 'https://img.example.com/a.jpg',
            media_type: 'image',
            caption: null,
            display_order: 0,
            is_primary: true,
          },
        ],
      })
    );

    expect(plans.map((plan) => plan.table)).toEqual([
      'listings',
      'media',
      'agents',
      'price_history',
      'engagement',
      'financials',
      'community_attributes',
      'similar_properties',
    ]);

    const media = plans.find((plan) => plan.table === 'media');
    expect(media?.operations).toEqual([
      { deleteMany: { filter: { listing_id: 'listing-1' } } },
      {
        insertOne: {
          document: {
            listing_id: 'listing-1',
            property_id: 'property-1',
            media_url: 'https://img.example.com/a.jpg',
            media_type: 'image',
            caption: null,
            display_order: 0,
            is_primary: true,
          },
        },
      },
    ]);

    const agents = plans.find((plan) => plan.table === 'agents');
    expect(agents?.operations).toEqual([{ deleteMany: { filter: { listing_id: 'listing-1' } } }]);
  });
});
