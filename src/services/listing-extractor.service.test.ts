import { createHash } from 'crypto';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { page } from '../testing/documents';
import { TABLE_NAMES } from '../types/rows.types';
import { ExtractionInputError } from '../utils/errors';
import { ListingExtractorService } from './listing-extractor.service';

const URL = 'https://www.zillow.com/homedetails/9-Elm-St-Springfield-IL-02134/111_zpid/';
const PROCESSED_AT = new Date('2024-06-01T12:00:00.000Z');

const STATE = {
  props: {
    pageProps: {
      property: {
        zpid: 111,
        streetAddress: '9 Elm St',
        city: 'Springfield',
        state: 'IL',
        zipcode: '02134',
        price: 500000,
        livingArea: 1000,
        homeType: 'CONDO',
        homeStatus: 'FOR_SALE',
        photos: [
          { url: 'https://photos.example.com/p/kitchen-small.jpg' },
          { url: 'https://photos.example.com/p/kitchen-origin.jpg' },
          { url: 'https://photos.example.com/p/bath.jpg' },
        ],
      },
    },
  },
};

const HTML = page(
  `<script id="__NEXT_DATA__" type="application/json">${JSON.stringify(STATE)}</script><p>Walk Score 88</p>`,
  '<meta property="og:title" content="9 Elm St, Springfield, IL 02134">'
);

describe('ListingExtractorService', () => {
  const extractor = new ListingExtractorService();

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('turns a listing page into a row set', () => {
    const { rows, metadata } = extractor.extract({ sourceUrl: URL, html: HTML }, { processedAt: PROCESSED_AT });
    const listingId = createHash('sha1').update('listing|zillow|111').digest('hex');

    expect(Object.keys(rows).sort()).toEqual([...TABLE_NAMES].sort());
    expect(rows.listings[0]).toMatchObject({
      listing_id: listingId,
      external_id: '111',
      source_id: 'zillow',
      scraped_timestamp: '2024-06-01T12:00:00.000Z',
      listing_type: 'sale',
      status: 'active',
      list_price: 500000,
      price_per_unit_area: 500,
      title: '9 Elm St, Springfield, IL 02134',
    });
    expect(rows.properties[0]).toMatchObject({ property_type: 'condo', postal_code: '02134', interior_area: 1000 });
    expect(rows.locations).toHaveLength(1);
    expect(rows.media.map((row) => row.media_url)).toEqual([
      'https://photos.example.com/p/kitchen-origin.jpg',
      'https://photos.example.com/p/bath.jpg',
    ]);
    expect(rows.media[0].is_primary).toBe(true);
    expect(rows.community_attributes[0].walk_score).toBe(88);

    expect(metadata).toEqual({
      sourceId: 'zillow',
      source: URL,
      extractedAt: PROCESSED_AT,
      blocked: false,
      strategiesUsed: ['embedded-state', 'meta-tags', 'heuristic'],
    });
  });

  it('produces identical rows for the same input', () => {
    const first = extractor.extract({ sourceUrl: URL, html: HTML }, { processedAt: PROCESSED_AT });
    const second = extractor.extract({ sourceUrl: URL, html: HTML }, { processedAt: PROCESSED_AT });
    expect(second.rows).toEqual(first.rows);
  });

  it('keeps the listing identity for blocked pages', () => {
    const full = extractor.extract({ sourceUrl: URL, html: HTML });
    const blocked = extractor.extract({
      sourceUrl: URL,
      html: '<html><body>Access to this page has been denied</body></html>',
    });

    expect(blocked.metadata.blocked).toBe(true);
    expect(blocked.rows.listings[0]).toMatchObject({
      listing_id: full.rows.listings[0].listing_id,
      status: 'blocked',
      external_id: '111',
      list_price: null,
    });
    expect(blocked.rows.media).toEqual([]);
  });

  it('rejects a document without a source URL', () => {
    expect(() => extractor.extract({ sourceUrl: '', html: HTML })).toThrow(ExtractionInputError);
  });

  it('lists its grammars', () => {
    expect(extractor.getRegisteredGrammars()).toEqual(['zillow', 'redfin']);
    expect(extractor.isSupportedSite(URL)).toBe(true);
    expect(extractor.isSupportedSite('https://listings.example.com/1')).toBe(false);
  });
});
