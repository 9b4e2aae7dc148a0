import { createHash } from 'crypto';
import { describe, expect, it } from 'vitest';
import type { CanonicalRecord } from '../types/listing.types';
import { createEmptyRecord } from './cascade-merger.service';
import { NormalizerService } from './normalizer.service';

const URL_WITH_ID = 'https://www.zillow.com/homedetails/123-Main-St-Springfield-IL-62704/12345_zpid/';

function sha1(text: string): string {
  return createHash('sha1').update(text).digest('hex');
}

function record(overrides: Partial<CanonicalRecord['fields']> = {}, sourceUrl = URL_WITH_ID): CanonicalRecord {
  const base = createEmptyRecord('zillow', sourceUrl);
  return { ...base, fields: { ...base.fields, ...overrides } };
}

describe('NormalizerService', () => {
  const normalizer = new NormalizerService();

  describe('identity', () => {
    it('hashes the source and external id', () => {
      const { identity } = normalizer.normalize(record({ externalId: '12345' }));
      expect(identity?.listingId).toBe(sha1('listing|zillow|12345'));
      expect(identity?.propertyId).toBe(sha1('property|zillow|12345'));
    });

    it('falls back to the normalized URL without an external id', () => {
      const { identity } = normalizer.normalize(
        record({}, 'https://WWW.Zillow.com/homedetails/x/?utm_source=feed#top')
      );
      expect(identity?.listingId).toBe(sha1('listing|zillow|https://www.zillow.com/homedetails/x'));
    });

    it('derives the location id from the normalized address', () => {
      const { identity } = normalizer.normalize(
        record({ street: '123 Main St.', city: 'Springfield', state: 'il', postalCode: '62704' })
      );
      expect(identity?.locationId).toBe(sha1('123 main st||springfield|il|62704'));
    });

    it('has no location id without an address', () => {
      expect(normalizer.normalize(record()).identity?.locationId).toBeNull();
    });
  });

  describe('pricePerUnitArea', () => {
    it('divides price by interior area', () => {
      const normalized = normalizer.normalize(record({ listPrice: 450000, interiorArea: 1500 }));
      expect(normalized.derived.pricePerUnitArea).toBe(300);
    });

    it('rounds to cents', () => {
      const normalized = normalizer.normalize(record({ listPrice: 100000, interiorArea: 3 }));
      expect(normalized.derived.pricePerUnitArea).toBe(33333.33);
    });

    it('is null for zero or missing area', () => {
      expect(normalizer.normalize(record({ listPrice: 450000, interiorArea: 0 })).derived.pricePerUnitArea).toBeNull();
      expect(normalizer.normalize(record({ listPrice: 450000 })).derived.pricePerUnitArea).toBeNull();
    });
  });

  describe('vocabularies', () => {
    it('maps property type labels', () => {
      const type = (raw: string) => normalizer.normalize(record({ propertyType: raw })).fields.propertyType;
      expect(type('SINGLE_FAMILY')).toBe('single_family');
      expect(type('SingleFamilyResidence')).toBe('single_family');
      expect(type('CONDO')).toBe('condo');
      expect(type('Houseboat')).toBe('other');
      expect(normalizer.normalize(record()).fields.propertyType).toBeNull();
    });

    it('maps listing statuses', () => {
      const status = (raw: string | null) => normalizer.normalize(record({ status: raw })).fields.status;
      expect(status('FOR_SALE')).toBe('active');
      expect(status('RECENTLY_SOLD')).toBe('sold');
      expect(status('Off Market')).toBe('withdrawn');
      expect(status('Under Contract')).toBe('pending');
      expect(status('mystery')).toBe('unknown');
      expect(status(null)).toBe('unknown');
    });

    it('marks blocked records regardless of the raw status', () => {
      const blocked = { ...record({ status: 'FOR_SALE' }), blocked: true };
      expect(normalizer.normalize(blocked).fields.status).toBe('blocked');
    });

    it('normalizes price events', () => {
      const normalized = normalizer.normalize(
        record({
          priceHistory: [
            { eventDate: 'May 1, 2024', eventType: 'Listed for sale', price: 450000, notes: null },
            { eventDate: '2023-01-02', eventType: 'Price change', price: 440000, notes: ' MLS ' },
            { eventDate: null, eventType: null, price: null, notes: null },
          ],
        })
      );
      expect(normalized.fields.priceHistory).toEqual([
        { eventDate: '2024-05-01', eventType: 'listed', price: 450000, notes: null },
        { eventDate: '2023-01-02', eventType: 'price_change', price: 440000, notes: 'MLS' },
        { eventDate: null, eventType: 'other', price: null, notes: null },
      ]);
    });
  });

  it('cleans address parts', () => {
    const { fields } = normalizer.normalize(
      record({ street: '  9 Elm   St ', state: 'ma', postalCode: '2134', listDate: 'Sep 15, 2023' })
    );
    expect(fields.street).toBe('9 Elm St');
    expect(fields.state).toBe('MA');
    expect(fields.postalCode).toBe('02134');
    expect(fields.listDate).toBe('2023-09-15');
  });

  it('de-duplicates image and similar URL lists', () => {
    const { fields } = normalizer.normalize(
      record({
        images: ['https://img.example.com/1.jpg', 'https://img.example.com/1.jpg', ' '],
        similarUrls: [],
      })
    );
    expect(fields.images).toEqual(['https://img.example.com/1.jpg']);
    expect(fields.similarUrls).toBeNull();
  });

  it('is idempotent', () => {
    const once = normalizer.normalize(
      record({
        externalId: '12345',
        street: '123 Main St',
        city: 'Springfield',
        state: 'il',
        postalCode: '62704',
        listPrice: 450000,
        interiorArea: 1500,
        propertyType: 'Townhome',
        status: 'Pending',
        listDate: '05/01/2024',
        priceHistory: [{ eventDate: 'May 1, 2024', eventType: 'Sold', price: 450000, notes: null }],
      })
    );
    expect(normalizer.normalize(once)).toEqual(once);
  });
});
