import { describe, expect, it } from 'vitest';
import { parsedDocument } from '../../testing/documents';
import type { PartialFieldMap } from '../../types/listing.types';
import { GENERIC_PROFILE, GenericGrammar } from '../site-grammars/generic.grammar';
import { RedfinGrammar } from '../site-grammars/redfin.grammar';
import { ZillowGrammar } from '../site-grammars/zillow.grammar';
import { EmbeddedStateStrategy, assignScalar } from './embedded-state.strategy';

const ZILLOW_URL = 'https://www.zillow.com/homedetails/9-Elm-St-Springfield-IL-02134/111_zpid/';
const REDFIN_URL = 'https://www.redfin.com/IL/Springfield/1-Oak-Ave-62704/unit-2B/home/777';

function nextDataScript(payload: unknown): string {
  return `<script id="__NEXT_DATA__" type="application/json">${JSON.stringify(payload)}</script>`;
}

describe('EmbeddedStateStrategy', () => {
  it('walks a Zillow client cache nested as a JSON string', () => {
    const cache = {
      'Query{zpid:111}': {
        property: {
          zpid: 111,
          streetAddress: '9 Elm St',
          city: 'Springfield',
          state: 'IL',
          zipcode: '02134',
          price: 325000,
          bedrooms: 2,
          bathrooms: 1.5,
          livingArea: 980,
          homeType: 'CONDO',
          homeStatus: 'FOR_SALE',
          description: 'Bright unit',
          pageViewCount: 88,
          favoriteCount: 7,
          latitude: 42.35,
          longitude: -71.06,
          photos: [
            {
              mixedSources: {
                jpeg: [
                  { url: 'https://photos.zillowstatic.com/fp/aaa-p_c.jpg', width: 192 },
                  { url: 'https://photos.zillowstatic.com/fp/aaa-p_f.jpg', width: 1536 },
                ],
              },
            },
          ],
          priceHistory: [{ date: '2024-04-02', event: 'Listed for sale', price: 325000, source: 'MLS' }],
          taxHistory: [{ time: 1700000000000, taxPaid: 99999 }],
          attributionInfo: { agentName: 'Jane Roe', agentPhoneNumber: '555-123-4567', brokerName: 'Acme Realty' },
          nearbyHomes: [
            { zpid: 222, price: 999999, hdpUrl: '/homedetails/1-Oak-St-Springfield-IL-02134/222_zpid/' },
          ],
        },
      },
    };
    const html = nextDataScript({ props: { pageProps: { componentProps: { gdpClientCache: JSON.stringify(cache) } } } });
    const grammar = new ZillowGrammar();

    expect(grammar.extractStructured(parsedDocument(ZILLOW_URL, html, '', grammar))).toEqual({
      externalId: '111',
      street: '9 Elm St',
      city: 'Springfield',
      state: 'IL',
      postalCode: '02134',
      listPrice: 325000,
      beds: 2,
      baths: 1.5,
      interiorArea: 980,
      propertyType: 'CONDO',
      status: 'FOR_SALE',
      listingType: 'sale',
      description: 'Bright unit',
      views: 88,
      saves: 7,
      latitude: 42.35,
      longitude: -71.06,
      images: ['https://photos.zillowstatic.com/fp/aaa-p_f.jpg'],
      priceHistory: [{ eventDate: '2024-04-02', eventType: 'Listed for sale', price: 325000, notes: 'MLS' }],
      agents: [{ name: 'Jane Roe', phone: '555-123-4567', brokerage: 'Acme Realty', email: null }],
      similarUrls: ['https://www.zillow.com/homedetails/1-Oak-St-Springfield-IL-02134/222_zpid/'],
    });
  });

  it('reads an inline Redux assignment written as a JavaScript literal', () => {
    const html = `<html><body><script>window.__REDUX_STATE__ = {'propertyId': 777, // listing id
      "addressInfo": {"streetLine": "1 Oak Ave", "city": "Springfield", "state": "IL", "zip": "62704", "unitNumber": "2B"},
      "beds": 3, "baths": 2.5, "sqFt": {"value": 1640}, "price": {"value": 389000},
      "mlsStatus": "Active",
      "walkScoreData": {"walkScore": {"value": 81}, "transitScore": {"value": 40}, "bikeScore": {"value": 65}},
      "photos": [{"photoUrls": {"fullScreenPhotoUrl": "https://ssl.cdn-redfin.com/photo/1/bigphoto/777/777_0.jpg"}}],
      "events": [{"eventDescription": "Sold (MLS)", "price": 350000, "eventDate": 1609459200000}],
      "listingAgents": [{"agentInfo": {"agentName": "Sam Lee"}, "brokerName": "Oak Brokers"}],
    };</script></body></html>`;
    const grammar = new RedfinGrammar();

    expect(grammar.extractStructured(parsedDocument(REDFIN_URL, html, '', grammar))).toEqual({
      externalId: '777',
      street: '1 Oak Ave',
      unit: '2B',
      city: 'Springfield',
      state: 'IL',
      postalCode: '62704',
      beds: 3,
      baths: 2.5,
      interiorArea: 1640,
      listPrice: 389000,
      status: 'Active',
      listingType: 'sale',
      walkScore: 81,
      transitScore: 40,
      bikeScore: 65,
      images: ['https://ssl.cdn-redfin.com/photo/1/bigphoto/777/777_0.jpg'],
      priceHistory: [{ eventDate: '2021-01-01', eventType: 'Sold (MLS)', price: 350000, notes: null }],
      agents: [{ name: 'Sam Lee', phone: null, brokerage: 'Oak Brokers', email: null }],
    });
  });

  it('keeps the first occurrence of a field', () => {
    const html = nextDataScript({ listing: { price: 100 }, related: { price: 999 } });
    const strategy = new EmbeddedStateStrategy({ selectors: ['script#__NEXT_DATA__'], variableNames: [] }, GENERIC_PROFILE);
    expect(strategy.extract(parsedDocument('https://example.com/a', html)).listPrice).toBe(100);
  });

  it('treats prototype-like keys as ordinary keys', () => {
    const html = nextDataScript({ constructor: 'x', hasOwnProperty: 'y', price: 100 });
    const grammar = new GenericGrammar();
    expect(grammar.extractStructured(parsedDocument('https://example.com/a', html, '', grammar))).toEqual({
      listPrice: 100,
    });
  });

  it('ignores unparseable payloads', () => {
    const html = '<script id="__NEXT_DATA__" type="application/json">{broken</script>';
    const grammar = new ZillowGrammar();
    expect(grammar.extractStructured(parsedDocument(ZILLOW_URL, html, '', grammar))).toEqual({});
  });
});

describe('assignScalar', () => {
  it('unwraps value objects and coerces by field', () => {
    const fields: PartialFieldMap = {};
    expect(assignScalar(fields, 'interiorArea', { value: '1,640' })).toBe(true);
    expect(assignScalar(fields, 'postalCode', 2134)).toBe(true);
    expect(assignScalar(fields, 'views', '88.6')).toBe(true);
    expect(fields).toEqual({ interiorArea: 1640, postalCode: '02134', views: 88 });
  });

  it('refuses containers and unusable values', () => {
    const fields: PartialFieldMap = {};
    expect(assignScalar(fields, 'listPrice', { min: 1, max: 2 })).toBe(false);
    expect(assignScalar(fields, 'listPrice', 'call for price')).toBe(false);
    expect(fields).toEqual({});
  });
});
