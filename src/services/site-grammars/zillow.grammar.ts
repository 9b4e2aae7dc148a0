import type { StateScriptSpec, StateWalkProfile } from '../../types/extraction.types';
import type { PartialAddress } from '../../types/listing.types';
import { BaseSiteGrammar, hostOf, pathSegments } from './site-grammar';
import {
  collectAgents,
  collectPhotos,
  collectPriceEvents,
  collectSimilarHomes,
  collectStatus,
} from './state-collectors';

const STREET_SUFFIXES = new Set([
  'st',
  'street',
  'ave',
  'avenue',
  'rd',
  'road',
  'blvd',
  'dr',
  'drive',
  'ln',
  'lane',
  'ct',
  'pl',
  'way',
  'ter',
  'pkwy',
  'cir',
  'hwy',
  'sq',
  'loop',
  'trl',
]);

const UNIT_MARKERS = new Set(['apt', 'unit', 'ste', 'suite', 'fl']);

const ZPID_RE = /\/(\d+)_zpid/;

export const ZILLOW_PROFILE: StateWalkProfile = {
  scalarKeys: {
    zpid: 'externalId',
    streetAddress: 'street',
    city: 'city',
    state: 'state',
    zipcode: 'postalCode',
    latitude: 'latitude',
    longitude: 'longitude',
    price: 'listPrice',
    bedrooms: 'beds',
    bathrooms: 'baths',
    livingArea: 'interiorArea',
    livingAreaValue: 'interiorArea',
    lotSize: 'lotSize',
    yearBuilt: 'yearBuilt',
    homeType: 'propertyType',
    description: 'description',
    datePostedString: 'listDate',
    daysOnZillow: 'daysOnMarket',
    pageViewCount: 'views',
    favoriteCount: 'saves',
    monthlyHoaFee: 'hoaFee',
    hoaFee: 'hoaFee',
    taxAnnualAmount: 'annualPropertyTax',
  },
  collectors: {
    photos: collectPhotos,
    responsivePhotos: collectPhotos,
    originalPhotos: collectPhotos,
    photoGallery: collectPhotos,
    hiResImageLink: collectPhotos,
    priceHistory: collectPriceEvents,
    attributionInfo: collectAgents,
    homeStatus: collectStatus,
    nearbyHomes: collectSimilarHomes,
    comps: collectSimilarHomes,
  },
  nestedJsonKeys: ['gdpClientCache', 'apiCache'],
  skipKeys: ['taxHistory', 'schools', 'adTargets', 'mortgageRates', 'staticMap', 'topNavJson'],
};

/**
 * Zillow homedetails pages. URL shape:
 * /homedetails/<street>-<city>-<ST>-<ZIP>/<zpid>_zpid/
 */
export class ZillowGrammar extends BaseSiteGrammar {
  readonly sourceId = 'zillow' as const;
  protected readonly hosts = ['zillow.com'];

  readonly stateScripts: StateScriptSpec = {
    selectors: ['script#__NEXT_DATA__', 'script[data-zrr-shared-data-key]', 'script#hdpApolloPreloadedData'],
    variableNames: [],
  };

  readonly stateProfile = ZILLOW_PROFILE;

  extractUrlAddress(url: string): PartialAddress {
    const address: PartialAddress = {};
    const id = url.match(ZPID_RE);
    if (id) address.externalId = id[1];

    const segments = pathSegments(url);
    const slugIndex = segments.indexOf('homedetails') + 1;
    if (slugIndex === 0 || slugIndex >= segments.length) return address;

    const tokens = segments[slugIndex].split('-').filter((token) => token.length > 0);
    const postal = tokens.pop();
    if (!postal || !/^\d{5}$/.test(postal)) return address;
    address.postalCode = postal;

    const state = tokens.pop();
    if (!state || !/^[A-Za-z]{2}$/.test(state)) return address;
    address.state = state.toUpperCase();

    Object.assign(address, this.splitStreetAndCity(tokens));
    return address;
  }

  /**
   * A unit marker pair ends the street and is taken as the unit; otherwise
   * the street ends at the last suffix token that still leaves a city.
   * Without a suffix, a house number plus one word is taken as the street.
   */
  private splitStreetAndCity(tokens: string[]): PartialAddress {
    for (let i = 1; i < tokens.length - 2; i += 1) {
      if (UNIT_MARKERS.has(tokens[i].toLowerCase())) {
        return {
          street: tokens.slice(0, i).join(' '),
          unit: tokens[i + 1],
          city: tokens.slice(i + 2).join(' '),
        };
      }
    }

    for (let i = tokens.length - 2; i >= 1; i -= 1) {
      if (STREET_SUFFIXES.has(tokens[i].toLowerCase())) {
        return {
          street: tokens.slice(0, i + 1).join(' '),
          city: tokens.slice(i + 1).join(' '),
        };
      }
    }

    if (tokens.length >= 3 && /^\d+[A-Za-z]?$/.test(tokens[0])) {
      return { street: tokens.slice(0, 2).join(' '), city: tokens.slice(2).join(' ') };
    }
    return {};
  }

  isListingUrl(url: string): boolean {
    const host = hostOf(url);
    return host !== null && /(^|\.)zillow\.com$/.test(host) && /\/homedetails\/.+_zpid/.test(url);
  }
}
