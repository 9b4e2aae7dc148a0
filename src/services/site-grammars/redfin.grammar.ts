import type { StateScriptSpec, StateWalkProfile } from '../../types/extraction.types';
import type { PartialAddress } from '../../types/listing.types';
import { BaseSiteGrammar, hostOf, pathSegments } from './site-grammar';
import {
  collectAgents,
  collectCommunityScores,
  collectPhotos,
  collectPriceEvents,
  collectSimilarHomes,
  collectStatus,
} from './state-collectors';

const HOME_ID_RE = /\/home\/(\d+)/;

export const REDFIN_PROFILE: StateWalkProfile = {
  scalarKeys: {
    propertyId: 'externalId',
    streetLine: 'street',
    streetAddress: 'street',
    unitNumber: 'unit',
    city: 'city',
    state: 'state',
    stateCode: 'state',
    zip: 'postalCode',
    zipCode: 'postalCode',
    postalCode: 'postalCode',
    latitude: 'latitude',
    longitude: 'longitude',
    price: 'listPrice',
    listPrice: 'listPrice',
    beds: 'beds',
    numBeds: 'beds',
    baths: 'baths',
    bathsTotal: 'baths',
    numBaths: 'baths',
    squareFeet: 'interiorArea',
    sqFt: 'interiorArea',
    livingArea: 'interiorArea',
    lotSize: 'lotSize',
    lotSqFt: 'lotSize',
    yearBuilt: 'yearBuilt',
    propertyTypeName: 'propertyType',
    marketingRemark: 'description',
    listingRemarks: 'description',
    daysOnMarket: 'daysOnMarket',
    dom: 'daysOnMarket',
    hoaDues: 'hoaFee',
    taxesDue: 'annualPropertyTax',
    walkScore: 'walkScore',
    transitScore: 'transitScore',
    bikeScore: 'bikeScore',
  },
  collectors: {
    photos: collectPhotos,
    events: collectPriceEvents,
    listingAgents: collectAgents,
    mlsStatus: collectStatus,
    similarHomes: collectSimilarHomes,
    nearbyHomes: collectSimilarHomes,
    walkScoreData: collectCommunityScores,
  },
  nestedJsonKeys: [],
  skipKeys: ['schools', 'schoolsAndDistrictsInfo', 'commentsInfo', 'nearbySales'],
};

/**
 * Redfin home pages. URL shape:
 * /<ST>/<City-Name>/<street>-<ZIP>/unit-<U>/home/<id>
 */
export class RedfinGrammar extends BaseSiteGrammar {
  readonly sourceId = 'redfin' as const;
  protected readonly hosts = ['redfin.com'];

  readonly stateScripts: StateScriptSpec = {
    selectors: ['script#__NEXT_DATA__'],
    variableNames: ['__REDUX_STATE__', '__INITIAL_STATE__'],
  };

  readonly stateProfile = REDFIN_PROFILE;

  extractUrlAddress(url: string): PartialAddress {
    const address: PartialAddress = {};
    const id = url.match(HOME_ID_RE);
    if (id) address.externalId = id[1];

    const segments = pathSegments(url);
    const homeIndex = segments.indexOf('home');
    if (homeIndex < 3) return address;

    const [state, city, streetSlug] = segments;
    if (/^[A-Za-z]{2}$/.test(state)) address.state = state.toUpperCase();
    if (city) address.city = city.replace(/-/g, ' ');

    const tokens = streetSlug.split('-').filter((token) => token.length > 0);
    const last = tokens[tokens.length - 1];
    if (last && /^\d{5}$/.test(last)) {
      address.postalCode = last;
      tokens.pop();
    }
    if (tokens.length > 0) address.street = tokens.join(' ');

    const unitSegment = segments.slice(3, homeIndex).find((segment) => /^unit-/i.test(segment));
    if (unitSegment) {
      const unit = unitSegment.slice('unit-'.length);
      if (unit) address.unit = unit;
    }
    return address;
  }

  isListingUrl(url: string): boolean {
    const host = hostOf(url);
    return host !== null && /(^|\.)redfin\.com$/.test(host) && HOME_ID_RE.test(url);
  }
}
