import type { StateScriptSpec, StateWalkProfile } from '../../types/extraction.types';
import type { PartialAddress, SourceId } from '../../types/listing.types';
import { BaseSiteGrammar } from './site-grammar';
import { collectAgents, collectPhotos, collectPriceEvents, collectStatus } from './state-collectors';

export const GENERIC_PROFILE: StateWalkProfile = {
  scalarKeys: {
    streetAddress: 'street',
    city: 'city',
    addressLocality: 'city',
    state: 'state',
    addressRegion: 'state',
    zipcode: 'postalCode',
    zip: 'postalCode',
    postalCode: 'postalCode',
    latitude: 'latitude',
    longitude: 'longitude',
    price: 'listPrice',
    listPrice: 'listPrice',
    bedrooms: 'beds',
    beds: 'beds',
    bathrooms: 'baths',
    baths: 'baths',
    livingArea: 'interiorArea',
    squareFeet: 'interiorArea',
    lotSize: 'lotSize',
    yearBuilt: 'yearBuilt',
    homeType: 'propertyType',
    propertyType: 'propertyType',
    description: 'description',
    daysOnMarket: 'daysOnMarket',
  },
  collectors: {
    photos: collectPhotos,
    images: collectPhotos,
    priceHistory: collectPriceEvents,
    agent: collectAgents,
    listingAgent: collectAgents,
    status: collectStatus,
  },
  nestedJsonKeys: [],
  skipKeys: ['nearbyHomes', 'similarHomes', 'comps', 'schools'],
};

/**
 * Fallback for hosts no other grammar claims. Reads the common state globals
 * with a conservative key set and knows no URL shape.
 */
export class GenericGrammar extends BaseSiteGrammar {
  readonly sourceId = 'unknown' as const;
  protected readonly hosts: readonly string[] = [];

  readonly stateScripts: StateScriptSpec = {
    selectors: ['script#__NEXT_DATA__'],
    variableNames: ['__INITIAL_STATE__', '__PRELOADED_STATE__', '__REDUX_STATE__'],
  };

  readonly stateProfile = GENERIC_PROFILE;

  detect(): SourceId {
    return this.sourceId;
  }

  extractUrlAddress(): PartialAddress {
    return {};
  }

  isListingUrl(): boolean {
    return false;
  }
}
