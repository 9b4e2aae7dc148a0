import type { ParsedDocument } from '../../types/extraction.types';
import { isJsonArray, isJsonObject, type JsonObject, type JsonValue } from '../../types/json.types';
import type { AgentInfo, FieldKey, ListingType, PartialFieldMap } from '../../types/listing.types';
import { FIELD_KEYS } from '../../types/listing.types';
import { parseAddressLine, splitStreetUnit } from '../../utils/address';
import { cleanText, toCoordinate, toInteger, toIsoDate, toNumber, toPostalCode } from '../../utils/coerce';
import { isEmptyValue } from '../../utils/field-map';
import { parseLooseJson } from '../../utils/json-repair';
import { logDebug } from '../../utils/log';
import { BaseExtractionStrategy } from './base.strategy';

const RESIDENCE_TYPES = new Set([
  'SingleFamilyResidence',
  'House',
  'Apartment',
  'Residence',
  'ApartmentComplex',
  'Condominium',
  'Townhouse',
]);

const IGNORED_TYPES = new Set(['BreadcrumbList', 'ListItem', 'WebSite', 'SearchAction', 'Organization']);

const AGENT_TYPES = new Set(['RealEstateAgent', 'Person']);

const MAX_NESTING = 6;

function typesOf(entity: JsonObject): string[] {
  const raw = entity['@type'];
  if (typeof raw === 'string') return [raw];
  if (isJsonArray(raw)) return raw.filter((t): t is string => typeof t === 'string');
  return [];
}

function asList(value: JsonValue | undefined): JsonValue[] {
  if (value === undefined || value === null) return [];
  return isJsonArray(value) ? value : [value];
}

function objectsOf(value: JsonValue | undefined): JsonObject[] {
  return asList(value).filter(isJsonObject);
}

/**
 * Schema.org quantities appear as numbers, strings or QuantitativeValue
 * objects.
 */
function quantity(value: JsonValue | undefined): number | null {
  if (value === undefined) return null;
  if (isJsonObject(value)) return toNumber(value.value ?? value.maxValue ?? value.minValue);
  return toNumber(value);
}

function unionStrings(current: readonly string[], incoming: readonly string[]): string[] {
  const merged = [...current];
  for (const item of incoming) {
    if (!merged.includes(item)) merged.push(item);
  }
  return merged;
}

function unionAgents(current: readonly AgentInfo[], incoming: readonly AgentInfo[]): AgentInfo[] {
  const merged = [...current];
  for (const agent of incoming) {
    const duplicate = merged.some((a) => a.name === agent.name && a.phone === agent.phone);
    if (!duplicate) merged.push(agent);
  }
  return merged;
}

/**
 * Disagreement rule between blocks: the longer string and the larger number
 * win; anything else keeps the first value.
 */
function preferred<T>(current: T, incoming: T): T {
  if (typeof current === 'string' && typeof incoming === 'string') {
    return incoming.length > current.length ? incoming : current;
  }
  if (typeof current === 'number' && typeof incoming === 'number') {
    return incoming > current ? incoming : current;
  }
  return current;
}

function combineField<K extends FieldKey>(acc: PartialFieldMap, next: PartialFieldMap, key: K): void {
  const incoming = next[key];
  if (incoming === undefined || isEmptyValue(incoming)) return;
  const current = acc[key];
  acc[key] = current === undefined || isEmptyValue(current) ? incoming : preferred(current, incoming);
}

export function combineLinkedData(acc: PartialFieldMap, next: PartialFieldMap): void {
  for (const key of FIELD_KEYS) {
    if (key === 'images' || key === 'agents') continue;
    combineField(acc, next, key);
  }
  if (next.images && next.images.length > 0) acc.images = unionStrings(acc.images ?? [], next.images);
  if (next.agents && next.agents.length > 0) acc.agents = unionAgents(acc.agents ?? [], next.agents);
}

/**
 * LinkedDataStrategy
 * Reads schema.org JSON-LD blocks (RealEstateListing, Product/Offer,
 * residence types) including @graph and nested entities.
 */
export class LinkedDataStrategy extends BaseExtractionStrategy {
  readonly name = 'linked-data';

  extract(doc: ParsedDocument): PartialFieldMap {
    const { $ } = doc;
    const combined: PartialFieldMap = {};

    $('script[type="application/ld+json"]').each((index, el) => {
      const parsed = parseLooseJson($(el).html() ?? '');
      if (parsed === null) {
        logDebug(this.name, `Skipping unparseable JSON-LD block #${index}`);
        return;
      }
      for (const entity of this.entities(parsed, 0)) {
        combineLinkedData(combined, this.fromEntity(entity, doc.url));
      }
    });

    return combined;
  }

  /**
   * Flatten a block into its entities: top-level arrays, @graph members and
   * mainEntity / about / offers.itemOffered children.
   */
  private entities(node: JsonValue, depth: number): JsonObject[] {
    if (depth > MAX_NESTING) return [];
    if (isJsonArray(node)) return node.flatMap((item) => this.entities(item, depth + 1));
    if (!isJsonObject(node)) return [];

    const found: JsonObject[] = [node];
    for (const child of asList(node['@graph'])) found.push(...this.entities(child, depth + 1));
    for (const key of ['mainEntity', 'about']) {
      for (const child of asList(node[key])) found.push(...this.entities(child, depth + 1));
    }
    for (const offer of objectsOf(node.offers)) {
      for (const child of asList(offer.itemOffered)) found.push(...this.entities(child, depth + 1));
    }
    return found;
  }

  private fromEntity(entity: JsonObject, baseUrl: string): PartialFieldMap {
    const types = typesOf(entity);
    if (types.some((t) => IGNORED_TYPES.has(t))) return {};
    if (types.some((t) => AGENT_TYPES.has(t))) {
      const agent = this.agentOf(entity);
      return agent ? { agents: [agent] } : {};
    }

    const fields: PartialFieldMap = {};
    this.readAddress(entity.address, fields);

    if (isJsonObject(entity.geo)) {
      const latitude = toCoordinate(entity.geo.latitude);
      const longitude = toCoordinate(entity.geo.longitude);
      if (latitude !== null) fields.latitude = latitude;
      if (longitude !== null) fields.longitude = longitude;
    }

    this.readOffers(entity, fields);

    const beds = quantity(entity.numberOfBedrooms) ?? quantity(entity.numberOfRooms);
    const baths =
      quantity(entity.numberOfBathroomsTotal) ??
      quantity(entity.numberOfBathrooms) ??
      quantity(entity.numberOfFullBathrooms);
    const interiorArea = quantity(entity.floorSize);
    const lotSize = quantity(entity.lotSize);
    const yearBuilt = toInteger(entity.yearBuilt);
    if (beds !== null) fields.beds = beds;
    if (baths !== null) fields.baths = baths;
    if (interiorArea !== null) fields.interiorArea = interiorArea;
    if (lotSize !== null) fields.lotSize = lotSize;
    if (yearBuilt !== null) fields.yearBuilt = yearBuilt;

    const images = this.resolveUrls(this.imageCandidates(entity.image), baseUrl);
    if (images.length > 0) fields.images = images;

    const title = cleanText(entity.name);
    const description = cleanText(entity.description);
    if (title) fields.title = title;
    if (description) fields.description = description;

    const residence = types.find((t) => RESIDENCE_TYPES.has(t));
    if (residence) fields.propertyType = residence;

    const listDate = toIsoDate(entity.datePosted);
    if (listDate) fields.listDate = listDate;

    const agents = ['seller', 'agent', 'broker']
      .flatMap((key) => objectsOf(entity[key]))
      .map((party) => this.agentOf(party))
      .filter((agent): agent is AgentInfo => agent !== null);
    if (agents.length > 0) fields.agents = agents;

    return fields;
  }

  private readAddress(value: JsonValue | undefined, fields: PartialFieldMap): void {
    if (typeof value === 'string') {
      Object.assign(fields, parseAddressLine(value) ?? {});
      return;
    }
    if (!isJsonObject(value)) return;

    const streetLine = cleanText(value.streetAddress);
    if (streetLine) {
      const { street, unit } = splitStreetUnit(streetLine);
      fields.street = street;
      if (unit) fields.unit = unit;
    }
    const city = cleanText(value.addressLocality);
    const state = cleanText(value.addressRegion);
    const postalCode = toPostalCode(value.postalCode);
    if (city) fields.city = city;
    if (state) fields.state = state;
    if (postalCode) fields.postalCode = postalCode;
  }

  private readOffers(entity: JsonObject, fields: PartialFieldMap): void {
    const offer = objectsOf(entity.offers)[0];
    if (!offer) return;

    const specification = objectsOf(offer.priceSpecification)[0];
    const price =
      toNumber(offer.price) ?? (specification ? toNumber(specification.price) : null) ?? toNumber(offer.lowPrice);
    if (price !== null) fields.listPrice = price;

    const hints = [offer.businessFunction, specification?.unitText, offer.category]
      .map((hint) => cleanText(hint) ?? '')
      .join(' ');
    const listingType: ListingType = /lease|rent|month/i.test(hints) ? 'rent' : 'sale';
    fields.listingType = listingType;
  }

  private imageCandidates(value: JsonValue | undefined): string[] {
    const urls: string[] = [];
    for (const item of asList(value)) {
      if (typeof item === 'string') urls.push(item);
      else if (isJsonObject(item)) {
        const url = cleanText(item.url) ?? cleanText(item.contentUrl);
        if (url) urls.push(url);
      }
    }
    return urls;
  }

  private agentOf(party: JsonObject): AgentInfo | null {
    const employer = objectsOf(party.worksFor)[0] ?? objectsOf(party.parentOrganization)[0];
    const agent: AgentInfo = {
      name: cleanText(party.name),
      phone: cleanText(party.telephone),
      brokerage: employer ? cleanText(employer.name) : null,
      email: cleanText(party.email),
    };
    return agent.name || agent.phone || agent.email ? agent : null;
  }
}
