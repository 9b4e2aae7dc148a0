/**
 * Collectors for the collection-valued keys of embedded page state.
 */
import type { CollectorContext, StateCollector } from '../../types/extraction.types';
import { isJsonArray, isJsonObject, type JsonObject, type JsonValue } from '../../types/json.types';
import type { AgentInfo, ListingType, PartialFieldMap, PriceEvent } from '../../types/listing.types';
import { cleanText, toIsoDate, toNumber } from '../../utils/coerce';
import { resolveUrl } from '../../utils/html';

function firstString(obj: JsonObject, keys: readonly string[]): string | null {
  for (const key of keys) {
    const text = cleanText(obj[key]);
    if (text) return text;
  }
  return null;
}

function asList(value: JsonValue): JsonValue[] {
  return isJsonArray(value) ? value : [value];
}

function uniqueResolved(candidates: readonly string[], context: CollectorContext): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];
  for (const candidate of candidates) {
    const url = resolveUrl(candidate, context.baseUrl);
    if (url && !seen.has(url)) {
      seen.add(url);
      urls.push(url);
    }
  }
  return urls;
}

const PHOTO_URL_KEYS = [
  'url',
  'rawUrl',
  'hiResUrl',
  'fullScreenPhotoUrl',
  'nonFullScreenPhotoUrl',
  'contentUrl',
  'href',
  'src',
];

/**
 * The best single URL for one photo entry. `mixedSources` lists renditions
 * smallest first, so the last one wins.
 */
function photoUrlOf(item: JsonValue): string | null {
  if (typeof item === 'string') return cleanText(item);
  if (!isJsonObject(item)) return null;

  const direct = firstString(item, PHOTO_URL_KEYS);
  if (direct) return direct;

  const nested = item.photoUrls;
  if (isJsonObject(nested)) return photoUrlOf(nested);

  const mixed = item.mixedSources;
  if (isJsonObject(mixed)) {
    for (const format of ['jpeg', 'webp']) {
      const renditions = mixed[format];
      if (!isJsonArray(renditions)) continue;
      for (let i = renditions.length - 1; i >= 0; i -= 1) {
        const url = photoUrlOf(renditions[i]);
        if (url) return url;
      }
    }
  }
  return null;
}

export const collectPhotos: StateCollector = (value, context) => {
  const candidates: string[] = [];
  for (const item of asList(value)) {
    const url = photoUrlOf(item);
    if (url && /^(?:https?:)?\/\//i.test(url)) candidates.push(url);
  }
  const images = uniqueResolved(candidates, context);
  return images.length > 0 ? { images } : {};
};

function eventDateOf(item: JsonObject): string | null {
  for (const key of ['date', 'eventDate', 'time']) {
    const raw = item[key];
    if (typeof raw === 'number') return toIsoDate(raw);
    const text = cleanText(raw);
    if (text) return text;
  }
  return null;
}

export const collectPriceEvents: StateCollector = (value) => {
  const events: PriceEvent[] = [];
  for (const item of asList(value)) {
    if (!isJsonObject(item)) continue;
    const event: PriceEvent = {
      eventDate: eventDateOf(item),
      eventType: firstString(item, ['event', 'eventDescription', 'eventType']),
      price: toNumber(item.price ?? item.listPrice ?? item.soldPrice),
      notes: firstString(item, ['notes', 'source']),
    };
    if (event.eventDate || event.eventType || event.price !== null) events.push(event);
  }
  return events.length > 0 ? { priceHistory: events } : {};
};

function agentOf(item: JsonObject): AgentInfo {
  const info: JsonObject = isJsonObject(item.agentInfo) ? item.agentInfo : {};
  return {
    name: firstString(info, ['agentName', 'name']) ?? firstString(item, ['agentName', 'name', 'displayName']),
    phone:
      firstString(info, ['agentPhone', 'phoneNumber', 'phone']) ??
      firstString(item, ['agentPhoneNumber', 'agentPhone', 'phoneNumber', 'phone', 'telephone']),
    brokerage: firstString(item, ['brokerName', 'brokerageName', 'brokerage', 'officeName']),
    email: firstString(info, ['email']) ?? firstString(item, ['agentEmail', 'email']),
  };
}

export const collectAgents: StateCollector = (value) => {
  const agents: AgentInfo[] = [];
  for (const item of asList(value)) {
    if (!isJsonObject(item)) continue;
    const agent = agentOf(item);
    if (agent.name || agent.phone || agent.brokerage || agent.email) agents.push(agent);
  }
  return agents.length > 0 ? { agents } : {};
};

export const collectSimilarHomes: StateCollector = (value, context) => {
  const candidates: string[] = [];
  for (const item of asList(value)) {
    if (typeof item === 'string') {
      candidates.push(item);
    } else if (isJsonObject(item)) {
      const url = firstString(item, ['hdpUrl', 'detailUrl', 'url']);
      if (url) candidates.push(url);
    }
  }
  const similarUrls = uniqueResolved(candidates, context);
  return similarUrls.length > 0 ? { similarUrls } : {};
};

function listingTypeOf(status: string): ListingType | null {
  if (/rent|lease/i.test(status)) return 'rent';
  if (/sale|sold|pending|contingent|active/i.test(status)) return 'sale';
  return null;
}

export const collectStatus: StateCollector = (value) => {
  const status = cleanText(value);
  if (!status) return {};
  const fields: PartialFieldMap = { status };
  const listingType = listingTypeOf(status);
  if (listingType) fields.listingType = listingType;
  return fields;
};

function scoreOf(value: JsonValue | undefined): number | null {
  if (value === undefined) return null;
  if (isJsonObject(value)) return toNumber(value.value ?? value.score);
  return toNumber(value);
}

export const collectCommunityScores: StateCollector = (value) => {
  if (!isJsonObject(value)) return {};
  const fields: PartialFieldMap = {};
  const walk = scoreOf(value.walkScore);
  const transit = scoreOf(value.transitScore);
  const bike = scoreOf(value.bikeScore);
  if (walk !== null) fields.walkScore = walk;
  if (transit !== null) fields.transitScore = transit;
  if (bike !== null) fields.bikeScore = bike;
  return fields;
};
