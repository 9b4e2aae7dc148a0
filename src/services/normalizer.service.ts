import { DEFAULT_EXTRACTION_SETTINGS, type ExtractionSettings } from '../config/extraction';
import type {
  AgentInfo,
  CanonicalRecord,
  FieldSlots,
  PriceEvent,
  RecordIdentity,
  SourceId,
} from '../types/listing.types';
import { cleanText, round2, toIsoDate, toPostalCode } from '../utils/coerce';
import { normalizeUrlForIdentity, stableHash } from '../utils/hash';
import { matchVocabulary } from '../utils/vocabulary';

function normalizeAddressPart(value: string | null): string {
  if (!value) return '';
  return value
    .normalize('NFKD')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

function finiteOrNull(value: number | null): number | null {
  return value !== null && Number.isFinite(value) ? value : null;
}

function uniqueList(values: readonly string[] | null): string[] | null {
  if (!values) return null;
  const unique = [...new Set(values.map((value) => value.trim()).filter((value) => value.length > 0))];
  return unique.length > 0 ? unique : null;
}

/**
 * NormalizerService
 * Coerces raw extracted values onto canonical formats and vocabularies, then
 * assigns deterministic identities. Normalizing an already normalized record
 * changes nothing.
 */
export class NormalizerService {
  constructor(private readonly settings: ExtractionSettings = DEFAULT_EXTRACTION_SETTINGS) {}

  normalize(record: CanonicalRecord): CanonicalRecord {
    const fields = this.normalizeFields(record.fields, record.blocked);
    return {
      ...record,
      fields,
      provenance: { ...record.provenance },
      derived: {
        pricePerUnitArea: this.pricePerUnitArea(fields),
        media: record.derived.media,
      },
      identity: this.identify(record.sourceId, record.sourceUrl, fields),
    };
  }

  identify(sourceId: SourceId, sourceUrl: string, fields: FieldSlots): RecordIdentity {
    const key = fields.externalId ?? normalizeUrlForIdentity(sourceUrl);
    return {
      listingId: stableHash('listing', sourceId, key),
      propertyId: stableHash('property', sourceId, key),
      locationId: this.locationId(fields),
    };
  }

  /**
   * Hash of the normalized street|unit|city|state|postal tuple; null when
   * the record has no address at all.
   */
  locationId(fields: FieldSlots): string | null {
    const parts = [fields.street, fields.unit, fields.city, fields.state, fields.postalCode].map(
      normalizeAddressPart
    );
    if (parts.every((part) => part === '')) return null;
    return stableHash(...parts);
  }

  pricePerUnitArea(fields: FieldSlots): number | null {
    const { listPrice, interiorArea } = fields;
    if (listPrice === null || interiorArea === null || interiorArea === 0) return null;
    return round2(listPrice / interiorArea);
  }

  private normalizeFields(raw: FieldSlots, blocked: boolean): FieldSlots {
    const state = cleanText(raw.state);
    const status = blocked ? 'blocked' : this.normalizeStatus(raw.status);

    return {
      ...raw,
      externalId: cleanText(raw.externalId),
      street: cleanText(raw.street),
      unit: cleanText(raw.unit),
      city: cleanText(raw.city),
      state: state && state.length === 2 ? state.toUpperCase() : state,
      postalCode: toPostalCode(raw.postalCode),
      latitude: finiteOrNull(raw.latitude),
      longitude: finiteOrNull(raw.longitude),
      beds: finiteOrNull(raw.beds),
      baths: finiteOrNull(raw.baths),
      interiorArea: finiteOrNull(raw.interiorArea),
      lotSize: finiteOrNull(raw.lotSize),
      yearBuilt: finiteOrNull(raw.yearBuilt),
      propertyType: raw.propertyType
        ? matchVocabulary(raw.propertyType, this.settings.propertyTypeSynonyms) ?? 'other'
        : null,
      subtype: cleanText(raw.subtype),
      condition: cleanText(raw.condition),
      listPrice: finiteOrNull(raw.listPrice),
      status,
      listDate: raw.listDate ? toIsoDate(raw.listDate) : null,
      title: cleanText(raw.title),
      description: cleanText(raw.description),
      images: uniqueList(raw.images),
      agents: raw.agents ? raw.agents.map((agent) => this.normalizeAgent(agent)) : null,
      priceHistory: raw.priceHistory ? raw.priceHistory.map((event) => this.normalizeEvent(event)) : null,
      similarUrls: uniqueList(raw.similarUrls),
    };
  }

  normalizeStatus(raw: string | null): string {
    if (!raw) return 'unknown';
    return matchVocabulary(raw, this.settings.statusSynonyms) ?? 'unknown';
  }

  private normalizeAgent(agent: AgentInfo): AgentInfo {
    return {
      name: cleanText(agent.name),
      phone: cleanText(agent.phone),
      brokerage: cleanText(agent.brokerage),
      email: cleanText(agent.email),
    };
  }

  private normalizeEvent(event: PriceEvent): PriceEvent {
    return {
      eventDate: event.eventDate ? toIsoDate(event.eventDate) : null,
      eventType: event.eventType
        ? matchVocabulary(event.eventType, this.settings.priceEventSynonyms) ?? 'other'
        : 'other',
      price: finiteOrNull(event.price),
      notes: cleanText(event.notes),
    };
  }
}
