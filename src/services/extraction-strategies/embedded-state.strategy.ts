import type {
  CollectorContext,
  ParsedDocument,
  ScalarFieldKey,
  StateCollector,
  StateScriptSpec,
  StateWalkProfile,
} from '../../types/extraction.types';
import { isJsonArray, isJsonObject, type JsonValue } from '../../types/json.types';
import type { ListingFields, PartialFieldMap } from '../../types/listing.types';
import { cleanText, toCoordinate, toInteger, toIsoDate, toNumber, toPostalCode } from '../../utils/coerce';
import { fillMissing, setIfEmpty } from '../../utils/field-map';
import { findBalancedBraces, parseLooseJson } from '../../utils/json-repair';
import { logDebug } from '../../utils/log';
import { BaseExtractionStrategy } from './base.strategy';

type NumericFieldKey = {
  [K in ScalarFieldKey]: ListingFields[K] extends number ? K : never;
}[ScalarFieldKey];

const NUMERIC_FIELDS: ReadonlySet<ScalarFieldKey> = new Set<NumericFieldKey>([
  'latitude',
  'longitude',
  'beds',
  'baths',
  'interiorArea',
  'lotSize',
  'yearBuilt',
  'listPrice',
  'daysOnMarket',
  'views',
  'saves',
  'shares',
  'hoaFee',
  'annualPropertyTax',
  'walkScore',
  'transitScore',
  'bikeScore',
]);

const INTEGER_FIELDS: ReadonlySet<ScalarFieldKey> = new Set<NumericFieldKey>([
  'yearBuilt',
  'daysOnMarket',
  'views',
  'saves',
  'shares',
]);

const MAX_DEPTH = 64;

function isNumericField(key: ScalarFieldKey): key is NumericFieldKey {
  return NUMERIC_FIELDS.has(key);
}

function coerceNumeric(key: NumericFieldKey, value: JsonValue): number | null {
  if (key === 'latitude' || key === 'longitude') return toCoordinate(value);
  if (INTEGER_FIELDS.has(key)) return toInteger(value);
  return toNumber(value);
}

function coerceText(key: Exclude<ScalarFieldKey, NumericFieldKey>, value: JsonValue): string | null {
  if (key === 'postalCode') return toPostalCode(value);
  if (key === 'listDate' && typeof value === 'number') return toIsoDate(value);
  return cleanText(value);
}

/**
 * Unwrap `{ value: 1500 }` style wrappers around scalar values.
 */
function scalarOf(value: JsonValue): JsonValue {
  if (isJsonObject(value)) {
    const inner = value.value ?? value.amount;
    if (inner !== undefined && !isJsonObject(inner) && !isJsonArray(inner)) return inner;
  }
  return value;
}

/**
 * Coerce and store a scalar under its canonical field. Returns false when
 * the value could not be used, so the walker can descend into it instead.
 */
export function assignScalar(fields: PartialFieldMap, key: ScalarFieldKey, raw: JsonValue): boolean {
  const value = scalarOf(raw);
  if (isJsonObject(value) || isJsonArray(value)) return false;
  if (isNumericField(key)) {
    const coerced = coerceNumeric(key, value);
    if (coerced === null) return false;
    setIfEmpty(fields, key, coerced);
    return true;
  }
  const coerced = coerceText(key, value);
  if (coerced === null) return false;
  setIfEmpty(fields, key, coerced);
  return true;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * EmbeddedStateStrategy
 * Reads the application state a site serializes into its page (Next.js data,
 * Redux/Apollo caches) and walks it with the grammar's key profile.
 */
export class EmbeddedStateStrategy extends BaseExtractionStrategy {
  readonly name = 'embedded-state';

  private readonly scalarKeys: ReadonlyMap<string, ScalarFieldKey>;
  private readonly collectors: ReadonlyMap<string, StateCollector>;
  private readonly skipKeys: ReadonlySet<string>;
  private readonly nestedJsonKeys: ReadonlySet<string>;

  constructor(
    private readonly scripts: StateScriptSpec,
    profile: StateWalkProfile
  ) {
    super();
    // Maps, so JSON keys such as "constructor" never hit Object.prototype
    this.scalarKeys = new Map(Object.entries(profile.scalarKeys));
    this.collectors = new Map(Object.entries(profile.collectors));
    this.skipKeys = new Set(profile.skipKeys);
    this.nestedJsonKeys = new Set(profile.nestedJsonKeys);
  }

  extract(doc: ParsedDocument): PartialFieldMap {
    const fields: PartialFieldMap = {};
    const context: CollectorContext = {
      baseUrl: doc.url,
      isListingUrl: (url) => doc.grammar.isListingUrl(url),
    };

    for (const payload of this.locatePayloads(doc)) {
      this.walk(payload, fields, context, 0);
    }
    return fields;
  }

  /**
   * Parsed payloads in document order: selector matches first, then inline
   * variable assignments.
   */
  locatePayloads(doc: ParsedDocument): JsonValue[] {
    const { $ } = doc;
    const payloads: JsonValue[] = [];

    for (const selector of this.scripts.selectors) {
      $(selector).each((_, el) => {
        const raw = $(el).html() ?? '';
        const parsed = parseLooseJson(raw);
        if (parsed === null) {
          logDebug(this.name, `Unparseable payload in ${selector} (${raw.length} chars)`);
          return;
        }
        payloads.push(parsed);
      });
    }

    if (this.scripts.variableNames.length === 0) return payloads;

    $('script:not([src])').each((_, el) => {
      const text = $(el).html() ?? '';
      for (const name of this.scripts.variableNames) {
        const assignment = new RegExp(`${escapeRegExp(name)}\\s*=\\s*`).exec(text);
        if (!assignment) continue;
        const slice = findBalancedBraces(text, assignment.index + assignment[0].length);
        const parsed = slice ? parseLooseJson(slice) : null;
        if (parsed === null) {
          logDebug(this.name, `Unparseable assignment to ${name}`);
          continue;
        }
        payloads.push(parsed);
      }
    });

    return payloads;
  }

  private walk(node: JsonValue, fields: PartialFieldMap, context: CollectorContext, depth: number): void {
    if (depth > MAX_DEPTH) return;

    if (isJsonArray(node)) {
      for (const item of node) this.walk(item, fields, context, depth + 1);
      return;
    }
    if (!isJsonObject(node)) return;

    const children: JsonValue[] = [];

    for (const [key, value] of Object.entries(node)) {
      if (this.skipKeys.has(key)) continue;

      const collector = this.collectors.get(key);
      if (collector) {
        fillMissing(fields, collector(value, context));
        continue;
      }

      const field = this.scalarKeys.get(key);
      if (field && assignScalar(fields, field, value)) continue;

      if (typeof value === 'string') {
        if (this.nestedJsonKeys.has(key)) {
          const parsed = parseLooseJson(value);
          if (parsed !== null) children.push(parsed);
        }
        continue;
      }

      if (isJsonObject(value) || isJsonArray(value)) children.push(value);
    }

    for (const child of children) this.walk(child, fields, context, depth + 1);
  }
}
