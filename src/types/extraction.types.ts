import type { CheerioAPI } from 'cheerio';
import type { JsonValue } from './json.types';
import type { FieldKey, PartialAddress, PartialFieldMap, SourceId } from './listing.types';

/**
 * One fetched document, parsed once and shared by every stage.
 */
export interface ParsedDocument {
  url: string;
  html: string;
  $: CheerioAPI;
  /** Markdown companion when supplied, otherwise the body text */
  renderedText: string;
  grammar: SiteGrammar;
}

/**
 * A single extraction stage. Implementations never throw for bad content;
 * they return whatever fields they could read.
 */
export interface FieldExtractor {
  readonly name: string;
  extract(doc: ParsedDocument): PartialFieldMap;
}

export type CollectionFieldKey = 'images' | 'agents' | 'priceHistory' | 'similarUrls';

export type ScalarFieldKey = Exclude<FieldKey, CollectionFieldKey | 'listingType'>;

export interface CollectorContext {
  baseUrl: string;
  isListingUrl(url: string): boolean;
}

/**
 * Consumes the value under a collection key (photos, price history, agent
 * attribution, nearby homes) and returns the fields it yields.
 */
export type StateCollector = (value: JsonValue, context: CollectorContext) => PartialFieldMap;

export interface StateWalkProfile {
  /** Object key -> canonical field for scalar values */
  readonly scalarKeys: Readonly<Record<string, ScalarFieldKey>>;
  readonly collectors: Readonly<Record<string, StateCollector>>;
  /** Keys whose string value is serialized JSON to parse and walk */
  readonly nestedJsonKeys: readonly string[];
  /** Subtrees describing other homes */
  readonly skipKeys: readonly string[];
}

export interface StateScriptSpec {
  /** CSS selectors for script elements holding a JSON payload */
  readonly selectors: readonly string[];
  /** Globals assigned inline, e.g. window.__REDUX_STATE__ = {...} */
  readonly variableNames: readonly string[];
}

/**
 * Per-site knowledge: host detection, where the embedded state lives and how
 * the site encodes addresses in its URLs.
 */
export interface SiteGrammar {
  readonly sourceId: SourceId;
  readonly stateScripts: StateScriptSpec;
  readonly stateProfile: StateWalkProfile;
  detect(url: string): SourceId | null;
  extractStructured(doc: ParsedDocument): PartialFieldMap;
  extractUrlAddress(url: string): PartialAddress;
  isListingUrl(url: string): boolean;
}
