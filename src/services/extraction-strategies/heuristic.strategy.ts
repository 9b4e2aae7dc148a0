import { DEFAULT_EXTRACTION_SETTINGS, type ExtractionSettings } from '../../config/extraction';
import type { ParsedDocument } from '../../types/extraction.types';
import type { AgentInfo, PartialFieldMap, PriceEvent } from '../../types/listing.types';
import { parseAddressLine } from '../../utils/address';
import { cleanText, monthNumber, round2, toCoordinate, toInteger, toNumber } from '../../utils/coerce';
import { normalizeUrlForIdentity } from '../../utils/hash';
import { parseAllAttr } from '../../utils/html';
import { BaseExtractionStrategy } from './base.strategy';

const PRICE_RE = /\$\s?(\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{2})?/g;
const BEDS_RE = /(\d+(?:\.\d+)?)\s*(?:bd|beds?|bedrooms?)\b/i;
const BATHS_RE = /(\d+(?:\.\d+)?)\s*(?:ba|baths?|bathrooms?)\b/i;
const AREA_RE = /(\d{1,3}(?:,\d{3})+|\d+)\s*(?:sq\.?\s?ft|sqft|square\s+feet|ft²)/i;
const LOT_RE = /lot(?:\s+size)?\s*:?\s*([\d,]+(?:\.\d+)?)\s*(acres?|sq\.?\s?ft|sqft)/i;
const ENGAGEMENT_RE = /\**([\d,]+)\**\s*(views|saves|favorites|shares)\b/gi;
const DAYS_ON_SITE_RE = /\**([\d,]+)\**\s*days?\s+on\s+[A-Za-z][\w.]*/i;
const YEAR_BUILT_RE = /\b(?:built\s+in|year\s+built:?)\s*(\d{4})\b/i;
const PROPERTY_TYPE_RE =
  /\b(Single Family Residence|Single[- ]Family|Condominium|Condo|Townhouse|Townhome|Multi[- ]?Family|Apartment|Manufactured|Mobile Home)\b/i;
const STATUS_RE = /\b(Active|Pending|Contingent|Sold|Withdrawn|Off market|Coming soon)\b/i;
const HOA_RE = /HOA(?:\s+(?:fees?|dues))?\s*:?\s*\$\s?([\d,]+(?:\.\d{2})?)/i;
const TAX_RE =
  /(?:tax\s+amount|property\s+tax(?:es)?)\s*:?\s*\$\s?([\d,]+(?:\.\d{2})?)(\s*(?:\/\s*mo(?:nth)?\b|per\s+month|monthly))?/i;
const DESCRIPTION_HEADING_RE = /^#{1,4}\s*(?:what'?s special|description|about this (?:home|property))\s*$/i;
const AGENT_HEADING_RE = /^#{1,4}\s*agent information\s*$/i;
const HEADING_RE = /^#{1,6}\s/;
const LISTED_BY_RE = /(?:^|\n)[ \t*_]*(?:listing|listed)\s+by\s*:?[ \t*_]*([^\n]+)/i;
const PHONE_RE = /(?:\+?1[\s\-.]?)?\(?\d{3}\)?[\s\-.]?\d{3}[\s\-.]?\d{4}/;
const EMAIL_RE = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
const DATE_RE =
  /\b(Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)\.?\s+(\d{1,2}),\s*(\d{4})\b/g;
const EVENT_KEYWORD_RE = /\b(sold|listed|price|pending|contingent|removed|delisted|withdrawn)\b/i;
const MARKDOWN_IMAGE_RE = /!\[[^\]]*\]\(\s*([^)\s]+)[^)]*\)/g;
const MARKDOWN_LINK_RE = /(?<!!)\[[^\]]*\]\(\s*([^)\s]+)[^)]*\)/g;
const LAT_RE = /"latitude"\s*:\s*"?(-?\d+(?:\.\d+)?)/;
const LNG_RE = /"longitude"\s*:\s*"?(-?\d+(?:\.\d+)?)/;
const SQFT_PER_ACRE = 43560;

/**
 * Largest currency amount in the text. Rents and fees are smaller than the
 * asking price on a sale page, so the maximum is taken as the list price.
 */
export function maxPrice(text: string): number | null {
  let best: number | null = null;
  for (const match of text.matchAll(PRICE_RE)) {
    const value = toNumber(match[1]);
    if (value !== null && (best === null || value > best)) best = value;
  }
  return best;
}

function tidy(text: string): string | null {
  return cleanText(text.replace(/^[\s\-–|•:()]+|[\s\-–|•:()]+$/g, ''));
}

/**
 * Split an attribution line around its phone number: brokerage on the left,
 * agent name on the right. Without a phone the line is split on " - " or " | ".
 */
export function parseAgentLine(line: string): AgentInfo | null {
  const text = line
    .replace(/^\s*(?:listing|listed)\s+by\s*:?\s*/i, '')
    .replace(/[*_]/g, '')
    .trim();
  if (!text) return null;

  const email = text.match(EMAIL_RE)?.[0] ?? null;
  const rest = email ? text.replace(email, ' ') : text;
  const phone = rest.match(PHONE_RE);

  let brokerage: string | null;
  let name: string | null;
  if (phone && phone.index !== undefined) {
    brokerage = tidy(rest.slice(0, phone.index));
    name = tidy(rest.slice(phone.index + phone[0].length));
  } else {
    const chunks = rest.split(/\s[-–|]\s/);
    brokerage = tidy(chunks[0]);
    name = chunks.length > 1 ? tidy(chunks[1]) : null;
  }
  if (brokerage) brokerage = cleanText(brokerage.replace(/^(?:at|with|from)\s+/i, ''));

  const agent: AgentInfo = {
    name,
    phone: phone ? tidy(phone[0]) : null,
    brokerage,
    email,
  };
  return agent.name || agent.phone || agent.brokerage || agent.email ? agent : null;
}

/**
 * HeuristicStrategy
 * Pattern probes over the rendered text and DOM for whatever the structured
 * sources left empty.
 */
export class HeuristicStrategy extends BaseExtractionStrategy {
  readonly name = 'heuristic';

  constructor(private readonly settings: ExtractionSettings = DEFAULT_EXTRACTION_SETTINGS) {
    super();
  }

  extract(doc: ParsedDocument): PartialFieldMap {
    const text = doc.renderedText;
    const fields: PartialFieldMap = {};

    const price = maxPrice(text);
    if (price !== null) fields.listPrice = price;

    this.readPhysical(text, fields);
    Object.assign(fields, parseAddressLine(text) ?? {});
    this.readEngagement(text, fields);
    this.readFinancials(text, fields);
    this.readCommunity(text, fields);
    this.readCoordinates(doc.html, fields);

    const description = this.readDescription(text);
    if (description) fields.description = description;

    const agents = this.readAgents(doc);
    if (agents.length > 0) fields.agents = agents;

    const history = this.readPriceHistory(text);
    if (history.length > 0) fields.priceHistory = history;

    const images = this.readImages(doc);
    if (images.length > 0) fields.images = images;

    const similarUrls = this.readSimilarUrls(doc);
    if (similarUrls.length > 0) fields.similarUrls = similarUrls;

    return fields;
  }

  private readPhysical(text: string, fields: PartialFieldMap): void {
    const beds = text.match(BEDS_RE);
    const baths = text.match(BATHS_RE);
    const area = text.match(AREA_RE);
    const year = text.match(YEAR_BUILT_RE);
    const type = text.match(PROPERTY_TYPE_RE);
    const status = text.match(STATUS_RE);

    if (beds) fields.beds = parseFloat(beds[1]);
    if (baths) fields.baths = parseFloat(baths[1]);
    const interiorArea = area ? toNumber(area[1]) : null;
    if (interiorArea !== null) fields.interiorArea = interiorArea;
    const yearBuilt = year ? toInteger(year[1]) : null;
    if (yearBuilt !== null) fields.yearBuilt = yearBuilt;
    if (type) fields.propertyType = type[1];
    if (status) fields.status = status[1].toLowerCase();

    const lot = text.match(LOT_RE);
    const lotValue = lot ? toNumber(lot[1]) : null;
    if (lot && lotValue !== null) {
      fields.lotSize = /acre/i.test(lot[2]) ? Math.round(lotValue * SQFT_PER_ACRE) : lotValue;
    }
  }

  private readEngagement(text: string, fields: PartialFieldMap): void {
    for (const match of text.matchAll(ENGAGEMENT_RE)) {
      const count = toInteger(match[1]);
      if (count === null) continue;
      const kind = match[2].toLowerCase();
      if (kind === 'views' && fields.views === undefined) fields.views = count;
      if ((kind === 'saves' || kind === 'favorites') && fields.saves === undefined) fields.saves = count;
      if (kind === 'shares' && fields.shares === undefined) fields.shares = count;
    }

    const days = text.match(DAYS_ON_SITE_RE);
    const daysOnMarket = days ? toInteger(days[1]) : null;
    if (daysOnMarket !== null) fields.daysOnMarket = daysOnMarket;
  }

  private readFinancials(text: string, fields: PartialFieldMap): void {
    const hoa = text.match(HOA_RE);
    const hoaFee = hoa ? toNumber(hoa[1]) : null;
    if (hoaFee !== null) fields.hoaFee = hoaFee;

    const tax = text.match(TAX_RE);
    const amount = tax ? toNumber(tax[1]) : null;
    if (!tax || amount === null) return;
    const monthly = Boolean(tax[2]) || this.underMonthlyHeading(text, tax.index ?? 0);
    fields.annualPropertyTax = monthly ? round2(amount * 12) : amount;
  }

  private underMonthlyHeading(text: string, index: number): boolean {
    const lines = text.slice(0, index).split('\n');
    for (let i = lines.length - 1; i >= 0; i -= 1) {
      if (HEADING_RE.test(lines[i])) return /monthly/i.test(lines[i]);
    }
    return false;
  }

  private readCommunity(text: string, fields: PartialFieldMap): void {
    const probes = [
      ['walkScore', /walk\s*score[®\s:]*(\d{1,3})\b/i],
      ['transitScore', /transit\s*score[®\s:]*(\d{1,3})\b/i],
      ['bikeScore', /bike\s*score[®\s:]*(\d{1,3})\b/i],
    ] as const;
    for (const [field, pattern] of probes) {
      const match = text.match(pattern);
      if (match) fields[field] = parseInt(match[1], 10);
    }
  }

  private readCoordinates(html: string, fields: PartialFieldMap): void {
    const lat = html.match(LAT_RE);
    const lng = html.match(LNG_RE);
    const latitude = lat ? toCoordinate(lat[1]) : null;
    const longitude = lng ? toCoordinate(lng[1]) : null;
    if (latitude !== null) fields.latitude = latitude;
    if (longitude !== null) fields.longitude = longitude;
  }

  /**
   * Body of the first description-like markdown section.
   */
  private readDescription(text: string): string | null {
    const lines = text.split('\n');
    const start = lines.findIndex((line) => DESCRIPTION_HEADING_RE.test(line.trim()));
    if (start === -1) return null;

    const body: string[] = [];
    for (const line of lines.slice(start + 1)) {
      if (HEADING_RE.test(line.trim())) break;
      body.push(line);
    }
    return cleanText(body.join(' '));
  }

  private readAgents(doc: ParsedDocument): AgentInfo[] {
    const { $ } = doc;
    const lines: string[] = [];

    for (const selector of this.settings.agentSelectors) {
      $(selector).each((_, el) => {
        const line = this.squash($(el).text());
        if (line) lines.push(line);
      });
    }

    const listedBy = doc.renderedText.match(LISTED_BY_RE);
    if (listedBy) {
      lines.push(listedBy[1]);
    } else {
      const sectionLine = this.agentSectionLine(doc.renderedText);
      if (sectionLine) lines.push(sectionLine);
    }

    const agents: AgentInfo[] = [];
    for (const line of lines) {
      const agent = parseAgentLine(line);
      if (!agent) continue;
      const duplicate = agents.some((a) => a.name === agent.name && a.phone === agent.phone);
      if (!duplicate) agents.push(agent);
    }
    return agents;
  }

  private agentSectionLine(text: string): string | null {
    const lines = text.split('\n').map((line) => line.trim());
    const start = lines.findIndex((line) => AGENT_HEADING_RE.test(line));
    if (start === -1) return null;
    return lines.slice(start + 1).find((line) => line.length > 0 && !HEADING_RE.test(line)) ?? null;
  }

  /**
   * Date followed by an amount within the configured window. The window is
   * cut at the next date so one event never takes another's price.
   */
  private readPriceHistory(text: string): PriceEvent[] {
    const dates = [...text.matchAll(DATE_RE)];
    const events: PriceEvent[] = [];

    dates.forEach((match, i) => {
      const month = monthNumber(match[1]);
      const start = (match.index ?? 0) + match[0].length;
      const nextDate = i + 1 < dates.length ? dates[i + 1].index ?? text.length : text.length;
      const window = text.slice(start, Math.min(start + this.settings.priceHistoryWindow, nextDate));

      const amount = window.match(/\$\s?(\d{1,3}(?:,\d{3})+|\d+)/);
      if (!amount || month === null) return;

      const label = window.slice(0, amount.index ?? 0);
      const keyword = label.match(EVENT_KEYWORD_RE);
      const day = match[2].padStart(2, '0');
      events.push({
        eventDate: `${match[3]}-${String(month).padStart(2, '0')}-${day}`,
        eventType: keyword ? keyword[1].toLowerCase() : null,
        price: toNumber(amount[1]),
        notes: null,
      });
    });

    return events;
  }

  private readImages(doc: ParsedDocument): string[] {
    const { $ } = doc;
    const candidates: string[] = [];

    $('img').each((_, el) => {
      const img = $(el);
      for (const attr of ['src', 'data-src', 'data-lazy-src', 'data-original']) {
        const value = img.attr(attr);
        if (value) candidates.push(value);
      }
      const srcset = img.attr('srcset');
      const first = srcset?.split(',')[0]?.trim().split(/\s+/)[0];
      if (first) candidates.push(first);
    });

    for (const match of doc.renderedText.matchAll(MARKDOWN_IMAGE_RE)) {
      candidates.push(match[1]);
    }

    return this.resolveUrls(candidates, doc.url, this.settings.maxImageCandidates);
  }

  private readSimilarUrls(doc: ParsedDocument): string[] {
    const candidates = parseAllAttr(doc.$, 'a[href]', 'href');
    for (const match of doc.renderedText.matchAll(MARKDOWN_LINK_RE)) {
      candidates.push(match[1]);
    }

    const self = normalizeUrlForIdentity(doc.url);
    const urls: string[] = [];
    const seen = new Set<string>([self]);
    for (const url of this.resolveUrls(candidates, doc.url)) {
      if (urls.length >= this.settings.maxSimilarUrls) break;
      const key = normalizeUrlForIdentity(url);
      if (seen.has(key) || !doc.grammar.isListingUrl(url)) continue;
      seen.add(key);
      urls.push(url);
    }
    return urls;
  }
}
