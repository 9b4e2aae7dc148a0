/**
 * Extraction settings
 *
 * Synonym tables, markers and thresholds used by the extraction stages.
 * Defaults live in extraction.defaults.json; the parsed value is frozen and
 * passed into each component rather than read from module state.
 */

import { z } from 'zod';
import defaults from './extraction.defaults.json';

export const PROPERTY_TYPES = [
  'single_family',
  'condo',
  'townhouse',
  'multi_family',
  'apartment',
  'manufactured',
  'land',
  'other',
] as const;

export const LISTING_STATUSES = [
  'active',
  'pending',
  'contingent',
  'sold',
  'withdrawn',
  'blocked',
  'unknown',
] as const;

export const PRICE_EVENT_TYPES = ['listed', 'sold', 'price_change', 'pending', 'delisted', 'other'] as const;

const synonymTable = <T extends readonly [string, ...string[]]>(values: T) =>
  z
    .array(
      z.object({
        match: z.string().min(1),
        value: z.enum(values),
      })
    )
    .readonly();

export const ExtractionSettingsSchema = z
  .object({
    minDocumentLength: z.number().int().min(0),
    maxImageCandidates: z.number().int().min(1),
    maxSimilarUrls: z.number().int().min(0),
    priceHistoryWindow: z.number().int().min(10),
    pixelThreshold: z.number().int().min(1),
    blockedMarkers: z.array(z.string().min(1)).readonly(),
    placeholderTitles: z.array(z.string()).readonly(),
    logoMarkers: z.array(z.string().min(1)).readonly(),
    agentSelectors: z.array(z.string().min(1)).readonly(),
    propertyTypeSynonyms: synonymTable(PROPERTY_TYPES),
    statusSynonyms: synonymTable(LISTING_STATUSES),
    priceEventSynonyms: synonymTable(PRICE_EVENT_TYPES),
  })
  .readonly();

export type ExtractionSettings = z.infer<typeof ExtractionSettingsSchema>;

export type ExtractionOverrides = Partial<
  Pick<ExtractionSettings, 'minDocumentLength' | 'maxImageCandidates' | 'maxSimilarUrls'>
>;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function buildExtractionSettings(overrides: ExtractionOverrides = {}): ExtractionSettings {
  return deepFreeze(ExtractionSettingsSchema.parse({ ...defaults, ...overrides }));
}

export const DEFAULT_EXTRACTION_SETTINGS = buildExtractionSettings();
