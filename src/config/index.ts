import { config } from 'dotenv';
import { buildExtractionSettings, type ExtractionOverrides } from './extraction';

config();

function optionalInt(raw: string | undefined): number | undefined {
  if (!raw || raw.trim() === '') return undefined;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function extractionOverrides(): ExtractionOverrides {
  const overrides: { -readonly [K in keyof ExtractionOverrides]: ExtractionOverrides[K] } = {};
  const minDocumentLength = optionalInt(process.env.MIN_DOCUMENT_LENGTH);
  const maxImageCandidates = optionalInt(process.env.MAX_IMAGE_CANDIDATES);
  if (minDocumentLength !== undefined) overrides.minDocumentLength = minDocumentLength;
  if (maxImageCandidates !== undefined) overrides.maxImageCandidates = maxImageCandidates;
  return overrides;
}

export const CONFIG = {
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
  },
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017',
    database: process.env.MONGODB_DATABASE || 'listings',
  },
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'info',
  queue: {
    name: process.env.FETCH_QUEUE_NAME || 'fetch-queue',
  },
  extraction: buildExtractionSettings(extractionOverrides()),
} as const;

export { DEFAULT_EXTRACTION_SETTINGS, type ExtractionSettings } from './extraction';
