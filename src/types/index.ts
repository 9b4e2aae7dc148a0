/**
 * Return value of a completed job on the fetch queue
 */
export interface FetchResult {
  jobId: string;
  url: string;
  html: string;
  markdown?: string;
  statusCode?: number;
  headers?: Record<string, string>;
  fetchedAt: Date | string;
}

export * from './extraction.types';
export * from './json.types';
export * from './listing.types';
export * from './rows.types';
