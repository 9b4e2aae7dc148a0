import type { FieldExtractor, ParsedDocument } from '../../types/extraction.types';
import type { PartialFieldMap } from '../../types/listing.types';
import { resolveUrl } from '../../utils/html';

/**
 * BaseExtractionStrategy
 * Provides common utility methods for all extraction strategies
 */
export abstract class BaseExtractionStrategy implements FieldExtractor {
  abstract readonly name: string;

  abstract extract(doc: ParsedDocument): PartialFieldMap;

  /**
   * Resolve candidate URLs against the page, dropping duplicates and anything
   * that is not http(s).
   */
  protected resolveUrls(candidates: readonly string[], baseUrl: string, limit = Infinity): string[] {
    const urls: string[] = [];
    const seen = new Set<string>();
    for (const candidate of candidates) {
      if (urls.length >= limit) break;
      const resolved = resolveUrl(candidate, baseUrl);
      if (!resolved || seen.has(resolved)) continue;
      seen.add(resolved);
      urls.push(resolved);
    }
    return urls;
  }

  /**
   * Collapse whitespace in text pulled out of the DOM
   */
  protected squash(text: string | undefined | null): string {
    return (text ?? '').replace(/\s+/g, ' ').trim();
  }
}
