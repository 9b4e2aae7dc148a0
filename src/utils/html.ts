/**
 * Thin wrappers around cheerio used by the extraction strategies.
 */
import * as cheerio from 'cheerio';

export type CheerioAPI = cheerio.CheerioAPI;

export function loadHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

/**
 * Collect all trimmed, non-empty attribute values from matching elements.
 */
export function parseAllAttr($: CheerioAPI, selector: string, attr: string): string[] {
  const results: string[] = [];
  $(selector).each((_, el) => {
    const val = $(el).attr(attr);
    if (val && val.trim().length > 0) results.push(val.trim());
  });
  return results;
}

/**
 * Resolve a possibly relative or protocol-relative URL against the page URL.
 * Returns null for anything that does not end up as http(s).
 */
export function resolveUrl(raw: string, baseUrl: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed || trimmed.startsWith('data:') || trimmed.startsWith('javascript:')) return null;
  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    return resolved.toString();
  } catch {
    return null;
  }
}

const BLOCK_ELEMENTS = 'br, p, div, li, tr, h1, h2, h3, h4, h5, h6, section, article, header, footer, dt, dd';

/**
 * Visible text of a document with one line per block element. Script and
 * style contents are dropped.
 */
export function renderText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, template').remove();
  $(BLOCK_ELEMENTS).after('\n');
  const text = $('body').length > 0 ? $('body').text() : $.root().text();
  return text
    .split('\n')
    .map((line) => line.replace(/[ \t ]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}
