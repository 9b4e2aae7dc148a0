import { DEFAULT_EXTRACTION_SETTINGS, type ExtractionSettings } from '../config/extraction';

interface UpgradeRule {
  pattern: RegExp;
  replacement: string;
}

// Known low-resolution URL shapes and their full-size equivalents
const UPGRADE_RULES: readonly UpgradeRule[] = [
  { pattern: /-cc_ft_\d+(\.[a-z0-9]+)$/i, replacement: '-uncropped_scaled_within_1536_1152$1' },
  { pattern: /\/\d+x\d+\.webp$/i, replacement: '/origin.webp' },
];

const COMPASS_ID_RE = /([a-f0-9]{32,})_img_(\d+)/i;
const UUID_RE = /[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}/i;
const HEX_RUN_RE = /[a-f0-9]{30,}/i;

const SIZE_TOKEN = '(?:origin|original|full|xl|large|lg|medium|md|small|sm|thumb|thumbnail|\\d+x\\d+)';
const SIZE_ONLY_RE = new RegExp(`^${SIZE_TOKEN}$`, 'i');
const SIZE_SUFFIX_RE = new RegExp(`[-_]${SIZE_TOKEN}$`, 'i');

const ORIGIN_RE = /(?:^|[/_\-.])(?:origin|original|full)(?=[/_\-.]|$)|uncropped_scaled_within/i;
const LARGE_RE = /(?:^|[/_\-.])(?:xl|large|lg)(?=[/_\-.]|$)/i;
const MEDIUM_RE = /(?:^|[/_\-.])(?:medium|md)(?=[/_\-.]|$)/i;
const SMALL_RE = /(?:^|[/_\-.])(?:small|sm|thumb|thumbnail)(?=[/_\-.]|$)/i;
const DIMENSIONS_RE = /(\d{2,5})x(\d{2,5})/i;

const TIER = 1_000_000_000;

/**
 * MediaResolverService
 * Filters, upgrades and de-duplicates candidate image URLs.
 */
export class MediaResolverService {
  constructor(private readonly settings: ExtractionSettings = DEFAULT_EXTRACTION_SETTINGS) {}

  resolve(urls: readonly string[]): string[] {
    const best = new Map<string, { url: string; score: number }>();

    for (const raw of urls) {
      const candidate = raw.trim();
      if (!this.isUsable(candidate)) continue;

      const url = this.upgrade(candidate);
      const key = this.identityKey(url);
      const score = this.qualityScore(url);
      const current = best.get(key);
      // Map.set on an existing key keeps its original position
      if (!current || score > current.score) best.set(key, { url, score });
    }

    return [...best.values()].map((entry) => entry.url);
  }

  isUsable(url: string): boolean {
    if (!/^https?:\/\//i.test(url)) return false;
    const lower = url.toLowerCase();
    return !this.settings.logoMarkers.some((marker) => lower.includes(marker.toLowerCase()));
  }

  upgrade(url: string): string {
    for (const rule of UPGRADE_RULES) {
      if (rule.pattern.test(url)) return url.replace(rule.pattern, rule.replacement);
    }
    return url;
  }

  /**
   * Content hash embedded in the URL where there is one, otherwise the file
   * name without its size tokens.
   */
  identityKey(url: string): string {
    const compass = url.match(COMPASS_ID_RE);
    if (compass) return `${compass[1].toLowerCase()}_img_${compass[2]}`;

    const uuid = url.match(UUID_RE);
    if (uuid) return uuid[0].toLowerCase();

    const hex = url.match(HEX_RUN_RE);
    if (hex) return hex[0].toLowerCase();

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return url;
    }

    const segments = parsed.pathname.split('/').filter((segment) => segment.length > 0);
    const file = segments.pop() ?? '';
    const directory = `${parsed.host.toLowerCase()}/${segments.join('/')}`;
    let stem = file.replace(/\.[a-z0-9]+$/i, '').toLowerCase();

    if (SIZE_ONLY_RE.test(stem)) return directory;
    while (SIZE_SUFFIX_RE.test(stem)) stem = stem.replace(SIZE_SUFFIX_RE, '');
    return `${directory}/${stem}`;
  }

  qualityScore(url: string): number {
    if (ORIGIN_RE.test(url)) return 4 * TIER;

    const dimensions = url.match(DIMENSIONS_RE);
    const pixels = dimensions ? parseInt(dimensions[1], 10) * parseInt(dimensions[2], 10) : 0;
    if (pixels >= this.settings.pixelThreshold) return 3 * TIER + pixels;

    if (LARGE_RE.test(url)) return 2 * TIER + 3;
    if (MEDIUM_RE.test(url)) return 2 * TIER + 2;
    if (SMALL_RE.test(url)) return 2 * TIER + 1;
    return pixels > 0 ? pixels : TIER;
  }
}
