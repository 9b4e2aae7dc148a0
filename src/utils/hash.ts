import { createHash } from 'crypto';

/**
 * Deterministic identity hash over pipe-joined parts.
 */
export function stableHash(...parts: string[]): string {
  return createHash('sha1').update(parts.join('|')).digest('hex');
}

/**
 * Canonical URL form used as an identity key: lower-case host, no query,
 * no fragment, no trailing slash.
 */
export function normalizeUrlForIdentity(url: string): string {
  try {
    const parsed = new URL(url.trim());
    const path = parsed.pathname.replace(/\/+$/, '');
    return `${parsed.protocol}//${parsed.host.toLowerCase()}${path}`;
  } catch {
    return url.trim().replace(/[?#].*$/, '').replace(/\/+$/, '');
  }
}
