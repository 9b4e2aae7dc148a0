import type { ParsedDocument } from '../../types/extraction.types';
import type { PartialFieldMap } from '../../types/listing.types';
import type { CheerioAPI } from '../../utils/html';
import { BaseExtractionStrategy } from './base.strategy';

/**
 * MetaTagStrategy
 * Last-resort title, description and images from Open Graph / Twitter card
 * tags and the document title.
 */
export class MetaTagStrategy extends BaseExtractionStrategy {
  readonly name = 'meta-tags';

  extract(doc: ParsedDocument): PartialFieldMap {
    const { $ } = doc;
    const fields: PartialFieldMap = {};

    const title =
      this.meta($, 'og:title') || this.meta($, 'twitter:title') || this.squash($('title').first().text());
    if (title) fields.title = title;

    const description =
      this.meta($, 'og:description') || this.meta($, 'description') || this.meta($, 'twitter:description');
    if (description) fields.description = description;

    const images = this.resolveUrls(
      [
        this.meta($, 'og:image'),
        this.meta($, 'og:image:secure_url'),
        this.meta($, 'twitter:image'),
        this.meta($, 'twitter:image:src'),
      ].filter((url) => url.length > 0),
      doc.url
    );
    if (images.length > 0) fields.images = images;

    return fields;
  }

  private meta($: CheerioAPI, key: string): string {
    const content =
      $(`meta[property="${key}"]`).first().attr('content') ?? $(`meta[name="${key}"]`).first().attr('content');
    return this.squash(content);
  }
}
