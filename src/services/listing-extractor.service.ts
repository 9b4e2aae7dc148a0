import { DEFAULT_EXTRACTION_SETTINGS, type ExtractionSettings } from '../config/extraction';
import type { SiteGrammar } from '../types/extraction.types';
import type { CanonicalRecord, ListingDocument, ListingExtractionResult, SourceId } from '../types/listing.types';
import { CascadeMergerService } from './cascade-merger.service';
import { MediaResolverService } from './media-resolver.service';
import { NormalizerService } from './normalizer.service';
import { GrammarRegistry } from './site-grammars';
import { TableProjectorService } from './table-projector.service';

export interface ExtractOptions {
  /** Timestamp written to scraped_timestamp; defaults to now */
  processedAt?: Date;
}

/**
 * ListingExtractorService
 * Stateless facade over the extraction pipeline:
 * cascade merge -> normalize -> resolve media -> project rows
 */
export class ListingExtractorService {
  private readonly grammars: GrammarRegistry;
  private readonly merger: CascadeMergerService;
  private readonly normalizer: NormalizerService;
  private readonly mediaResolver: MediaResolverService;
  private readonly projector = new TableProjectorService();

  constructor(settings: ExtractionSettings = DEFAULT_EXTRACTION_SETTINGS, grammars?: SiteGrammar[]) {
    this.grammars = new GrammarRegistry(grammars);
    this.merger = new CascadeMergerService(settings, this.grammars);
    this.normalizer = new NormalizerService(settings);
    this.mediaResolver = new MediaResolverService(settings);
  }

  /**
   * Register a grammar for an additional site. Checked after the built-ins.
   */
  registerGrammar(grammar: SiteGrammar): void {
    this.grammars.register(grammar);
  }

  extract(document: ListingDocument, options: ExtractOptions = {}): ListingExtractionResult {
    const { record: merged, strategiesUsed, errors } = this.merger.mergeWithReport(
      document.html,
      document.sourceUrl,
      document.renderedText
    );

    const normalized = this.normalizer.normalize(merged);
    const record: CanonicalRecord = {
      ...normalized,
      derived: {
        ...normalized.derived,
        media: this.mediaResolver.resolve(normalized.fields.images ?? []),
      },
    };

    const extractedAt = options.processedAt ?? new Date();
    const rows = this.projector.project(record, extractedAt);

    return {
      record,
      rows,
      metadata: {
        sourceId: record.sourceId,
        source: record.sourceUrl,
        extractedAt,
        blocked: record.blocked,
        strategiesUsed,
        ...(errors.length > 0 && { errors }),
      },
    };
  }

  /**
   * Get list of registered site ids
   */
  getRegisteredGrammars(): SourceId[] {
    return this.grammars.list().map((grammar) => grammar.sourceId);
  }

  /**
   * Check if URL belongs to a site with a dedicated grammar
   */
  isSupportedSite(url: string): boolean {
    return this.grammars.isSupported(url);
  }
}
