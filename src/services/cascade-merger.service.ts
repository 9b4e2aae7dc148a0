import { DEFAULT_EXTRACTION_SETTINGS, type ExtractionSettings } from '../config/extraction';
import type { FieldExtractor, ParsedDocument, SiteGrammar } from '../types/extraction.types';
import { ADDRESS_KEYS, type CanonicalRecord, type PartialFieldMap, type SourceId } from '../types/listing.types';
import { ExtractionInputError } from '../utils/errors';
import { emptySlots, fillSlots, isEmptyValue } from '../utils/field-map';
import { loadHtml, renderText } from '../utils/html';
import { errorMessage, logDebug } from '../utils/log';
import { HeuristicStrategy } from './extraction-strategies/heuristic.strategy';
import { LinkedDataStrategy } from './extraction-strategies/linked-data.strategy';
import { MetaTagStrategy } from './extraction-strategies/meta-tag.strategy';
import { GrammarRegistry } from './site-grammars';

export interface MergeReport {
  record: CanonicalRecord;
  strategiesUsed: string[];
  errors: string[];
}

export function createEmptyRecord(sourceId: SourceId, sourceUrl: string): CanonicalRecord {
  return {
    sourceId,
    sourceUrl,
    blocked: false,
    fields: emptySlots(),
    provenance: {},
    derived: { pricePerUnitArea: null, media: null },
    identity: null,
  };
}

/**
 * CascadeMergerService
 * Runs the extractors in priority order over one document and fills each
 * record slot at most once:
 * embedded-state -> linked-data -> meta-tags -> heuristic -> url-fallback
 */
export class CascadeMergerService {
  private readonly extractors: FieldExtractor[];

  constructor(
    private readonly settings: ExtractionSettings = DEFAULT_EXTRACTION_SETTINGS,
    private readonly grammars: GrammarRegistry = new GrammarRegistry()
  ) {
    this.extractors = [new LinkedDataStrategy(), new MetaTagStrategy(), new HeuristicStrategy(settings)];
  }

  merge(html: string, sourceUrl: string, renderedText?: string): CanonicalRecord {
    return this.mergeWithReport(html, sourceUrl, renderedText).record;
  }

  mergeWithReport(html: string, sourceUrl: string, renderedText?: string): MergeReport {
    if (typeof sourceUrl !== 'string' || sourceUrl.trim() === '') {
      throw new ExtractionInputError('sourceUrl is required');
    }

    const url = sourceUrl.trim();
    const grammar = this.grammars.resolve(url);
    const record = createEmptyRecord(grammar.sourceId, url);
    const report: MergeReport = { record, strategiesUsed: [], errors: [] };
    const markdown = renderedText ?? '';

    if (html.trim() === '' && markdown.trim() === '') {
      logDebug('cascade', `Empty document for ${url}`);
      return report;
    }

    if (this.isBlocked(html, markdown)) {
      console.warn(`[cascade] Blocked or challenge page: ${url}`);
      record.blocked = true;
      record.fields.status = 'blocked';
      record.provenance.status = 'blocked-page-detector';
      const externalId = grammar.extractUrlAddress(url).externalId;
      if (externalId) {
        record.fields.externalId = externalId;
        record.provenance.externalId = 'url-fallback';
      }
      return report;
    }

    const doc = this.parseDocument(html, url, markdown, grammar);
    const stages: FieldExtractor[] = [
      { name: 'embedded-state', extract: (d) => d.grammar.extractStructured(d) },
      ...this.extractors,
    ];

    for (const stage of stages) {
      this.runStage(stage, doc, report);
    }

    if (this.needsUrlFallback(record)) {
      this.runStage({ name: 'url-fallback', extract: (d) => d.grammar.extractUrlAddress(d.url) }, doc, report);
    }

    return report;
  }

  /**
   * Short non-empty documents and known challenge markers both count as
   * blocked. Length is measured on the longer of the HTML and rendered text.
   */
  isBlocked(html: string, renderedText = ''): boolean {
    const length = Math.max(html.trim().length, renderedText.trim().length);
    if (length === 0) return false;
    if (length < this.settings.minDocumentLength) return true;

    const haystack = `${html}\n${renderedText}`.toLowerCase();
    return this.settings.blockedMarkers.some((marker) => haystack.includes(marker.toLowerCase()));
  }

  private parseDocument(html: string, url: string, markdown: string, grammar: SiteGrammar): ParsedDocument {
    return {
      url,
      html,
      $: loadHtml(html),
      renderedText: markdown.trim() !== '' ? markdown : renderText(html),
      grammar,
    };
  }

  private runStage(stage: FieldExtractor, doc: ParsedDocument, report: MergeReport): void {
    const { record } = report;
    try {
      const written = fillSlots(record.fields, this.withoutPlaceholderTitle(stage.extract(doc)));
      for (const key of written) record.provenance[key] = stage.name;
      if (written.length > 0) report.strategiesUsed.push(stage.name);
      logDebug('cascade', `${stage.name} filled ${written.length} field(s)`);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[cascade] ${stage.name} failed for ${doc.url}:`, message);
      report.errors.push(`${stage.name}: ${message}`);
    }
  }

  private needsUrlFallback(record: CanonicalRecord): boolean {
    const { fields } = record;
    return isEmptyValue(fields.externalId) || ADDRESS_KEYS.some((key) => isEmptyValue(fields[key]));
  }

  /** Placeholder titles never occupy the slot, so a later stage can fill it. */
  private withoutPlaceholderTitle(fields: PartialFieldMap): PartialFieldMap {
    const title = fields.title;
    if (title === undefined) return fields;
    const normalized = title.trim().toLowerCase();
    if (!this.settings.placeholderTitles.some((placeholder) => placeholder.toLowerCase() === normalized)) {
      return fields;
    }
    return { ...fields, title: undefined };
  }
}
