import type {
  ParsedDocument,
  SiteGrammar,
  StateScriptSpec,
  StateWalkProfile,
} from '../../types/extraction.types';
import type { PartialAddress, PartialFieldMap, SourceId } from '../../types/listing.types';
import { EmbeddedStateStrategy } from '../extraction-strategies/embedded-state.strategy';

export function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

export function pathSegments(url: string): string[] {
  try {
    return new URL(url).pathname
      .split('/')
      .filter((segment) => segment.length > 0)
      .map((segment) => decodeURIComponent(segment));
  } catch {
    return [];
  }
}

/**
 * Shared behaviour for site grammars: host matching and embedded-state
 * extraction driven by the subclass's script locations and key profile.
 */
export abstract class BaseSiteGrammar implements SiteGrammar {
  abstract readonly sourceId: SourceId;
  abstract readonly stateScripts: StateScriptSpec;
  abstract readonly stateProfile: StateWalkProfile;
  protected abstract readonly hosts: readonly string[];

  private stateStrategy: EmbeddedStateStrategy | null = null;

  detect(url: string): SourceId | null {
    const host = hostOf(url);
    if (!host) return null;
    const matches = this.hosts.some((domain) => host === domain || host.endsWith(`.${domain}`));
    return matches ? this.sourceId : null;
  }

  extractStructured(doc: ParsedDocument): PartialFieldMap {
    if (!this.stateStrategy) {
      this.stateStrategy = new EmbeddedStateStrategy(this.stateScripts, this.stateProfile);
    }
    return this.stateStrategy.extract(doc);
  }

  abstract extractUrlAddress(url: string): PartialAddress;

  abstract isListingUrl(url: string): boolean;
}
