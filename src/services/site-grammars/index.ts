import type { SiteGrammar } from '../../types/extraction.types';
import { GenericGrammar } from './generic.grammar';
import { RedfinGrammar } from './redfin.grammar';
import { ZillowGrammar } from './zillow.grammar';

export { BaseSiteGrammar } from './site-grammar';
export { GenericGrammar } from './generic.grammar';
export { RedfinGrammar } from './redfin.grammar';
export { ZillowGrammar } from './zillow.grammar';

export function createDefaultGrammars(): SiteGrammar[] {
  return [new ZillowGrammar(), new RedfinGrammar()];
}

/**
 * Ordered grammar lookup with a generic fallback for unclaimed hosts.
 */
export class GrammarRegistry {
  private readonly grammars: SiteGrammar[];
  private readonly fallback: SiteGrammar = new GenericGrammar();

  constructor(grammars: SiteGrammar[] = createDefaultGrammars()) {
    this.grammars = [...grammars];
  }

  register(grammar: SiteGrammar): void {
    this.grammars.push(grammar);
  }

  resolve(url: string): SiteGrammar {
    return this.grammars.find((grammar) => grammar.detect(url) !== null) ?? this.fallback;
  }

  isSupported(url: string): boolean {
    return this.grammars.some((grammar) => grammar.detect(url) !== null);
  }

  list(): SiteGrammar[] {
    return [...this.grammars];
  }
}
