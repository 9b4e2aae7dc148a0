import { describe, expect, it } from 'vitest';
import { GrammarRegistry } from './index';
import { RedfinGrammar } from './redfin.grammar';

describe('RedfinGrammar', () => {
  const grammar = new RedfinGrammar();

  it('reads state, city, street, zip and unit from the path', () => {
    expect(grammar.extractUrlAddress('https://www.redfin.com/IL/Springfield/1-Oak-Ave-62704/unit-2B/home/777')).toEqual(
      {
        externalId: '777',
        state: 'IL',
        city: 'Springfield',
        street: '1 Oak Ave',
        postalCode: '62704',
        unit: '2B',
      }
    );
  });

  it('turns dashes in the city into spaces', () => {
    expect(grammar.extractUrlAddress('https://www.redfin.com/NY/New-York/10-W-66th-St-10023/home/123')).toEqual({
      externalId: '123',
      state: 'NY',
      city: 'New York',
      street: '10 W 66th St',
      postalCode: '10023',
    });
  });

  it('ignores non-listing paths', () => {
    expect(grammar.extractUrlAddress('https://www.redfin.com/city/30749/NY/New-York')).toEqual({});
    expect(grammar.isListingUrl('https://www.redfin.com/city/30749/NY/New-York')).toBe(false);
    expect(grammar.isListingUrl('https://www.redfin.com/NY/New-York/10-W-66th-St-10023/home/123')).toBe(true);
  });
});

describe('GrammarRegistry', () => {
  const registry = new GrammarRegistry();

  it('resolves built-in hosts and falls back to the generic grammar', () => {
    expect(registry.resolve('https://www.redfin.com/NY/New-York/10-W-66th-St-10023/home/123').sourceId).toBe('redfin');
    expect(registry.resolve('https://www.zillow.com/homedetails/x/1_zpid/').sourceId).toBe('zillow');
    expect(registry.resolve('https://listings.example.com/1').sourceId).toBe('unknown');
  });

  it('reports dedicated support only for registered hosts', () => {
    expect(registry.isSupported('https://www.zillow.com/')).toBe(true);
    expect(registry.isSupported('https://listings.example.com/1')).toBe(false);
    expect(registry.list().map((g) => g.sourceId)).toEqual(['zillow', 'redfin']);
  });
});
