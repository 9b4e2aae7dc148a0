import { describe, expect, it } from 'vitest';
import { parsedDocument } from '../../testing/documents';
import { RedfinGrammar } from '../site-grammars/redfin.grammar';
import { ZillowGrammar } from '../site-grammars/zillow.grammar';
import { HeuristicStrategy, maxPrice, parseAgentLine } from './heuristic.strategy';

const ZILLOW_URL = 'https://www.zillow.com/homedetails/123-Main-St-Springfield-IL-62704/12345_zpid/';

const MARKDOWN = [
  '# 123 Main St, Springfield, IL 62704',
  '$450,000',
  '3 beds 2 baths 1,500 sqft',
  'Built in 1998',
  'Single Family Residence',
  '**1,234** views **56** saves',
  '**12** days on Zillow',
  "## What's special",
  'Sunny corner lot with a renovated kitchen.',
  '## Price history',
  'May 1, 2024 Listed for sale $450,000',
  'Mar 3, 2023 Sold $410,000',
  '## Monthly cost',
  'Property taxes $350',
  'HOA fees $125',
  'Walk Score® 72',
  'Listed by Acme Realty 555-123-4567 - Jane Roe',
  '![Front](//photos.example.com/front.jpg)',
  '[Nearby](https://www.zillow.com/homedetails/9-Elm-St-Springfield-IL-62704/999_zpid/)',
].join('\n');

describe('maxPrice', () => {
  it('takes the largest amount so rents and fees lose to the list price', () => {
    expect(maxPrice('Rent estimate $1,200/mo. Asking $450,000.')).toBe(450000);
    expect(maxPrice('No prices here')).toBeNull();
  });
});

describe('parseAgentLine', () => {
  it('splits brokerage and name around the phone number', () => {
    expect(parseAgentLine('Listed by Douglas Elliman 212-641-0096 - Eleonora Srugo')).toEqual({
      name: 'Eleonora Srugo',
      phone: '212-641-0096',
      brokerage: 'Douglas Elliman',
      email: null,
    });
  });

  it('handles parenthesized phones', () => {
    expect(parseAgentLine('Listing by: Corcoran (917-573-5102) Douglas Brown')).toEqual({
      name: 'Douglas Brown',
      phone: '917-573-5102',
      brokerage: 'Corcoran',
      email: null,
    });
  });

  it('drops connective words before the brokerage', () => {
    expect(parseAgentLine('with Acme Realty 555-123-4567 Jane Roe')?.brokerage).toBe('Acme Realty');
  });

  it('splits on a dash when there is no phone', () => {
    expect(parseAgentLine('Listed by Acme Realty - Jane Roe')).toEqual({
      name: 'Jane Roe',
      phone: null,
      brokerage: 'Acme Realty',
      email: null,
    });
  });

  it('pulls out an email address', () => {
    expect(parseAgentLine('Jane Roe jane@acme.example')?.email).toBe('jane@acme.example');
  });

  it('returns null for an empty attribution', () => {
    expect(parseAgentLine('Listed by ')).toBeNull();
  });
});

describe('HeuristicStrategy', () => {
  const strategy = new HeuristicStrategy();

  it('reads a listing from markdown', () => {
    const fields = strategy.extract(parsedDocument(ZILLOW_URL, '', MARKDOWN, new ZillowGrammar()));

    expect(fields).toMatchObject({
      listPrice: 450000,
      beds: 3,
      baths: 2,
      interiorArea: 1500,
      yearBuilt: 1998,
      propertyType: 'Single Family Residence',
      street: '123 Main St',
      city: 'Springfield',
      state: 'IL',
      postalCode: '62704',
      views: 1234,
      saves: 56,
      daysOnMarket: 12,
      description: 'Sunny corner lot with a renovated kitchen.',
      hoaFee: 125,
      annualPropertyTax: 4200,
      walkScore: 72,
      images: ['https://photos.example.com/front.jpg'],
      similarUrls: ['https://www.zillow.com/homedetails/9-Elm-St-Springfield-IL-62704/999_zpid/'],
    });
    expect(fields.agents).toEqual([
      { name: 'Jane Roe', phone: '555-123-4567', brokerage: 'Acme Realty', email: null },
    ]);
    expect(fields.priceHistory).toEqual([
      { eventDate: '2024-05-01', eventType: 'listed', price: 450000, notes: null },
      { eventDate: '2023-03-03', eventType: 'sold', price: 410000, notes: null },
    ]);
  });

  it('keeps yearly tax amounts outside monthly sections', () => {
    const fields = strategy.extract(parsedDocument(ZILLOW_URL, '', 'Tax amount: $5,400\nLot size: 0.25 acres'));
    expect(fields.annualPropertyTax).toBe(5400);
    expect(fields.lotSize).toBe(10890);
  });

  it('annualizes explicitly monthly tax amounts', () => {
    const fields = strategy.extract(parsedDocument(ZILLOW_URL, '', 'Property tax $300/mo'));
    expect(fields.annualPropertyTax).toBe(3600);
  });

  it('collects image candidates from img attributes', () => {
    const url = 'https://www.redfin.com/IL/Springfield/1-Oak-Ave-62704/home/77';
    const html =
      '<img src="/img/a.jpg">' +
      '<img data-src="https://cdn.example.com/b.jpg" ' +
      'srcset="https://cdn.example.com/c-small.jpg 320w, https://cdn.example.com/c-large.jpg 1024w">';
    const fields = strategy.extract(parsedDocument(url, html, '', new RedfinGrammar()));
    expect(fields.images).toEqual([
      'https://www.redfin.com/img/a.jpg',
      'https://cdn.example.com/b.jpg',
      'https://cdn.example.com/c-small.jpg',
    ]);
  });

  it('reads agents from attribution elements', () => {
    const html = '<div class="agent-info">Listed by: Oak Brokers 555-987-6543 Sam Lee</div>';
    const fields = strategy.extract(parsedDocument(ZILLOW_URL, html, ''));
    expect(fields.agents).toEqual([{ name: 'Sam Lee', phone: '555-987-6543', brokerage: 'Oak Brokers', email: null }]);
  });

  it('skips links that are not listings or point back at the page', () => {
    const html =
      `<a href="${ZILLOW_URL}?from=self">self</a>` +
      '<a href="/homedetails/9-Elm-St-Springfield-IL-62704/999_zpid/">nearby</a>' +
      '<a href="/mortgage-calculator/">calc</a>';
    const fields = strategy.extract(parsedDocument(ZILLOW_URL, html, '', new ZillowGrammar()));
    expect(fields.similarUrls).toEqual(['https://www.zillow.com/homedetails/9-Elm-St-Springfield-IL-62704/999_zpid/']);
  });

  it('returns nothing for empty text', () => {
    expect(strategy.extract(parsedDocument(ZILLOW_URL, '', ''))).toEqual({});
  });
});
