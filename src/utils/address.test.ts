import { describe, expect, it } from 'vitest';
import { parseAddressLine, splitStreetUnit } from './address';

describe('parseAddressLine', () => {
  it('reads a single-line address next to a price', () => {
    expect(parseAddressLine('Listed at $450,000 123 Main St #4, Springfield, IL 62704-1234')).toEqual({
      street: '123 Main St',
      unit: '4',
      city: 'Springfield',
      state: 'IL',
      postalCode: '62704',
    });
  });

  it('returns null without a state and zip', () => {
    expect(parseAddressLine('123 Main St, Springfield')).toBeNull();
  });
});

describe('splitStreetUnit', () => {
  it('splits apartment and suite suffixes', () => {
    expect(splitStreetUnit('500 Lake Shore Dr Apt 12B')).toEqual({ street: '500 Lake Shore Dr', unit: '12B' });
    expect(splitStreetUnit('9 Elm St, Suite 200')).toEqual({ street: '9 Elm St', unit: '200' });
    expect(splitStreetUnit('9 Elm St')).toEqual({ street: '9 Elm St', unit: null });
  });
});
