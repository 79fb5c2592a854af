import { describe, expect, it } from 'vitest';
import {
  extractHomeStarsRating,
  findLicenseNumber,
  makeSlug,
  parseLooseJson,
  ProviderRowSchema,
  toNumberOrNull
} from '@enrich/core';

describe('makeSlug', () => {
  it('joins name and city with hyphens', () => {
    expect(makeSlug('Bright Spark Electric', 'Ottawa')).toBe('bright-spark-electric-ottawa');
  });

  it('drops punctuation and collapses separators', () => {
    expect(makeSlug("O'Neil & Sons Ltd.")).toBe('oneil-sons-ltd');
    expect(makeSlug('  -Volt- ')).toBe('volt');
  });

  it('ignores a missing city', () => {
    expect(makeSlug('Amp Works', null)).toBe('amp-works');
  });
});

describe('parseLooseJson', () => {
  it('unwraps a fenced block', () => {
    expect(parseLooseJson('```json\n{"a":1}\n```')).toEqual({ a: 1 });
  });

  it('strips a leading json tag', () => {
    expect(parseLooseJson('json {"a": 2}')).toEqual({ a: 2 });
  });

  it('returns null for prose', () => {
    expect(parseLooseJson('I could not find that business.')).toBeNull();
  });
});

describe('findLicenseNumber', () => {
  it('normalizes the licence number', () => {
    expect(findLicenseNumber('Licensed under ECRA/ESA7012345 since 2010')).toBe('ECRA/ESA 7012345');
  });

  it('needs seven digits', () => {
    expect(findLicenseNumber('ECRA/ESA 123')).toBeNull();
  });
});

describe('extractHomeStarsRating', () => {
  it('reads an "out of 10" score and review count', () => {
    expect(extractHomeStarsRating('Rated 9.4 out of 10 based on 57 reviews')).toEqual({
      rating: 9.4,
      reviewCount: 57
    });
  });

  it('falls back to the slash form and rating counts', () => {
    expect(extractHomeStarsRating('Score: 8.7/10 from 12 ratings')).toEqual({ rating: 8.7, reviewCount: 12 });
  });

  it('returns nulls when nothing matches', () => {
    expect(extractHomeStarsRating('Page not found')).toEqual({ rating: null, reviewCount: null });
  });
});

describe('toNumberOrNull', () => {
  it('accepts numbers and numeric strings', () => {
    expect(toNumberOrNull(4.5)).toBe(4.5);
    expect(toNumberOrNull('4.5')).toBe(4.5);
    expect(toNumberOrNull('1,204')).toBe(1204);
  });

  it('rejects everything else', () => {
    expect(toNumberOrNull('n/a')).toBeNull();
    expect(toNumberOrNull(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toNumberOrNull(true)).toBeNull();
    expect(toNumberOrNull(null)).toBeNull();
  });
});

describe('ProviderRowSchema', () => {
  it('prefers business_name and stringifies numeric ids', () => {
    expect(ProviderRowSchema.parse({ id: 7, business_name: 'Amp Works', name: 'amp', city: 'Kanata' })).toEqual({
      id: '7',
      name: 'Amp Works',
      city: 'Kanata',
      category: null
    });
  });

  it('falls back to name, then Unknown', () => {
    expect(ProviderRowSchema.parse({ id: 'a', name: 'Volt Co' }).name).toBe('Volt Co');
    expect(ProviderRowSchema.parse({ id: 'b', business_name: '' }).name).toBe('Unknown');
  });
});
