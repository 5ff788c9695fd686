import { describe, expect, it } from 'vitest';
import {
  buildQueryParameters,
  buildSearchQuery,
  buildSearchRequest,
  hasSearchTerms,
} from '../src/query.js';

describe('buildQueryParameters', () => {
  it('keeps only allow-listed keys with truthy values', () => {
    const params = buildQueryParameters({
      author: 'doe, j',
      bibstem: '',
      bibcode: undefined,
      rows: 10,
      sort: 'citation_count desc',
      database: 'astronomy',
      print_row: true,
      debug: false,
      verbose: 'yes',
    });

    expect(params).toEqual({
      author: 'doe, j',
      rows: 10,
      sort: 'citation_count desc',
      database: 'astronomy',
    });
  });

  it('drops zero and non-finite numbers', () => {
    expect(buildQueryParameters({ rows: 0, year: Number.NaN, full: 'gravity' })).toEqual({
      full: 'gravity',
    });
  });
});

describe('hasSearchTerms', () => {
  it('is false when only defaulted keys are present', () => {
    expect(hasSearchTerms({ rows: 10, sort: 'citation_count desc', database: 'astronomy' })).toBe(false);
    expect(hasSearchTerms({})).toBe(false);
  });

  it('is true once any search field is present', () => {
    expect(hasSearchTerms({ rows: 10, year: '2001' })).toBe(true);
    expect(hasSearchTerms({ bibcode: '2020ApJ...1A' })).toBe(true);
  });
});

describe('buildSearchQuery', () => {
  it('quotes terms in a fixed order and leaves the year bare', () => {
    const q = buildSearchQuery({
      year: '2000-2001',
      database: 'astronomy',
      author: '^doe, j',
      bibstem: 'apj',
      rows: 5,
    });

    expect(q).toBe('author:"^doe, j" bibstem:"apj" year:2000-2001 database:"astronomy"');
  });

  it('escapes embedded quotes', () => {
    expect(buildSearchQuery({ full: 'say "hi"' })).toBe('full:"say \\"hi\\""');
  });
});

describe('buildSearchRequest', () => {
  it('passes rows, sort and the field list through', () => {
    expect(
      buildSearchRequest({ author: 'x', rows: 25, sort: 'date desc' }, ['bibcode', 'title'])
    ).toEqual({
      q: 'author:"x"',
      fl: 'bibcode,title',
      rows: 25,
      sort: 'date desc',
    });
  });

  it('defaults rows and requests the standard fields', () => {
    expect(buildSearchRequest({ bibcode: '2020ApJ...1A' })).toEqual({
      q: 'bibcode:"2020ApJ...1A"',
      fl: 'abstract,bibcode,bibtex,doi,first_author,title,year',
      rows: 10,
    });
  });
});
