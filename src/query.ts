import type { QueryField, QueryParameters, SearchRequest } from './types.js';

export const QUERY_FIELDS: readonly QueryField[] = [
  'author',
  'bibstem',
  'bibcode',
  'full',
  'rows',
  'sort',
  'year',
  'database',
];

// Fields that always carry a default, so they never count as a search on their own.
const DEFAULTED_FIELDS: ReadonlySet<QueryField> = new Set(['rows', 'sort', 'database']);

// Order in which search terms appear in the `q` string.
const TERM_FIELDS: readonly QueryField[] = ['author', 'bibstem', 'bibcode', 'full', 'year', 'database'];

const UNQUOTED_FIELDS: ReadonlySet<QueryField> = new Set(['year']);

export const SEARCH_FIELDS: readonly string[] = [
  'abstract',
  'bibcode',
  'bibtex',
  'doi',
  'first_author',
  'title',
  'year',
];

export const DEFAULT_ROWS = 10;
export const DEFAULT_SORT = 'citation_count desc';
export const DEFAULT_DATABASE = 'astronomy';

function isQueryField(key: string): key is QueryField {
  return (QUERY_FIELDS as readonly string[]).includes(key);
}

export function buildQueryParameters(options: Record<string, unknown>): QueryParameters {
  const params: QueryParameters = {};
  for (const [key, value] of Object.entries(options)) {
    if (!isQueryField(key)) continue;
    if (typeof value === 'string' && value.length > 0) {
      params[key] = value;
    } else if (typeof value === 'number' && value !== 0 && Number.isFinite(value)) {
      params[key] = value;
    }
  }
  return params;
}

export function hasSearchTerms(params: QueryParameters): boolean {
  return Object.keys(params).some(
    (key) => isQueryField(key) && !DEFAULTED_FIELDS.has(key)
  );
}

function quoteTerm(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function buildSearchQuery(params: QueryParameters): string {
  const terms: string[] = [];
  for (const field of TERM_FIELDS) {
    const value = params[field];
    if (value === undefined) continue;
    const text = String(value);
    terms.push(`${field}:${UNQUOTED_FIELDS.has(field) ? text : quoteTerm(text)}`);
  }
  return terms.join(' ');
}

export function buildSearchRequest(
  params: QueryParameters,
  fields: readonly string[] = SEARCH_FIELDS
): SearchRequest {
  const request: SearchRequest = {
    q: buildSearchQuery(params),
    fl: fields.join(','),
    rows: typeof params.rows === 'number' ? params.rows : Number(params.rows ?? DEFAULT_ROWS),
  };
  if (!Number.isInteger(request.rows) || request.rows < 1) {
    request.rows = DEFAULT_ROWS;
  }
  if (params.sort !== undefined) {
    request.sort = String(params.sort);
  }
  return request;
}
