export type QueryField =
  | 'author'
  | 'bibstem'
  | 'bibcode'
  | 'full'
  | 'rows'
  | 'sort'
  | 'year'
  | 'database';

export type QueryParameters = Partial<Record<QueryField, string | number>>;

export interface SearchRequest {
  q: string;
  fl: string;
  rows: number;
  sort?: string;
}

export interface AdsRecord {
  bibcode?: string;
  first_author?: string;
  title?: string[];
  year?: string;
  abstract?: string;
  bibtex?: string;
  doi?: string[];
}

export interface RateLimits {
  limit?: string;
  remaining?: string;
  reset?: string;
}

export interface SearchPage {
  numFound: number;
  docs: AdsRecord[];
  rateLimits: RateLimits;
}

export type OutputMode = 'row' | 'abstract' | 'bibtex' | 'url_abs' | 'url_pdf';

export interface OutputSink {
  write(chunk: string): unknown;
}
