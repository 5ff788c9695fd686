import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { logger } from './logger.js';
import { buildSearchRequest } from './query.js';
import type {
  AdsRecord,
  QueryParameters,
  RateLimits,
  SearchPage,
  SearchRequest,
} from './types.js';

export const MAX_PAGE_ROWS = 200;

export const AdsRecordSchema = z.object({
  bibcode: z.string().optional(),
  first_author: z.string().optional(),
  title: z.array(z.string()).optional(),
  year: z.string().optional(),
  abstract: z.string().optional(),
  bibtex: z.string().optional(),
  doi: z.array(z.string()).optional(),
});

const SearchResponseSchema = z.object({
  response: z.object({
    numFound: z.number().int().nonnegative(),
    docs: z.array(AdsRecordSchema),
  }),
});

const ExportResponseSchema = z.object({
  export: z.string(),
});

export type PageFetcher = (
  request: SearchRequest,
  start: number,
  rows: number
) => Promise<SearchPage>;

/**
 * Lazy, forward-only view over a search. Pages are requested while iterating;
 * `response` holds the most recent page once at least one has been fetched.
 */
export class SearchQuery implements AsyncIterable<AdsRecord> {
  response?: SearchPage;

  constructor(
    readonly request: SearchRequest,
    private readonly fetchPage: PageFetcher
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<AdsRecord> {
    let start = 0;
    let produced = 0;

    while (produced < this.request.rows) {
      const pageRows = Math.min(this.request.rows - produced, MAX_PAGE_ROWS);
      const page = await this.fetchPage(this.request, start, pageRows);
      this.response = page;

      for (const doc of page.docs.slice(0, pageRows)) {
        produced += 1;
        yield doc;
      }

      start += page.docs.length;
      if (page.docs.length < pageRows || start >= page.numFound) {
        return;
      }
    }
  }

  get rateLimits(): RateLimits {
    return this.response?.rateLimits ?? {};
  }
}

export interface AdsClient {
  search(params: QueryParameters, fields?: readonly string[]): SearchQuery;
  exportBibtex(bibcode: string): Promise<string>;
}

export interface AdsApiOptions {
  token: string;
  baseUrl: string;
  timeoutMs?: number;
}

function asText(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  return Array.isArray(value) ? value.join(',') : String(value);
}

export function readRateLimits(response: AxiosResponse): RateLimits {
  return {
    limit: asText(response.headers['x-ratelimit-limit']),
    remaining: asText(response.headers['x-ratelimit-remaining']),
    reset: asText(response.headers['x-ratelimit-reset']),
  };
}

function describeErrorBody(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim()) return data.trim();
  if (data && typeof data === 'object' && 'error' in data) {
    return asText(data.error);
  }
  return undefined;
}

function toApiError(error: unknown): Error {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new Error(`ADS API timeout: ${error.message}`, { cause: error });
    }
    if (error.response) {
      const detail = describeErrorBody(error.response.data);
      const status = `${error.response.status}: ${error.response.statusText}`;
      return new Error(
        `ADS API returned ${status}${detail ? ` - ${detail}` : ''}`,
        { cause: error }
      );
    }
    return new Error(`ADS API request failed: ${error.message}`, { cause: error });
  }
  return error instanceof Error ? error : new Error(`ADS API request failed: ${String(error)}`);
}

export class AdsAPI implements AdsClient {
  constructor(
    private readonly options: AdsApiOptions,
    private readonly http: AxiosInstance = axios.create()
  ) {}

  search(params: QueryParameters, fields?: readonly string[]): SearchQuery {
    const request = buildSearchRequest(params, fields);
    return new SearchQuery(request, (req, start, rows) => this.fetchPage(req, start, rows));
  }

  async exportBibtex(bibcode: string): Promise<string> {
    logger.debug('ADS export request', { bibcode });
    const response = await this.send(() =>
      this.http.post<unknown>(
        '/export/bibtex',
        { bibcode: [bibcode] },
        this.requestConfig()
      )
    );

    const parsed = ExportResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Unexpected ADS export response for ${bibcode}`, { cause: parsed.error });
    }
    return parsed.data.export;
  }

  private async fetchPage(request: SearchRequest, start: number, rows: number): Promise<SearchPage> {
    const params: Record<string, string | number> = {
      q: request.q,
      fl: request.fl,
      rows,
      start,
    };
    if (request.sort) {
      params.sort = request.sort;
    }

    logger.debug('ADS search request', params);
    const response = await this.send(() =>
      this.http.get<unknown>('/search/query', { ...this.requestConfig(), params })
    );

    const parsed = SearchResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error('Unexpected ADS search response', { cause: parsed.error });
    }

    logger.debug('ADS search page received', {
      start,
      docs: parsed.data.response.docs.length,
      numFound: parsed.data.response.numFound,
    });

    return {
      numFound: parsed.data.response.numFound,
      docs: parsed.data.response.docs,
      rateLimits: readRateLimits(response),
    };
  }

  private requestConfig() {
    return {
      baseURL: this.options.baseUrl,
      timeout: this.options.timeoutMs ?? 30_000,
      headers: {
        Authorization: `Bearer ${this.options.token}`,
        Accept: 'application/json',
      },
    };
  }

  private async send<T>(call: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await call();
    } catch (error) {
      throw toApiError(error);
    }
  }
}
