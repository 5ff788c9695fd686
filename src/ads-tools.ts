import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { AdsClient } from './ads.js';
import { formatAbstractUrl, parseResetTimestamp, pdfUrl } from './format.js';
import {
  DEFAULT_DATABASE,
  DEFAULT_ROWS,
  DEFAULT_SORT,
  SEARCH_FIELDS,
  buildQueryParameters,
  hasSearchTerms,
} from './query.js';
import type { AdsRecord, RateLimits } from './types.js';

interface PublicPaper {
  bibcode?: string;
  firstAuthor?: string;
  title?: string;
  year?: string;
  doi?: string;
  abstract?: string;
  absUrl?: string;
  pdfUrl?: string;
}

interface PublicRateLimits {
  remaining?: string;
  limit?: string;
  resetAt: string;
}

interface SearchPayload {
  query: string;
  total: number;
  papers: PublicPaper[];
  rateLimits: PublicRateLimits;
}

function toPublicPaper(paper: AdsRecord): PublicPaper {
  return {
    bibcode: paper.bibcode,
    firstAuthor: paper.first_author,
    title: paper.title?.[0],
    year: paper.year,
    doi: paper.doi?.[0],
    abstract: paper.abstract,
    absUrl: formatAbstractUrl(paper),
    pdfUrl: pdfUrl(paper),
  };
}

function toPublicRateLimits(rateLimits: RateLimits): PublicRateLimits {
  return {
    remaining: rateLimits.remaining,
    limit: rateLimits.limit,
    resetAt: new Date(parseResetTimestamp(rateLimits.reset) * 1000).toISOString(),
  };
}

const SearchAdsSchema = z.object({
  author: z.string().optional().describe('Author search string, e.g. "doe, john"; prefix with ^ for first author'),
  bibstem: z.string().optional().describe('Journal bibstem, e.g. apj'),
  bibcode: z.string().optional().describe('ADS bibcode'),
  full: z.string().optional().describe('Full text search terms'),
  year: z.string().optional().describe('Year or range, e.g. 2000-2001'),
  database: z.string().default(DEFAULT_DATABASE).describe('ADS database to search'),
  rows: z.number().int().min(1).max(200).default(DEFAULT_ROWS).describe('Number of records to return'),
  sort: z.string().default(DEFAULT_SORT).describe('Sort string, e.g. "citation_count desc"'),
});

const ExportBibtexSchema = z.object({
  bibcode: z.string().trim().min(1).describe('ADS bibcode to export'),
});

export const TOOLS: Tool[] = [
  {
    name: 'search_ads',
    description: 'Search the ADS bibliographic database and return matching records with abstract and PDF links',
    inputSchema: {
      type: 'object',
      properties: {
        author: {
          type: 'string',
          description: 'Author search string, e.g. "doe, john"; prefix with ^ to match the first author only',
        },
        bibstem: {
          type: 'string',
          description: 'Journal bibstem, e.g. apj',
        },
        bibcode: {
          type: 'string',
          description: 'ADS bibcode',
        },
        full: {
          type: 'string',
          description: 'Full text search terms',
        },
        year: {
          type: 'string',
          description: 'Publication year or range, e.g. 2000-2001',
        },
        database: {
          type: 'string',
          default: DEFAULT_DATABASE,
          description: 'ADS database to search',
        },
        rows: {
          type: 'number',
          default: DEFAULT_ROWS,
          description: 'Number of records to return (1-200)',
        },
        sort: {
          type: 'string',
          default: DEFAULT_SORT,
          description: 'Sort string, e.g. "citation_count desc" or "date desc"',
        },
      },
    },
  },
  {
    name: 'export_bibtex',
    description: 'Export the bibtex entry of one ADS record',
    inputSchema: {
      type: 'object',
      properties: {
        bibcode: {
          type: 'string',
          description: 'ADS bibcode to export',
        },
      },
      required: ['bibcode'],
    },
  },
];

function textResult(text: string, isError = false): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

export async function callTool(
  name: string,
  args: unknown,
  getClient: () => Promise<AdsClient>
): Promise<CallToolResult> {
  try {
    switch (name) {
      case 'search_ads': {
        const validated = SearchAdsSchema.parse(args ?? {});
        const params = buildQueryParameters(validated);
        if (!hasSearchTerms(params)) {
          return textResult(
            'Error: no search parameters provided (use author, bibstem, bibcode, full or year)',
            true
          );
        }

        const client = await getClient();
        const query = client.search(params, SEARCH_FIELDS);
        const papers: PublicPaper[] = [];
        for await (const paper of query) {
          papers.push(toPublicPaper(paper));
        }

        const payload: SearchPayload = {
          query: query.request.q,
          total: query.response?.numFound ?? 0,
          papers,
          rateLimits: toPublicRateLimits(query.rateLimits),
        };
        return textResult(JSON.stringify(payload, null, 2));
      }

      case 'export_bibtex': {
        const validated = ExportBibtexSchema.parse(args);
        const client = await getClient();
        const bibtex = await client.exportBibtex(validated.bibcode);
        return textResult(bibtex.trimEnd());
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const message =
      error instanceof Error ? error.message : 'Unknown error during tool call';
    return textResult(`Error: ${message}`, true);
  }
}
