import * as fs from 'fs';
import { z } from 'zod';
import { AdsRecordSchema, SearchQuery, type AdsClient } from './ads.js';
import { logger } from './logger.js';
import { buildSearchRequest } from './query.js';
import type { QueryParameters } from './types.js';

export const SANDBOX_FIXTURE_URL = new URL('../fixtures/sandbox.json', import.meta.url);

const SandboxFixtureSchema = z.object({
  rateLimits: z.object({
    limit: z.string().optional(),
    remaining: z.string().optional(),
    reset: z.string().optional(),
  }),
  records: z.array(AdsRecordSchema),
  exports: z.record(z.string()),
});

export type SandboxFixture = z.infer<typeof SandboxFixtureSchema>;

export async function loadSandboxFixture(
  location: URL | string = SANDBOX_FIXTURE_URL
): Promise<SandboxFixture> {
  const raw = await fs.promises.readFile(location, 'utf8');
  const parsed = SandboxFixtureSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid sandbox fixture at ${String(location)}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Offline stand-in for the ADS API. Answers every search with the same canned
 * records, so only `rows` and paging have any effect.
 */
export class SandboxClient implements AdsClient {
  constructor(private readonly fixture: SandboxFixture) {}

  static async load(location?: URL | string): Promise<SandboxClient> {
    return new SandboxClient(await loadSandboxFixture(location));
  }

  search(params: QueryParameters, fields?: readonly string[]): SearchQuery {
    const request = buildSearchRequest(params, fields);
    const { records, rateLimits } = this.fixture;

    return new SearchQuery(request, async (req, start, rows) => {
      logger.debug('Sandbox search request', { q: req.q, start, rows });
      return {
        numFound: records.length,
        docs: records.slice(start, start + rows),
        rateLimits: { ...rateLimits },
      };
    });
  }

  async exportBibtex(bibcode: string): Promise<string> {
    const bibtex = this.fixture.exports[bibcode];
    if (bibtex === undefined) {
      throw new Error(`Sandbox has no bibtex export for ${bibcode}`);
    }
    return bibtex;
  }
}
