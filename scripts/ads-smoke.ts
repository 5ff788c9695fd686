import 'dotenv/config';
import { createAdsClient } from '../src/client.js';
import { formatRateLimits, formatRow } from '../src/format.js';
import { SEARCH_FIELDS } from '../src/query.js';

const sandbox = process.argv.includes('--sandbox');

function logSection(title: string, payload: unknown) {
  console.log(`\n=== ${title} ===`);
  console.log(typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2));
}

async function main() {
  const client = await createAdsClient({ sandbox });

  const query = client.search(
    { author: '^hubble, e', year: '1929', rows: 3, sort: 'citation_count desc' },
    SEARCH_FIELDS
  );
  const rows: string[] = [];
  let firstBibcode: string | undefined;
  for await (const paper of query) {
    rows.push(formatRow(paper));
    if (!firstBibcode) firstBibcode = paper.bibcode;
  }
  logSection(`Search - ${query.request.q}`, rows.join('\n'));

  if (firstBibcode) {
    logSection(`Export - ${firstBibcode}`, await client.exportBibtex(firstBibcode));
  }

  logSection('Rate limits', formatRateLimits(query.rateLimits).join('\n'));
}

main().catch((error) => {
  console.error('Smoke run failed:', error);
  process.exitCode = 1;
});
