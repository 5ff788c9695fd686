import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { SandboxClient, loadSandboxFixture } from '../src/sandbox.js';
import type { AdsRecord } from '../src/types.js';

async function bibcodes(query: AsyncIterable<AdsRecord>): Promise<(string | undefined)[]> {
  const result: (string | undefined)[] = [];
  for await (const record of query) {
    result.push(record.bibcode);
  }
  return result;
}

describe('SandboxClient', () => {
  it('serves the canned records up to the requested rows', async () => {
    const client = await SandboxClient.load();

    expect(await bibcodes(client.search({ author: 'anyone', rows: 2 }))).toEqual([
      '2019MNRAS.482.1234Q',
      '2020ApJ...901...12R',
    ]);
    expect(await bibcodes(client.search({ author: 'anyone' }))).toHaveLength(3);
  });

  it('reports the canned rate limits after iterating', async () => {
    const client = await SandboxClient.load();
    const query = client.search({ bibstem: 'apj' });
    expect(query.rateLimits).toEqual({});

    await bibcodes(query);

    expect(query.rateLimits).toEqual({ limit: '5000', remaining: '4998', reset: '1700000000' });
  });

  it('exports bibtex for known bibcodes only', async () => {
    const client = await SandboxClient.load();

    expect(await client.exportBibtex('2019MNRAS.482.1234Q')).toMatch(/^@ARTICLE\{2019MNRAS\.482\.1234Q,\n/);
    await expect(client.exportBibtex('1999nope.....1X')).rejects.toThrow(
      'Sandbox has no bibtex export for 1999nope.....1X'
    );
  });

  it('rejects a malformed fixture', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ads-fixture-'));
    const file = path.join(dir, 'sandbox.json');
    fs.writeFileSync(file, JSON.stringify({ records: 'nope' }));
    try {
      await expect(loadSandboxFixture(file)).rejects.toThrow(`Invalid sandbox fixture at ${file}`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
