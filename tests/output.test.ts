import { describe, expect, it } from 'vitest';
import type { AdsClient } from '../src/ads.js';
import { formatRow } from '../src/format.js';
import { renderPaper } from '../src/output.js';
import type { AdsRecord, OutputMode } from '../src/types.js';

function fakeClient(exports: Record<string, string> = {}) {
  const exported: string[] = [];
  const client: AdsClient = {
    search: () => {
      throw new Error('search is not used here');
    },
    exportBibtex: async (bibcode) => {
      exported.push(bibcode);
      return exports[bibcode] ?? '';
    },
  };
  return { client, exported };
}

function sink() {
  const chunks: string[] = [];
  return { chunks, out: { write: (chunk: string) => chunks.push(chunk) } };
}

const paper: AdsRecord = {
  bibcode: '2020ApJ...1A',
  first_author: 'Doe, J',
  year: '2020',
  title: ['T'],
  abstract: 'An abstract.',
  doi: ['10.0000/test'],
};

describe('renderPaper', () => {
  it('runs every enabled formatter in priority order', async () => {
    const { client, exported } = fakeClient({ '2020ApJ...1A': '@ARTICLE{2020ApJ...1A}\n\n' });
    const { chunks, out } = sink();
    const modes = new Set<OutputMode>(['url_pdf', 'row', 'bibtex', 'abstract', 'url_abs']);

    await renderPaper(paper, modes, client, out);

    expect(chunks).toEqual([
      `${formatRow(paper)}\n`,
      'An abstract.\n',
      '@ARTICLE{2020ApJ...1A}\n',
      'https://ui.adsabs.harvard.edu/abs/2020ApJ...1A/abstract\n',
      'https://ui.adsabs.harvard.edu/link_gateway/2020ApJ...1A/PUB_PDF\n',
    ]);
    expect(exported).toEqual(['2020ApJ...1A']);
  });

  it('runs only the selected formatters', async () => {
    const { client } = fakeClient();
    const { chunks, out } = sink();

    await renderPaper(paper, new Set<OutputMode>(['url_abs']), client, out);

    expect(chunks).toEqual(['https://ui.adsabs.harvard.edu/abs/2020ApJ...1A/abstract\n']);
  });

  it('prints bibtex carried on the record without exporting', async () => {
    const { client, exported } = fakeClient();
    const { chunks, out } = sink();

    await renderPaper({ bibcode: '2020ApJ...1A', bibtex: '@MISC{x}\n' }, new Set<OutputMode>(['bibtex']), client, out);

    expect(chunks).toEqual(['@MISC{x}\n']);
    expect(exported).toEqual([]);
  });

  it('exports when the record carries an empty bibtex field', async () => {
    const { client, exported } = fakeClient({ '2020ApJ...1A': '@ARTICLE{2020ApJ...1A}\n' });
    const { chunks, out } = sink();

    await renderPaper({ bibcode: '2020ApJ...1A', bibtex: '' }, new Set<OutputMode>(['bibtex']), client, out);

    expect(chunks).toEqual(['@ARTICLE{2020ApJ...1A}\n']);
    expect(exported).toEqual(['2020ApJ...1A']);
  });

  it('writes nothing for records without a bibcode or abstract', async () => {
    const { client, exported } = fakeClient();
    const { chunks, out } = sink();
    const modes = new Set<OutputMode>(['abstract', 'bibtex', 'url_abs', 'url_pdf']);

    await renderPaper({ title: ['Untitled'] }, modes, client, out);

    expect(chunks).toEqual([]);
    expect(exported).toEqual([]);
  });
});
