import type { AdsClient } from './ads.js';
import { formatAbstract, formatAbstractUrl, formatRow, pdfUrl } from './format.js';
import type { AdsRecord, OutputMode, OutputSink } from './types.js';

type Formatter = (
  paper: AdsRecord,
  client: AdsClient
) => string | undefined | Promise<string | undefined>;

async function formatBibtex(paper: AdsRecord, client: AdsClient): Promise<string | undefined> {
  const bibtex = paper.bibtex || (paper.bibcode ? await client.exportBibtex(paper.bibcode) : undefined);
  return bibtex?.trimEnd();
}

const FORMATTERS: Record<OutputMode, Formatter> = {
  row: formatRow,
  abstract: formatAbstract,
  bibtex: formatBibtex,
  url_abs: formatAbstractUrl,
  url_pdf: pdfUrl,
};

// Formatters run in this order for each record.
export const OUTPUT_MODES: readonly OutputMode[] = ['row', 'abstract', 'bibtex', 'url_abs', 'url_pdf'];

export async function renderPaper(
  paper: AdsRecord,
  modes: ReadonlySet<OutputMode>,
  client: AdsClient,
  out: OutputSink
): Promise<void> {
  for (const mode of OUTPUT_MODES) {
    if (!modes.has(mode)) continue;
    const text = await FORMATTERS[mode](paper, client);
    if (text === undefined) continue;
    out.write(`${text}\n`);
  }
}
