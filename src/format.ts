import { z } from 'zod';
import type { AdsRecord, RateLimits } from './types.js';

const ADS_UI_BASE = 'https://ui.adsabs.harvard.edu';

export const AUTHOR_WIDTH = 20;
export const TITLE_WIDTH = 200;
const BIBCODE_WIDTH = 19;
const YEAR_WIDTH = 4;

/** Cut `text` to `limit` code points, the last three being an ellipsis. */
export function truncate(text: string, limit: number): string {
  const chars = Array.from(text);
  if (chars.length < limit) return text;
  return `${chars.slice(0, Math.max(limit - 3, 0)).join('')}...`;
}

// Widths are in code points, as in truncate.
function padColumn(text: string, width: number): string {
  return text + ' '.repeat(Math.max(width - Array.from(text).length, 0));
}

export function formatRow(paper: AdsRecord): string {
  return [
    padColumn(paper.bibcode ?? '', BIBCODE_WIDTH),
    padColumn(truncate(paper.first_author ?? '', AUTHOR_WIDTH), AUTHOR_WIDTH),
    padColumn(paper.year ?? '', YEAR_WIDTH),
    truncate(paper.title?.[0] ?? '', TITLE_WIDTH),
  ].join(' ');
}

export function formatRowHeader(): string {
  return [
    'bibcode'.padEnd(BIBCODE_WIDTH),
    'first author'.padEnd(AUTHOR_WIDTH),
    'year',
    'title',
  ].join(' ');
}

export function formatAbstract(paper: AdsRecord): string | undefined {
  return paper.abstract;
}

export function abstractUrl(bibcode: string): string {
  return `${ADS_UI_BASE}/abs/${encodeURIComponent(bibcode)}/abstract`;
}

export function hasDoi(paper: AdsRecord): boolean {
  return Array.isArray(paper.doi) && paper.doi.length > 0;
}

/** Link-gateway URL: the publisher PDF when a DOI is known, else the e-print. */
export function pdfUrl(paper: AdsRecord): string | undefined {
  if (!paper.bibcode) return undefined;
  const kind = hasDoi(paper) ? 'PUB' : 'EPRINT';
  return `${ADS_UI_BASE}/link_gateway/${encodeURIComponent(paper.bibcode)}/${kind}_PDF`;
}

export function formatAbstractUrl(paper: AdsRecord): string | undefined {
  return paper.bibcode ? abstractUrl(paper.bibcode) : undefined;
}

// Outside this range `Date` cannot represent the timestamp.
const MAX_TIMESTAMP_SECONDS = 8_640_000_000_000;

const ResetSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .pipe(z.number().int().min(-MAX_TIMESTAMP_SECONDS).max(MAX_TIMESTAMP_SECONDS));

export function parseResetTimestamp(raw: string | undefined): number {
  const parsed = ResetSchema.safeParse(raw);
  return parsed.success ? parsed.data : 0;
}

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/** `ctime` layout in UTC, e.g. `Thu Jan  1 00:00:00 1970`. */
export function formatCtime(seconds: number): string {
  const date = new Date(seconds * 1000);
  const two = (value: number) => String(value).padStart(2, '0');
  const time = `${two(date.getUTCHours())}:${two(date.getUTCMinutes())}:${two(date.getUTCSeconds())}`;
  return [
    DAYS[date.getUTCDay()],
    MONTHS[date.getUTCMonth()],
    String(date.getUTCDate()).padStart(2, ' '),
    time,
    String(date.getUTCFullYear()),
  ].join(' ');
}

export function formatRateLimits(rateLimits: RateLimits): string[] {
  const cell = (value: string | undefined) => (value ?? 'n/a').padStart(4);
  return [
    `Remaining (limit): ${cell(rateLimits.remaining)} (${cell(rateLimits.limit)})`,
    `Reset (UTC): ${formatCtime(parseResetTimestamp(rateLimits.reset))}`,
  ];
}
