import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { AdsClient } from './ads.js';
import { createAdsClient, type ClientOptions } from './client.js';
import { formatRateLimits, formatRowHeader } from './format.js';
import { logger, setLogLevel } from './logger.js';
import { OUTPUT_MODES, renderPaper } from './output.js';
import {
  DEFAULT_DATABASE,
  DEFAULT_ROWS,
  DEFAULT_SORT,
  SEARCH_FIELDS,
  buildQueryParameters,
  hasSearchTerms,
} from './query.js';
import type { OutputMode, OutputSink } from './types.js';

export const VERSION = '1.0.0';

export type CliOptions = {
  author?: string;
  bibstem?: string;
  bibcode?: string;
  full?: string;
  rows: number;
  sort: string;
  year?: string;
  database: string;
  print_row?: boolean;
  print_abstract?: boolean;
  print_bibtex?: boolean;
  print_url_abs?: boolean;
  print_url_pdf?: boolean;
  debug?: boolean;
  verbose?: boolean;
};

export interface CliDeps {
  stdout: OutputSink;
  stderr: OutputSink;
  createClient?: (options: ClientOptions) => Promise<AdsClient>;
}

function parseRows(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Rows must be a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

const VALUE_SHORT_FLAGS = new Set(['a', 'b', 'c', 'f', 'n', 's', 'y', 'd']);

/** Rewrites `-y=2000-2001` into `-y 2000-2001`; commander would keep the `=`. */
export function splitShortAssignments(args: readonly string[]): string[] {
  const result: string[] = [];
  for (const arg of args) {
    const match = /^-([A-Za-z])=([\s\S]*)$/.exec(arg);
    if (match && VALUE_SHORT_FLAGS.has(match[1])) {
      result.push(`-${match[1]}`, match[2]);
    } else {
      result.push(arg);
    }
  }
  return result;
}

export function createProgram(io: Pick<CliDeps, 'stdout' | 'stderr'>): Command {
  return new Command()
    .name('ads-search')
    .description('Query the ADS database.')
    .version(VERSION)
    .option('-a, --author <author>', 'author search string, e.g. "doe, john" ("^doe" for first author)')
    .option('-b, --bibstem <bibstem>', 'bibstem search string, e.g. apj')
    .option('-c, --bibcode <bibcode>', 'ADS bibcode search string')
    .option('-f, --full <text>', 'full text search, e.g. gravity')
    .option('-n, --rows <rows>', 'number of rows to show', parseRows, DEFAULT_ROWS)
    .option('-s, --sort <sort>', 'sort string', DEFAULT_SORT)
    .option('-y, --year <year>', 'year search string, e.g. 2000-2001')
    .option('-d, --database <database>', 'database to search', DEFAULT_DATABASE)
    .option('--print_row', 'print a row (bibcode, first author, year, title) per result (default)')
    .option('--print_abstract', 'print the full abstract')
    .option('--print_bibtex', 'print the bibtex entry')
    .option('--print_url_abs', 'print the ADS URL for the abstract')
    .option('--print_url_pdf', 'print the ADS link gateway URL for the PDF')
    .option('--debug', 'use the offline sandbox instead of the ADS API')
    .option('--verbose', 'log request details to stderr')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    });
}

export function selectOutputModes(options: CliOptions): Set<OutputMode> {
  const enabled: Record<OutputMode, boolean | undefined> = {
    row: options.print_row,
    abstract: options.print_abstract,
    bibtex: options.print_bibtex,
    url_abs: options.print_url_abs,
    url_pdf: options.print_url_pdf,
  };
  const modes = new Set(OUTPUT_MODES.filter((mode) => enabled[mode]));
  if (modes.size === 0) modes.add('row');
  return modes;
}

/**
 * Runs one search from command-line arguments (without the node/script
 * prefix) and returns the process exit code.
 */
export async function runCli(args: string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps);
  try {
    program.parse(splitShortAssignments(args), { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const options = program.opts<CliOptions>();
  if (options.verbose) setLogLevel('debug');

  const params = buildQueryParameters(options);
  if (!hasSearchTerms(params)) {
    deps.stderr.write(program.helpInformation());
    deps.stderr.write('error: no search parameters provided\n');
    return 0;
  }

  const modes = selectOutputModes(options);
  const createClient = deps.createClient ?? createAdsClient;
  const client = await createClient({ sandbox: Boolean(options.debug) });

  const query = client.search(params, SEARCH_FIELDS);
  logger.debug('Query parameters', { ...params, q: query.request.q });

  if (modes.has('row')) {
    deps.stderr.write(`${formatRowHeader()}\n`);
  }

  for await (const paper of query) {
    await renderPaper(paper, modes, client, deps.stdout);
  }

  for (const line of formatRateLimits(query.rateLimits)) {
    deps.stderr.write(`${line}\n`);
  }
  return 0;
}

/** Like `runCli`, but reports failures on stderr and maps them to exit code 1. */
export async function main(args: string[], deps: CliDeps): Promise<number> {
  try {
    return await runCli(args, deps);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    deps.stderr.write(`ads-search failed: ${message}\n`);
    return 1;
  }
}
