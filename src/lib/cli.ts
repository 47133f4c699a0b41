import { parseArgs } from 'node:util';
import { writeHeadlines, type CompleteFn } from './ai';
import { ConfigError, DEFAULT_SOURCES_FILE, loadConfig } from './config';
import { createLogger } from './log';
import { analyze } from './pipeline';
import { buildJsonReport, formatTextReport } from './report';
import { fetchAllFeeds, type FetchOptions } from './rss';
import type { ScoutConfig } from './types';

const log = createLogger('scout');

export const USAGE = `Usage: content-scout [options]

  --json            print a JSON document instead of the text report
  --days <n>        days to look back (default: lookback_days from the sources file, else 7)
  --sources <path>  sources file (default: ./content-sources.json)
  --top <n>         number of clusters to report (default: report.top_n, else 5)
  --ai              let an LLM rewrite cluster headlines
  -h, --help        show this help`;

export interface CliOptions {
  json: boolean;
  days?: number;
  sources: string;
  top?: number;
  ai: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function positiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new UsageError(`--${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        json: { type: 'boolean', default: false },
        days: { type: 'string' },
        sources: { type: 'string' },
        top: { type: 'string' },
        ai: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = parseFlags(argv);
  return {
    json: values.json ?? false,
    days: positiveInt('days', values.days),
    sources: values.sources ?? DEFAULT_SOURCES_FILE,
    top: positiveInt('top', values.top),
    ai: values.ai ?? false,
    help: values.help ?? false,
  };
}

export interface RunDeps {
  write: (text: string) => void;
  now?: () => Date;
  complete?: CompleteFn;
  fetch?: FetchOptions;
}

/** Run one scan and return the process exit code */
export async function run(argv: string[], deps: RunDeps): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    log.warn(error.message);
    deps.write(USAGE);
    return 1;
  }

  if (options.help) {
    deps.write(USAGE);
    return 0;
  }

  let config: ScoutConfig;
  try {
    config = await loadConfig(options.sources, { lookbackDays: options.days });
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    log.warn(error.message);
    return 1;
  }
  if (options.top !== undefined) config.topN = options.top;

  const lookbackDays = config.scoring.lookbackDays;
  log.info(`Step 1/3: Fetching ${config.sources.length} feeds (last ${lookbackDays} days)...`);
  const { articles, results } = await fetchAllFeeds(config.sources, lookbackDays, {
    ...deps.fetch,
    now: deps.now?.(),
  });

  if (articles.length === 0) {
    log.warn('No articles fetched. Exiting.');
    return 1;
  }

  log.info(`Step 2/3: Clustering ${articles.length} articles...`);
  const result = analyze(articles, config);
  log.info(`${result.clusteredArticles} articles in ${result.clusters.length} reported clusters`);

  if (options.ai) {
    result.clusters = await writeHeadlines(result.clusters, deps.complete);
  }

  log.info('Step 3/3: Writing report...');
  const ctx = { generatedAt: deps.now?.() ?? new Date(), lookbackDays, feeds: results };
  deps.write(options.json
    ? JSON.stringify(buildJsonReport(result, ctx), null, 2)
    : formatTextReport(result, ctx));
  return 0;
}
