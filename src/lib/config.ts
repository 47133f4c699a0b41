import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_ANGLE_RULES } from './angles';
import type { FeedSource, ScoutConfig } from './types';

export const DEFAULT_SOURCES_FILE = path.join(process.cwd(), 'content-sources.json');

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const sourceSchema = z.object({
  name: z.string().min(1),
  feed: z.string().url().optional(),
  url: z.string().optional(),
  topics: z.array(z.string()).default([]),
});

const angleSchema = z.object({
  match: z.array(z.string().min(1)).min(1),
  requires: z.array(z.string().min(1)).optional(),
  angle: z.string().min(1),
});

const scoringSchema = z.object({
  diversity_bonus_factor: z.number().nonnegative().default(1),
  volume_factor: z.number().nonnegative().default(1),
  diversity_mode: z.enum(['count', 'ratio']).default('count'),
  volume_mode: z.enum(['linear', 'log']).default('linear'),
  similarity: z.enum(['jaccard', 'overlap']).default('jaccard'),
  threshold: z.number().min(0).max(1).default(0.15),
  min_keyword_length: z.number().int().positive().default(3),
  extra_stopwords: z.array(z.string()).default([]),
});

const configSchema = z.object({
  sources: z.record(z.array(sourceSchema)),
  topic_weights: z.record(z.number().finite()),
  lookback_days: z.number().int().positive().default(7),
  scoring: scoringSchema.default({}),
  report: z.object({
    top_n: z.number().int().positive().default(5),
    max_angles: z.number().int().positive().default(3),
  }).default({}),
  angles: z.array(angleSchema).optional(),
});

export type RawConfig = z.input<typeof configSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

/** Validate an already-parsed sources document */
export function parseConfig(raw: unknown, overrides: { lookbackDays?: number } = {}): ScoutConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid sources file', result.error.issues.map(formatIssue));
  }
  const data = result.data;

  const sources: FeedSource[] = [];
  for (const [category, entries] of Object.entries(data.sources)) {
    for (const entry of entries) {
      // Sources without a feed URL are reference-only
      if (!entry.feed) continue;
      sources.push({ name: entry.name, feedUrl: entry.feed, category, topics: entry.topics });
    }
  }

  const topicWeights: Record<string, number> = {};
  for (const [term, weight] of Object.entries(data.topic_weights)) {
    topicWeights[term.toLowerCase()] = weight;
  }

  return {
    sources,
    scoring: {
      topicWeights,
      diversityBonusFactor: data.scoring.diversity_bonus_factor,
      volumeFactor: data.scoring.volume_factor,
      diversityMode: data.scoring.diversity_mode,
      volumeMode: data.scoring.volume_mode,
      similarity: data.scoring.similarity,
      threshold: data.scoring.threshold,
      lookbackDays: overrides.lookbackDays ?? data.lookback_days,
    },
    keywords: {
      minLength: data.scoring.min_keyword_length,
      extraStopwords: data.scoring.extra_stopwords,
    },
    topN: data.report.top_n,
    maxAngles: data.report.max_angles,
    angles: data.angles ?? DEFAULT_ANGLE_RULES,
  };
}

export async function loadConfig(file: string = DEFAULT_SOURCES_FILE, overrides: { lookbackDays?: number } = {}): Promise<ScoutConfig> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read sources file ${file}: ${msg}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Sources file ${file} is not valid JSON: ${msg}`);
  }

  return parseConfig(raw, overrides);
}
