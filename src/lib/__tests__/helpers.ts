import { DEFAULT_ANGLE_RULES } from '../angles';
import type { Article, ScoutConfig, ScoringConfig } from '../types';

export function makeArticle(overrides: Partial<Article> & { id: string }): Article {
  return {
    title: `Article ${overrides.id}`,
    summary: '',
    url: `https://example.com/${overrides.id}`,
    sourceName: 'Example Source',
    category: 'news',
    topics: [],
    publishedAt: new Date('2024-10-01T00:00:00Z'),
    ...overrides,
  };
}

/** Date `n` hours after 2024-10-01T00:00Z */
export function hour(n: number): Date {
  return new Date(Date.UTC(2024, 9, 1, n));
}

export function makeScoring(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
  return {
    topicWeights: {},
    diversityBonusFactor: 1,
    volumeFactor: 1,
    diversityMode: 'count',
    volumeMode: 'linear',
    similarity: 'jaccard',
    threshold: 0.15,
    lookbackDays: 7,
    ...overrides,
  };
}

export function makeConfig(scoring: Partial<ScoringConfig> = {}, overrides: Partial<ScoutConfig> = {}): ScoutConfig {
  return {
    sources: [],
    scoring: makeScoring(scoring),
    keywords: { minLength: 3, extraStopwords: [] },
    topN: 5,
    maxAngles: 3,
    angles: DEFAULT_ANGLE_RULES,
    ...overrides,
  };
}
