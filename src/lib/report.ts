import type { AnalysisResult, ClusterReport, FeedResult, JsonReport, SuggestedCluster } from './types';

const RULE = '='.repeat(70);
const SAMPLE_TITLES = 3;
const TEXT_ARTICLES = 2;
const TITLE_MAX_CHARS = 80;
const TOP_KEYWORDS = 5;

export interface ReportContext {
  generatedAt: Date;
  lookbackDays: number;
  feeds: readonly FeedResult[];
}

/** Keywords by member count, then alphabetically */
export function topKeywords(cluster: Pick<SuggestedCluster, 'keywordCounts'>, limit = TOP_KEYWORDS): string[] {
  return [...cluster.keywordCounts]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, limit)
    .map(([k]) => k);
}

function distinct(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

export function toClusterReport(cluster: SuggestedCluster): ClusterReport {
  return {
    rank: cluster.rank,
    score: cluster.score,
    headline: cluster.headline,
    keywords: topKeywords(cluster),
    article_count: cluster.articles.length,
    sources: distinct(cluster.articles.map(a => a.sourceName)),
    topics: distinct(cluster.articles.flatMap(a => a.topics)),
    sample_titles: cluster.articles.slice(0, SAMPLE_TITLES).map(a => a.title),
    suggested_angles: cluster.angles,
    score_breakdown: {
      topic_weight: cluster.breakdown.topicWeight,
      diversity: cluster.breakdown.diversity,
      volume: cluster.breakdown.volume,
      matched_terms: cluster.breakdown.matchedTerms,
    },
  };
}

export function buildJsonReport(result: AnalysisResult, ctx: ReportContext): JsonReport {
  const ok = ctx.feeds.filter(f => f.ok).length;
  return {
    generated_at: ctx.generatedAt.toISOString(),
    lookback_days: ctx.lookbackDays,
    total_articles: result.totalArticles,
    no_data: result.clusters.length === 0,
    feeds: { total: ctx.feeds.length, ok, failed: ctx.feeds.length - ok },
    clusters: result.clusters.map(toClusterReport),
  };
}

function formatTimestamp(d: Date): string {
  return d.toISOString().slice(0, 16).replace('T', ' ');
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export function formatTextReport(result: AnalysisResult, ctx: ReportContext): string {
  const lines: string[] = [
    RULE,
    `CONTENT SCOUT REPORT - ${formatTimestamp(ctx.generatedAt)} UTC`,
    `Monitoring last ${ctx.lookbackDays} days: ${result.totalArticles} articles, ${result.clusteredArticles} clustered`,
    RULE,
    '',
  ];

  if (result.clusters.length === 0) {
    lines.push(`No data: no trending topics found in the last ${ctx.lookbackDays} days.`);
    return lines.join('\n');
  }

  for (const cluster of result.clusters) {
    const report = toClusterReport(cluster);
    lines.push(`#${report.rank} - Score: ${report.score}`);
    lines.push('-'.repeat(70));
    lines.push(`Headline: ${report.headline}`);
    lines.push(`Keywords: ${report.keywords.join(', ')}`);
    lines.push(`Covered by: ${report.sources.join(', ')}`);
    for (const angle of report.suggested_angles) {
      lines.push(`Angle: ${angle}`);
    }
    lines.push(`${report.article_count} related article(s)`);
    for (const article of cluster.articles.slice(0, TEXT_ARTICLES)) {
      lines.push(`   * ${truncate(article.title, TITLE_MAX_CHARS)}`);
      lines.push(`     ${article.url}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
