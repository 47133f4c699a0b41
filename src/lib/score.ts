import { publishedTime } from './cluster';
import type { Article, Cluster, ScoreBreakdown, ScoredCluster, ScoringConfig } from './types';

interface Members {
  keywords: ReadonlySet<string>;
  articles: readonly Article[];
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** Keywords, member categories and feed topics, lowercased */
export function clusterTerms(cluster: Members): Set<string> {
  const terms = new Set(cluster.keywords);
  for (const a of cluster.articles) {
    terms.add(a.category.toLowerCase());
    for (const t of a.topics) terms.add(t.toLowerCase());
  }
  return terms;
}

export function earliestPublished(cluster: Pick<Members, 'articles'>): number {
  return Math.min(...cluster.articles.map(publishedTime));
}

export function scoreCluster(cluster: Cluster, config: ScoringConfig): ScoreBreakdown {
  const matchedTerms = [...clusterTerms(cluster)]
    .filter(t => Object.hasOwn(config.topicWeights, t))
    .sort();
  const topicWeight = matchedTerms.reduce((sum, t) => sum + config.topicWeights[t], 0);

  const count = cluster.articles.length;
  const distinctSources = new Set(cluster.articles.map(a => a.sourceName)).size;
  const diversityBase = config.diversityMode === 'ratio' ? distinctSources / count : distinctSources;
  const volumeBase = config.volumeMode === 'log' ? Math.log1p(count) : count;

  return {
    topicWeight: round2(topicWeight),
    diversity: round2(diversityBase * config.diversityBonusFactor),
    volume: round2(volumeBase * config.volumeFactor),
    matchedTerms,
  };
}

/** Score every non-empty cluster and rank them, best first */
export function scoreClusters(clusters: readonly Cluster[], config: ScoringConfig): ScoredCluster[] {
  const scored = clusters
    .filter(c => c.articles.length > 0)
    .map((cluster, order) => {
      const breakdown = scoreCluster(cluster, config);
      return {
        order,
        earliest: earliestPublished(cluster),
        cluster: {
          keywords: cluster.keywords,
          articles: cluster.articles,
          keywordCounts: cluster.keywordCounts,
          score: round2(breakdown.topicWeight + breakdown.diversity + breakdown.volume),
          breakdown,
        } satisfies ScoredCluster,
      };
    });

  scored.sort((a, b) =>
    b.cluster.score - a.cluster.score
    || b.cluster.articles.length - a.cluster.articles.length
    || a.earliest - b.earliest
    || a.order - b.order,
  );

  return scored.map(s => s.cluster);
}
