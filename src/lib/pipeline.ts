import { suggestAngles } from './angles';
import { buildClusters, type ClusterEntry } from './cluster';
import { articleKeywords } from './keywords';
import { scoreClusters } from './score';
import type { AnalysisResult, Article, ScoutConfig } from './types';

/**
 * Cluster, score and annotate one batch of articles. Keyword sets are computed
 * per call and the input list is never modified.
 */
export function analyze(articles: readonly Article[], config: ScoutConfig): AnalysisResult {
  const entries: ClusterEntry[] = articles.map(article => ({
    article,
    keywords: articleKeywords(article, config.keywords),
  }));

  const clusters = buildClusters(entries, {
    similarity: config.scoring.similarity,
    threshold: config.scoring.threshold,
  });
  const ranked = scoreClusters(clusters, config.scoring);

  return {
    totalArticles: articles.length,
    clusteredArticles: clusters.reduce((n, c) => n + c.articles.length, 0),
    clusters: suggestAngles(ranked, {
      topN: config.topN,
      maxAngles: config.maxAngles,
      rules: config.angles,
    }),
  };
}
