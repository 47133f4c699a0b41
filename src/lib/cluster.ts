import type { Article, Cluster, SimilarityMeasure } from './types';

export interface ClusterEntry {
  article: Article;
  keywords: ReadonlySet<string>;
}

export interface ClusterOptions {
  similarity: SimilarityMeasure;
  threshold: number;
}

function intersectionSize(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let count = 0;
  for (const t of small) {
    if (large.has(t)) count++;
  }
  return count;
}

/** Keyword-set similarity in [0, 1]; 0 whenever either side is empty */
export function similarity(a: ReadonlySet<string>, b: ReadonlySet<string>, measure: SimilarityMeasure = 'jaccard'): number {
  if (a.size === 0 || b.size === 0) return 0;
  const shared = intersectionSize(a, b);
  if (measure === 'overlap') {
    return shared / Math.min(a.size, b.size);
  }
  return shared / (a.size + b.size - shared);
}

/** Publication time for ordering; an invalid date sorts after every real one */
export function publishedTime(article: Article): number {
  const time = article.publishedAt.getTime();
  return Number.isNaN(time) ? Infinity : time;
}

export function compareArticles(a: Article, b: Article): number {
  const ta = publishedTime(a);
  const tb = publishedTime(b);
  if (ta !== tb) return ta < tb ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Greedy single-pass clustering. Articles are visited oldest first (ties by id,
 * invalid dates last); each joins the most similar existing cluster at or above
 * the threshold, the earliest-created one on ties, or seeds a new cluster.
 */
export function buildClusters(entries: readonly ClusterEntry[], options: ClusterOptions): Cluster[] {
  const ordered = entries
    .filter(e => e.keywords.size > 0)
    .sort((a, b) => compareArticles(a.article, b.article));

  const clusters: Cluster[] = [];

  for (const { article, keywords } of ordered) {
    let best: Cluster | null = null;
    let bestSim = -1;

    for (const cluster of clusters) {
      const sim = similarity(keywords, cluster.keywords, options.similarity);
      // Strict > keeps the earliest cluster on ties
      if (sim >= options.threshold && sim > bestSim) {
        best = cluster;
        bestSim = sim;
      }
    }

    if (!best) {
      best = { keywords: new Set(), articles: [], keywordCounts: new Map() };
      clusters.push(best);
    }

    best.articles.push(article);
    for (const k of keywords) {
      best.keywords.add(k);
      best.keywordCounts.set(k, (best.keywordCounts.get(k) ?? 0) + 1);
    }
  }

  return clusters;
}
